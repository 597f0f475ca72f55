/**
 * `aliasmgr enable` / `aliasmgr disable`: toggle aliases and groups.
 */

import type { Command } from "commander";
import { setAliasEnabled, setGroupEnabled } from "../alias/operations.js";
import { runMutation } from "./common.js";
import { notice } from "../util/logger.js";

function registerStateCommand(
  program: Command,
  enabled: boolean,
): void {
  const verb = enabled ? "enable" : "disable";
  const past = enabled ? "enabled" : "disabled";

  const command = program
    .command(verb)
    .alias(enabled ? "en" : "dis")
    .description(`${enabled ? "Enable" : "Disable"} an alias or an alias group`);

  command
    .command("alias <name>")
    .alias("a")
    .description(`${enabled ? "Enable" : "Disable"} an alias`)
    .action(async (name: string) => {
      await runMutation(({ config, shell }) => {
        const outcome = setAliasEnabled(config, shell, name, enabled);
        notice(
          outcome.kind === "unchanged" ? `Alias ${name} is already ${past}` : `Alias ${past}: ${name}`,
        );
        return outcome;
      });
    });

  command
    .command("group <name>")
    .alias("g")
    .description(`${enabled ? "Enable" : "Disable"} every alias of a group`)
    .action(async (name: string) => {
      await runMutation(({ config, shell }) => {
        const outcome = setGroupEnabled(config, shell, name, enabled);
        notice(
          outcome.kind === "unchanged" ? `Group ${name} is already ${past}` : `Group ${past}: ${name}`,
        );
        return outcome;
      });
    });
}

export function registerEnableCommand(program: Command): void {
  registerStateCommand(program, true);
}

export function registerDisableCommand(program: Command): void {
  registerStateCommand(program, false);
}
