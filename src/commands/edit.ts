/**
 * `aliasmgr edit`: change the command, group or global flag of an alias.
 */

import type { Command } from "commander";
import type { AliasChanges } from "../alias/operations.js";
import { editAlias } from "../alias/operations.js";
import { ensureGroup, invalidArguments, runMutation } from "./common.js";
import { notice } from "../util/logger.js";

interface EditOptions {
  global?: boolean;
  group?: string;
  ungroup?: boolean;
  createGroup?: boolean;
}

export function registerEditCommand(program: Command): void {
  program
    .command("edit <name> [command]")
    .alias("ed")
    .description("Edit an existing alias")
    .option("--global", "Make the alias global (zsh only)")
    .option("--no-global", "Make the alias a regular alias")
    .option("-g, --group <group>", "Move the alias into GROUP")
    .option("-u, --ungroup", "Take the alias out of its group")
    .option("-c, --create-group", "Create GROUP if it does not exist")
    .action(async (name: string, command: string | undefined, options: EditOptions) => {
      if (options.group !== undefined && options.ungroup) {
        throw invalidArguments("--group and --ungroup cannot be combined");
      }

      const changes: AliasChanges = {};
      if (command !== undefined) changes.command = command;
      if (options.global !== undefined) changes.global = options.global;
      if (options.group !== undefined) changes.group = options.group;
      if (options.ungroup) changes.group = null;
      if (Object.keys(changes).length === 0) {
        throw invalidArguments("Nothing to change: pass a new command, --[no-]global, --group or --ungroup");
      }

      await runMutation(async ({ config, shell }) => {
        if (options.group !== undefined) {
          await ensureGroup(config, options.group, options.createGroup);
        }
        const outcome = editAlias(config, shell, name, changes);
        notice(outcome.kind === "unchanged" ? `Alias ${name} is unchanged` : `Alias updated: ${name}`);
        return outcome;
      });
    });
}
