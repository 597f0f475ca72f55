/**
 * `aliasmgr add`: create aliases and alias groups.
 */

import type { Command } from "commander";
import { addAlias, addGroup } from "../alias/operations.js";
import { ensureGroup, runMutation } from "./common.js";
import { notice, warn } from "../util/logger.js";

interface AddAliasOptions {
  group?: string;
  disabled?: boolean;
  global?: boolean;
  force?: boolean;
  createGroup?: boolean;
}

export function registerAddCommand(program: Command): void {
  const add = program
    .command("add")
    .alias("a")
    .description("Add an alias or an alias group");

  add
    .command("alias <name> <command>")
    .description("Add an alias")
    .option("-g, --group <group>", "Add the alias to GROUP")
    .option("-d, --disabled", "Add the alias disabled")
    .option("--global", "Global alias, expanded anywhere on the line (zsh only)")
    .option("-f, --force", "Overwrite an existing alias")
    .option("-c, --create-group", "Create GROUP if it does not exist")
    .action(async (name: string, command: string, options: AddAliasOptions) => {
      await runMutation(async ({ config, shell }) => {
        if (options.group !== undefined) {
          await ensureGroup(config, options.group, options.createGroup);
        }
        if (options.global && shell !== "zsh") {
          warn(`Global aliases are only supported by zsh; "${name}" will not be defined in ${shell}`);
        }

        const outcome = addAlias(config, shell, name, command, {
          group: options.group,
          enabled: !options.disabled,
          global: options.global,
          force: options.force,
        });
        if (outcome.kind !== "unchanged") {
          notice(`Alias added: ${name} -> ${command}`);
        }
        return outcome;
      });
    });

  add
    .command("group <name>")
    .alias("g")
    .description("Add an alias group")
    .option("-d, --disabled", "Add the group disabled")
    .action(async (name: string, options: { disabled?: boolean; }) => {
      await runMutation(({ config }) => {
        const outcome = addGroup(config, name, !options.disabled);
        notice(`Group added: ${name}`);
        return outcome;
      });
    });
}
