/**
 * `aliasmgr rename`: rename aliases and groups in place.
 */

import type { Command } from "commander";
import { renameAlias, renameGroup } from "../alias/operations.js";
import { runMutation } from "./common.js";
import { notice } from "../util/logger.js";

export function registerRenameCommand(program: Command): void {
  const rename = program
    .command("rename")
    .alias("rn")
    .description("Rename an alias or an alias group");

  rename
    .command("alias <old> <new>")
    .alias("a")
    .description("Rename an alias, keeping its group and flags")
    .action(async (oldName: string, newName: string) => {
      await runMutation(({ config, shell }) => {
        const outcome = renameAlias(config, shell, oldName, newName);
        notice(`Renamed alias ${oldName} -> ${newName}`);
        return outcome;
      });
    });

  rename
    .command("group <old> <new>")
    .alias("g")
    .description("Rename a group")
    .action(async (oldName: string, newName: string) => {
      await runMutation(({ config }) => {
        const outcome = renameGroup(config, oldName, newName);
        notice(`Renamed group ${oldName} -> ${newName}`);
        return outcome;
      });
    });
}
