/**
 * `aliasmgr move`: change the group of an alias.
 */

import type { Command } from "commander";
import { moveAlias } from "../alias/operations.js";
import { ensureGroup, runMutation } from "./common.js";
import { notice } from "../util/logger.js";

export function registerMoveCommand(program: Command): void {
  program
    .command("move <name> [group]")
    .alias("mv")
    .description("Move an alias into GROUP, or out of its group when GROUP is omitted")
    .option("-c, --create-group", "Create GROUP if it does not exist")
    .action(async (name: string, group: string | undefined, options: { createGroup?: boolean; }) => {
      await runMutation(async ({ config, shell }) => {
        if (group !== undefined) {
          await ensureGroup(config, group, options.createGroup);
        }
        const outcome = moveAlias(config, shell, name, group);
        if (outcome.kind !== "unchanged") {
          notice(group === undefined ? `Alias ${name} is now ungrouped` : `Moved ${name} to ${group}`);
        }
        return outcome;
      });
    });
}
