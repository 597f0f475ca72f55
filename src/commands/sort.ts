/**
 * `aliasmgr sort`: reorder aliases or groups by name in the config file.
 */

import type { Command } from "commander";
import type { SortScope } from "../alias/operations.js";
import { sortAliases, sortGroups } from "../alias/operations.js";
import { runMutation } from "./common.js";
import { notice } from "../util/logger.js";

export function registerSortCommand(program: Command): void {
  const sort = program
    .command("sort")
    .description("Sort aliases or groups by name");

  sort
    .command("aliases")
    .alias("a")
    .description("Sort aliases by name")
    .option(
      "-g, --group [group]",
      "Only sort aliases in GROUP; ungrouped aliases when GROUP is omitted",
    )
    .action(async (options: { group?: string | boolean; }) => {
      let scope: SortScope = { kind: "all" };
      if (typeof options.group === "string") scope = { kind: "group", name: options.group };
      else if (options.group === true) scope = { kind: "ungrouped" };

      await runMutation(({ config }) => {
        const outcome = sortAliases(config, scope);
        notice(outcome.kind === "unchanged" ? "Aliases are already sorted" : "Aliases sorted");
        return outcome;
      });
    });

  sort
    .command("groups")
    .alias("g")
    .description("Sort groups by name")
    .action(async () => {
      await runMutation(({ config }) => {
        const outcome = sortGroups(config);
        notice(outcome.kind === "unchanged" ? "Groups are already sorted" : "Groups sorted");
        return outcome;
      });
    });
}
