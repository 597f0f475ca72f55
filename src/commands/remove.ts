/**
 * `aliasmgr remove`: delete aliases, groups or everything.
 */

import type { Command } from "commander";
import { removeAliases, removeAll, removeGroup } from "../alias/operations.js";
import { invalidArguments, runMutation } from "./common.js";
import { notice } from "../util/logger.js";
import { confirm, isInteractive } from "../util/prompt.js";

export function registerRemoveCommand(program: Command): void {
  const remove = program
    .command("remove")
    .alias("rm")
    .description("Remove aliases or alias groups");

  remove
    .command("alias <names...>")
    .alias("a")
    .description("Remove one or more aliases")
    .action(async (names: string[]) => {
      await runMutation(({ config, shell }) => {
        const outcome = removeAliases(config, shell, names);
        notice(`Removed ${names.length === 1 ? "alias" : "aliases"}: ${names.join(", ")}`);
        return outcome;
      });
    });

  remove
    .command("group <name>")
    .alias("g")
    .description("Remove a group together with its aliases")
    .option("-r, --reassign", "Keep the aliases and make them ungrouped")
    .action(async (name: string, options: { reassign?: boolean; }) => {
      await runMutation(({ config, shell }) => {
        const outcome = removeGroup(config, shell, name, options.reassign);
        notice(
          options.reassign
            ? `Removed group ${name}; its aliases are now ungrouped`
            : `Removed group ${name} and its aliases`,
        );
        return outcome;
      });
    });

  remove
    .command("all")
    .description("Remove every alias and group")
    .option("-y, --yes", "Do not ask for confirmation")
    .action(async (options: { yes?: boolean; }) => {
      await runMutation(async ({ config }) => {
        if (!options.yes) {
          if (!isInteractive()) {
            throw invalidArguments("Refusing to remove everything without --yes");
          }
          if (!await confirm("Remove all aliases and groups?")) {
            return { kind: "unchanged" };
          }
        }
        const outcome = removeAll(config);
        if (outcome.kind !== "unchanged") notice("Removed all aliases and groups");
        return outcome;
      });
    });
}
