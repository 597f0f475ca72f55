/**
 * Commander program with every aliasmgr command registered.
 */

import { Command } from "commander";
import { registerAddCommand } from "./commands/add.js";
import { registerRemoveCommand } from "./commands/remove.js";
import { registerMoveCommand } from "./commands/move.js";
import { registerRenameCommand } from "./commands/rename.js";
import { registerEditCommand } from "./commands/edit.js";
import { registerListCommand } from "./commands/list.js";
import { registerDisableCommand, registerEnableCommand } from "./commands/state.js";
import { registerSortCommand } from "./commands/sort.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerInitCommand } from "./commands/init.js";
import { setLogLevel } from "./util/logger.js";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("aliasmgr")
    .description("Manage shell aliases from a TOML file")
    .version(VERSION)
    .option("-q, --quiet", "Only print errors")
    .option("-v, --verbose", "Verbose logging to stderr")
    .option("--debug", "Debug logging to stderr")
    .hook("preAction", thisCommand => {
      const opts = thisCommand.opts<{ quiet?: boolean; verbose?: boolean; debug?: boolean; }>();
      if (opts.quiet) setLogLevel("quiet");
      else if (opts.debug) setLogLevel("debug");
      else if (opts.verbose) setLogLevel("verbose");
    });

  registerAddCommand(program);
  registerRemoveCommand(program);
  registerMoveCommand(program);
  registerRenameCommand(program);
  registerEditCommand(program);
  registerListCommand(program);
  registerEnableCommand(program);
  registerDisableCommand(program);
  registerSortCommand(program);
  registerSyncCommand(program);
  registerInitCommand(program);

  return program;
}
