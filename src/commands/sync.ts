/**
 * `aliasmgr sync`: redefine every alias of the config in the calling shell.
 */

import type { Command } from "commander";
import { syncScript } from "../shell/projector.js";
import { sendDelta } from "../shell/delta.js";
import { openSession } from "./common.js";
import { log } from "../util/logger.js";

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Load the aliases from the config file into the shell")
    .option("--stdout", "Print the alias statements instead of sending them to the shell")
    .action(async (options: { stdout?: boolean; }) => {
      const { config, shell } = await openSession();
      const script = syncScript(config, shell);
      if (options.stdout) {
        console.log(script);
        return;
      }
      sendDelta(script);
      log(`Synced aliases for ${shell}`);
    });
}
