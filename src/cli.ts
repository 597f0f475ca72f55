#!/usr/bin/env node
/**
 * aliasmgr: shell alias manager
 *
 * Usage:
 *   aliasmgr add alias|group ...        Create aliases and groups
 *   aliasmgr remove alias|group|all     Delete aliases and groups
 *   aliasmgr move <name> [group]        Change the group of an alias
 *   aliasmgr rename alias|group         Rename in place
 *   aliasmgr edit <name> [command]      Change an alias
 *   aliasmgr list [pattern]             Show aliases
 *   aliasmgr enable|disable alias|group Toggle aliases and groups
 *   aliasmgr sort aliases|groups        Reorder the config file
 *   aliasmgr sync                       Load aliases into the shell
 *   aliasmgr init bash|zsh              Print the shell integration snippet
 */

import { createProgram } from "./program.js";
import { loadEnvFile } from "./config/paths.js";
import { debug } from "./util/logger.js";
import { errorMessage } from "./util/errors.js";

async function main(): Promise<void> {
  // ALIASMGR_* defaults may live in ~/.config/aliasmgr/.env
  loadEnvFile();

  await createProgram().parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof Error && err.cause !== undefined) {
    debug(`Caused by: ${err.cause instanceof Error ? err.cause.stack ?? err.cause.message : String(err.cause)}`);
  }
  console.error(`aliasmgr: ${errorMessage(err)}`);
  process.exit(1);
});
