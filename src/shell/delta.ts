/**
 * Delta channel: hands alias/unalias statements back to the calling shell.
 *
 * The wrapper function emitted by `aliasmgr init` runs the binary with fd 3
 * pointing into a captured variable and evals whatever arrives there.
 */

import { fstatSync, writeSync } from "node:fs";
import { AliasmgrError } from "../util/errors.js";
import { debug } from "../util/logger.js";

export const DELTA_FD = 3;

/**
 * Only write when fd 3 is something the shell handed us. Without the wrapper
 * the descriptor is either closed or one of Node's own.
 */
export function isDeltaChannelOpen(fd = DELTA_FD): boolean {
  try {
    const stat = fstatSync(fd);
    return stat.isFIFO() || stat.isFile() || stat.isCharacterDevice() || stat.isSocket();
  } catch (err) {
    debug(`fd ${fd} is not usable: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}

export function sendDelta(script: string, fd = DELTA_FD): void {
  if (!isDeltaChannelOpen(fd)) {
    throw new AliasmgrError(
      "DELTA_UNAVAILABLE",
      "Could not send alias changes to the shell. Add 'eval \"$(aliasmgr init bash|zsh)\"' to your shell rc file, or run 'aliasmgr sync --stdout' to print them.",
    );
  }
  writeSync(fd, script.endsWith("\n") ? script : `${script}\n`);
  debug(`Sent shell delta:\n${script}`);
}
