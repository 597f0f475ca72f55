/**
 * Simple stderr logger with verbosity control.
 * stdout is reserved for list output and init snippets; fd 3 for shell deltas.
 */

export type LogLevel = "quiet" | "normal" | "verbose" | "debug";

const RANK: Record<LogLevel, number> = {
  quiet: 0,
  normal: 1,
  verbose: 2,
  debug: 3,
};

let level: LogLevel = "normal";

export function setLogLevel(l: LogLevel): void {
  level = l;
}

export function isVerbose(): boolean {
  return RANK[level] >= RANK.verbose;
}

export function log(message: string, ...args: unknown[]): void {
  if (RANK[level] >= RANK.verbose) {
    console.error(`[aliasmgr] ${message}`, ...args);
  }
}

export function debug(message: string, ...args: unknown[]): void {
  if (RANK[level] >= RANK.debug) {
    console.error(`[aliasmgr DEBUG] ${message}`, ...args);
  }
}

export function warn(message: string, ...args: unknown[]): void {
  if (RANK[level] >= RANK.normal) {
    console.error(`[aliasmgr WARN] ${message}`, ...args);
  }
}

export function error(message: string, ...args: unknown[]): void {
  console.error(`[aliasmgr ERROR] ${message}`, ...args);
}

/** User-facing feedback ("Alias added: ..."). Silenced by --quiet. */
export function notice(message: string): void {
  if (RANK[level] >= RANK.normal) {
    console.error(message);
  }
}
