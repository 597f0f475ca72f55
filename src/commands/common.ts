/**
 * Shared plumbing for aliasmgr commands: load the config, run one mutation,
 * save it and hand the shell delta back.
 */

import type { AliasConfig, Outcome } from "../alias/types.js";
import { loadConfig, saveConfig } from "../alias/store.js";
import { addGroup } from "../alias/operations.js";
import { getConfigPath } from "../config/paths.js";
import type { ShellType } from "../shell/detect.js";
import { detectShell } from "../shell/detect.js";
import { sendDelta } from "../shell/delta.js";
import { AliasmgrError } from "../util/errors.js";
import { debug, log, notice } from "../util/logger.js";
import { confirm, isInteractive } from "../util/prompt.js";

export interface Session {
  path: string;
  shell: ShellType;
  config: AliasConfig;
}

export async function openSession(): Promise<Session> {
  const shell = detectShell();
  const path = getConfigPath();
  debug(`Shell: ${shell}, config: ${path}`);
  const config = await loadConfig(path);
  return { path, shell, config };
}

/** Persist the outcome of a mutation and forward its delta to the shell. */
export async function commit(session: Session, outcome: Outcome): Promise<void> {
  if (outcome.kind === "unchanged") {
    log("No changes made");
    return;
  }

  await saveConfig(session.path, session.config);
  if (outcome.kind === "apply") {
    sendDelta(outcome.script);
  }
}

/** load → mutate → save. Nothing is written when `mutate` throws. */
export async function runMutation(
  mutate: (session: Session) => Outcome | Promise<Outcome>,
): Promise<Outcome> {
  const session = await openSession();
  const outcome = await mutate(session);
  await commit(session, outcome);
  return outcome;
}

/**
 * Make sure `group` exists, creating it when `create` is set or the user
 * agrees on an interactive terminal.
 */
export async function ensureGroup(
  config: AliasConfig,
  group: string,
  create: boolean | undefined,
): Promise<void> {
  if (config.groups.has(group)) return;

  if (!create) {
    const accepted = isInteractive()
      && await confirm(`Group "${group}" does not exist. Create it?`, true);
    if (!accepted) {
      throw new AliasmgrError(
        "GROUP_NOT_FOUND",
        `Group "${group}" does not exist (use --create-group to create it)`,
      );
    }
  }

  addGroup(config, group);
  notice(`Group created: ${group}`);
}

export function invalidArguments(message: string): AliasmgrError {
  return new AliasmgrError("INVALID_ARGUMENTS", message);
}
