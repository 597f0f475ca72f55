/**
 * Target shell detection: $ALIASMGR_SHELL, then $SHELL, then bash.
 */

import { warn } from "../util/logger.js";

export type ShellType = "bash" | "zsh";

export const SHELL_ENV_VAR = "ALIASMGR_SHELL";
export const DEFAULT_SHELL: ShellType = "bash";
export const SUPPORTED_SHELLS: readonly ShellType[] = ["bash", "zsh"];

export function parseShell(value: string): ShellType | undefined {
  const normalized = value.trim().toLowerCase();
  return SUPPORTED_SHELLS.find(s => s === normalized);
}

function fromLoginShell(shell: string | undefined): ShellType | undefined {
  if (!shell) return undefined;
  if (shell.endsWith("/zsh")) return "zsh";
  if (shell.endsWith("/bash")) return "bash";
  return undefined;
}

export function detectShell(
  env: Record<string, string | undefined> = process.env,
): ShellType {
  const configured = env[SHELL_ENV_VAR];
  if (configured !== undefined && configured !== "") {
    const shell = parseShell(configured);
    if (shell) return shell;
    warn(`Invalid ${SHELL_ENV_VAR} value "${configured}".`);
  } else {
    warn(`${SHELL_ENV_VAR} is not set. Add 'eval "$(aliasmgr init <shell>)"' to your shell rc file.`);
  }

  const fallback = fromLoginShell(env.SHELL) ?? DEFAULT_SHELL;
  warn(`Using ${fallback} as target shell.`);
  return fallback;
}
