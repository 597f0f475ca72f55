/**
 * Resolve where the alias file lives.
 *
 * Precedence:
 * 1. $ALIASMGR_CONFIG_PATH (explicit file, relative paths resolved from CWD)
 * 2. $XDG_CONFIG_HOME/aliasmgr/aliases.toml
 * 3. ~/.config/aliasmgr/aliases.toml
 */

import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { debug } from "../util/logger.js";

export const CONFIG_PATH_ENV_VAR = "ALIASMGR_CONFIG_PATH";

type Env = Record<string, string | undefined>;

export function getConfigDir(env: Env = process.env): string {
  const xdg = env.XDG_CONFIG_HOME;
  const base = xdg && xdg.length > 0 ? xdg : join(homedir(), ".config");
  return join(base, "aliasmgr");
}

export function getConfigPath(env: Env = process.env): string {
  const custom = env[CONFIG_PATH_ENV_VAR];
  if (custom && custom.length > 0) {
    debug(`Using ${CONFIG_PATH_ENV_VAR}: ${custom}`);
    return resolve(process.cwd(), custom);
  }
  return join(getConfigDir(env), "aliases.toml");
}

/**
 * Load ALIASMGR_* defaults from a .env file next to the default alias file.
 * Variables already set in the environment win.
 */
export function loadEnvFile(env: Env = process.env): void {
  loadDotenv({ path: join(getConfigDir(env), ".env"), quiet: true });
}
