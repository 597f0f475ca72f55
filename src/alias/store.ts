/**
 * Alias store: persists the alias model as TOML.
 */

import { mkdir, readFile, realpath, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { AliasConfig } from "./types.js";
import { createConfig } from "./types.js";
import { parseConfig, serializeConfig } from "../config/toml.js";
import { AliasmgrError, errorMessage } from "../util/errors.js";
import { debug, log } from "../util/logger.js";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** A missing file is an empty config. */
export async function loadConfig(path: string): Promise<AliasConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      log(`Config file ${path} does not exist, starting with an empty config`);
      return createConfig();
    }
    throw new AliasmgrError("FILE_IO", `Failed to read ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const config = parseConfig(content, path);
  debug(`Loaded ${config.aliases.size} aliases and ${config.groups.size} groups from ${path}`);
  return config;
}

/** Follow a symlinked alias file so the rename replaces its target. */
async function resolveTarget(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (err) {
    if (isNotFound(err)) return path;
    throw err;
  }
}

/**
 * Write the config atomically: a temporary sibling file is written first and
 * renamed over the target.
 */
export async function saveConfig(path: string, config: AliasConfig): Promise<void> {
  const content = serializeConfig(config);
  let tmpPath: string | undefined;
  try {
    const target = await resolveTarget(path);
    await mkdir(dirname(target), { recursive: true });
    tmpPath = join(dirname(target), `.${basename(target)}.${process.pid}.tmp`);
    await writeFile(tmpPath, content, "utf-8");
    await rename(tmpPath, target);
    debug(`Saved config to ${target}`);
  } catch (err) {
    if (tmpPath !== undefined) await rm(tmpPath, { force: true });
    throw new AliasmgrError("FILE_IO", `Failed to write ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
