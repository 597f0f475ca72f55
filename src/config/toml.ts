/**
 * TOML codec for the alias file.
 */

import { parse, TomlError } from "smol-toml";
import { ZodError } from "zod";
import type { Alias, AliasConfig } from "../alias/types.js";
import { createAlias, createConfig, isDetailed } from "../alias/types.js";
import { validateAliasFile, type ValidatedAliasFile } from "./schema.js";
import { isReservedMemberName, isValidName } from "../alias/names.js";
import { AliasmgrError } from "../util/errors.js";

const BARE_KEY_RE = /^[A-Za-z0-9_-]+$/;

/** TOML basic string. JSON escapes are a subset of TOML's, except for DEL. */
export function tomlString(value: string): string {
  return JSON.stringify(value).replace(/\x7f/g, "\\u007f");
}

export function tomlKey(key: string): string {
  return BARE_KEY_RE.test(key) ? key : tomlString(key);
}

function formatAlias(name: string, alias: Alias): string {
  if (!isDetailed(alias)) {
    return `${tomlKey(name)} = ${tomlString(alias.command)}`;
  }
  const fields = [`command = ${tomlString(alias.command)}`];
  if (!alias.enabled) fields.push("enabled = false");
  if (alias.global) fields.push("global = true");
  return `${tomlKey(name)} = { ${fields.join(", ")} }`;
}

/**
 * Serialize the model: ungrouped aliases first (TOML wants bare keys before
 * tables), then one table per group. No blank lines.
 */
export function serializeConfig(config: AliasConfig): string {
  const lines: string[] = [];

  for (const [name, alias] of config.aliases) {
    if (alias.group === undefined) lines.push(formatAlias(name, alias));
  }

  for (const [groupName, group] of config.groups) {
    lines.push(`[${tomlKey(groupName)}]`);
    if (!group.enabled) lines.push("enabled = false");
    for (const [name, alias] of config.aliases) {
      if (alias.group === groupName) lines.push(formatAlias(name, alias));
    }
  }

  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

function formatIssues(err: ZodError): string {
  return err.issues
    .map(issue => {
      const where = issue.path.length > 0 ? `"${issue.path.join(".")}"` : "top level";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

function parseToml(content: string, source: string): unknown {
  try {
    return parse(content);
  } catch (err) {
    if (err instanceof TomlError) {
      throw new AliasmgrError(
        "MALFORMED_CONFIG",
        `Invalid TOML in ${source} (line ${err.line}, column ${err.column}): ${err.message.split("\n")[0]}`,
        { cause: err },
      );
    }
    throw err;
  }
}

function validate(raw: unknown, source: string): ValidatedAliasFile {
  try {
    return validateAliasFile(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new AliasmgrError(
        "MALFORMED_CONFIG",
        `Invalid alias definition in ${source} at ${formatIssues(err)}`,
        { cause: err },
      );
    }
    throw err;
  }
}

/** Parse and validate file content. `source` only shows up in error messages. */
export function parseConfig(content: string, source = "alias file"): AliasConfig {
  const validated = validate(parseToml(content, source), source);

  const config = createConfig();
  const claim = (name: string): void => {
    if (!isValidName(name)) {
      throw new AliasmgrError("MALFORMED_CONFIG", `Invalid name "${name}" in ${source}`);
    }
    if (config.aliases.has(name) || config.groups.has(name)) {
      throw new AliasmgrError("MALFORMED_CONFIG", `Duplicate name "${name}" in ${source}`);
    }
  };

  for (const [name, entry] of Object.entries(validated)) {
    claim(name);
    if (entry.kind === "alias") {
      config.aliases.set(name, createAlias(entry.command, entry));
      continue;
    }
    config.groups.set(name, { enabled: entry.enabled });
    for (const [aliasName, alias] of entry.aliases) {
      claim(aliasName);
      if (isReservedMemberName(aliasName)) {
        throw new AliasmgrError(
          "MALFORMED_CONFIG",
          `Reserved name "${aliasName}" in group "${name}" in ${source}`,
        );
      }
      config.aliases.set(aliasName, createAlias(alias.command, { ...alias, group: name }));
    }
  }

  return config;
}
