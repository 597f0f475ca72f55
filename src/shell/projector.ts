/**
 * Projects the alias model into bash/zsh statements.
 */

import type { Alias, AliasConfig } from "../alias/types.js";
import type { ShellType } from "./detect.js";
import { matchesGlob } from "../util/glob.js";
import { AliasmgrError } from "../util/errors.js";
import { log } from "../util/logger.js";

export function quoteSingle(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** `undefined` when the shell cannot express the alias (globals outside zsh). */
export function aliasStatement(
  name: string,
  alias: Alias,
  shell: ShellType,
): string | undefined {
  if (alias.global) {
    return shell === "zsh" ? `alias -g ${name}=${quoteSingle(alias.command)}` : undefined;
  }
  return `alias ${name}=${quoteSingle(alias.command)}`;
}

export function unaliasStatement(name: string): string {
  return `unalias ${quoteSingle(name)}`;
}

export function isGroupEnabled(config: AliasConfig, alias: Alias): boolean {
  if (alias.group === undefined) return true;
  return config.groups.get(alias.group)?.enabled ?? true;
}

/** Enabled itself and not hidden by a disabled group. */
export function isEffectivelyEnabled(config: AliasConfig, alias: Alias): boolean {
  return alias.enabled && isGroupEnabled(config, alias);
}

/** Statements for every alias the shell should currently define, keyed by name. */
export function activeStatements(
  config: AliasConfig,
  shell: ShellType,
): Map<string, string> {
  const statements = new Map<string, string>();
  for (const [name, alias] of config.aliases) {
    if (!isEffectivelyEnabled(config, alias)) continue;
    const statement = aliasStatement(name, alias, shell);
    if (statement === undefined) {
      log(`Skipping global alias "${name}": global aliases need zsh`);
      continue;
    }
    statements.set(name, statement);
  }
  return statements;
}

/** Full resync: drop every alias in the shell, then define the active ones. */
export function syncScript(config: AliasConfig, shell: ShellType): string {
  return ["unalias -a", ...activeStatements(config, shell).values()].join("\n");
}

/**
 * Statements that take a shell from `before` to `after`: removals first (in
 * `before` order), then new or changed definitions (in `after` order).
 */
export function diffStatements(
  before: Map<string, string>,
  after: Map<string, string>,
): string[] {
  const lines: string[] = [];
  for (const name of before.keys()) {
    if (!after.has(name)) lines.push(unaliasStatement(name));
  }
  for (const [name, statement] of after) {
    if (before.get(name) !== statement) lines.push(statement);
  }
  return lines;
}

export type GroupFilter =
  | { kind: "ungrouped"; }
  | { kind: "named"; name: string; };

export interface ListFilters {
  /** `*`/`?` glob over alias names. */
  pattern?: string;
  group?: GroupFilter;
  /** Effective state: a disabled group disables its members. */
  state?: "enabled" | "disabled";
  /** Only global aliases; always empty outside zsh. */
  global?: boolean;
}

export interface AliasSection {
  /** `undefined` for ungrouped aliases. */
  group?: string;
  enabled: boolean;
  aliases: Array<{ name: string; alias: Alias; }>;
}

/**
 * Select aliases for display, split into sections: ungrouped first, then
 * each group in config order. Sections without matches are dropped.
 */
export function selectAliases(
  config: AliasConfig,
  shell: ShellType,
  filters: ListFilters = {},
): AliasSection[] {
  const groupFilter = filters.group;
  if (groupFilter?.kind === "named" && !config.groups.has(groupFilter.name)) {
    throw new AliasmgrError("GROUP_NOT_FOUND", `Group "${groupFilter.name}" does not exist`);
  }

  const matches = (name: string, alias: Alias): boolean => {
    if (filters.pattern !== undefined && !matchesGlob(name, filters.pattern)) return false;
    if (filters.global && !(alias.global && shell === "zsh")) return false;
    if (filters.state === "enabled" && !isEffectivelyEnabled(config, alias)) return false;
    if (filters.state === "disabled" && isEffectivelyEnabled(config, alias)) return false;
    return true;
  };

  const sections: AliasSection[] = [];
  const collect = (group: string | undefined, enabled: boolean): void => {
    const aliases: AliasSection["aliases"] = [];
    for (const [name, alias] of config.aliases) {
      if (alias.group === group && matches(name, alias)) aliases.push({ name, alias });
    }
    if (aliases.length === 0) return;
    sections.push(group === undefined ? { enabled, aliases } : { group, enabled, aliases });
  };

  if (groupFilter === undefined || groupFilter.kind === "ungrouped") {
    collect(undefined, true);
  }
  for (const [name, group] of config.groups) {
    if (groupFilter === undefined || (groupFilter.kind === "named" && groupFilter.name === name)) {
      collect(name, group.enabled);
    }
  }
  return sections;
}
