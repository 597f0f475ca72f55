/**
 * Mutations of the alias model.
 *
 * Every operation validates against the loaded config, applies a single
 * change and reports what the caller has to persist and send to the shell.
 * Nothing here touches the filesystem.
 */

import type { Alias, AliasConfig, Group, Outcome } from "./types.js";
import { createAlias } from "./types.js";
import { assertValidMemberName, assertValidName } from "./names.js";
import type { ShellType } from "../shell/detect.js";
import { activeStatements, diffStatements } from "../shell/projector.js";
import { AliasmgrError } from "../util/errors.js";
import { log } from "../util/logger.js";

/**
 * Run `mutate` and turn the change in active aliases into a shell delta.
 * `mutate` returns false when it left the config untouched.
 */
function withDelta(
  config: AliasConfig,
  shell: ShellType,
  mutate: () => boolean,
): Outcome {
  const before = activeStatements(config, shell);
  if (!mutate()) return { kind: "unchanged" };
  const lines = diffStatements(before, activeStatements(config, shell));
  return lines.length > 0 ? { kind: "apply", script: lines.join("\n") } : { kind: "changed" };
}

function getAlias(config: AliasConfig, name: string): Alias {
  const alias = config.aliases.get(name);
  if (!alias) {
    throw new AliasmgrError("ALIAS_NOT_FOUND", `Alias "${name}" does not exist`);
  }
  return alias;
}

function assertGroupExists(config: AliasConfig, name: string): void {
  if (!config.groups.has(name)) {
    throw new AliasmgrError("GROUP_NOT_FOUND", `Group "${name}" does not exist`);
  }
}

function assertAliasNameFree(config: AliasConfig, name: string): void {
  assertValidName("alias", name);
  if (config.aliases.has(name)) {
    throw new AliasmgrError("ALIAS_EXISTS", `Alias "${name}" already exists`);
  }
  if (config.groups.has(name)) {
    throw new AliasmgrError("INVALID_NAME", `"${name}" is already the name of a group`);
  }
}

function assertGroupNameFree(config: AliasConfig, name: string): void {
  assertValidName("group", name);
  if (config.groups.has(name)) {
    throw new AliasmgrError("GROUP_EXISTS", `Group "${name}" already exists`);
  }
  if (config.aliases.has(name)) {
    throw new AliasmgrError("INVALID_NAME", `"${name}" is already the name of an alias`);
  }
}

/** Replace a key while keeping its position. */
function renameKey<V>(map: Map<string, V>, oldKey: string, newKey: string): Map<string, V> {
  const renamed = new Map<string, V>();
  for (const [key, value] of map) {
    renamed.set(key === oldKey ? newKey : key, value);
  }
  return renamed;
}

function sameAlias(a: Alias, b: Alias): boolean {
  return a.command === b.command
    && a.enabled === b.enabled
    && a.global === b.global
    && a.group === b.group;
}

// ---------------------------------------------------------------------------
// add

export interface AddAliasOptions {
  group?: string;
  enabled?: boolean;
  global?: boolean;
  /** Overwrite an existing alias in place instead of failing. */
  force?: boolean;
}

export function addAlias(
  config: AliasConfig,
  shell: ShellType,
  name: string,
  command: string,
  options: AddAliasOptions = {},
): Outcome {
  const existing = config.aliases.get(name);
  if (existing && !options.force) {
    throw new AliasmgrError(
      "ALIAS_EXISTS",
      `Alias "${name}" already exists (use --force to overwrite it)`,
    );
  }
  if (!existing) assertAliasNameFree(config, name);
  if (options.group !== undefined) {
    assertGroupExists(config, options.group);
    assertValidMemberName(name, options.group);
  }

  const alias = createAlias(command, options);
  return withDelta(config, shell, () => {
    if (existing && sameAlias(existing, alias)) return false;
    // Map#set keeps the position of an existing key
    config.aliases.set(name, alias);
    log(`${existing ? "Overwrote" : "Added"} alias "${name}" -> ${command}`);
    return true;
  });
}

export function addGroup(config: AliasConfig, name: string, enabled = true): Outcome {
  assertGroupNameFree(config, name);
  config.groups.set(name, { enabled });
  log(`Added group "${name}" (${enabled ? "enabled" : "disabled"})`);
  return { kind: "changed" };
}

// ---------------------------------------------------------------------------
// remove

/** Remove several aliases; nothing is removed unless every name exists. */
export function removeAliases(
  config: AliasConfig,
  shell: ShellType,
  names: string[],
): Outcome {
  for (const name of names) getAlias(config, name);
  return withDelta(config, shell, () => {
    for (const name of names) config.aliases.delete(name);
    return names.length > 0;
  });
}

/**
 * Remove a group. Its aliases become ungrouped when `reassign` is set,
 * otherwise they are removed with it.
 */
export function removeGroup(
  config: AliasConfig,
  shell: ShellType,
  name: string,
  reassign = false,
): Outcome {
  assertGroupExists(config, name);
  return withDelta(config, shell, () => {
    for (const [aliasName, alias] of [...config.aliases]) {
      if (alias.group !== name) continue;
      if (reassign) {
        delete alias.group;
      } else {
        config.aliases.delete(aliasName);
      }
    }
    config.groups.delete(name);
    return true;
  });
}

export function removeAll(config: AliasConfig): Outcome {
  if (config.aliases.size === 0 && config.groups.size === 0) {
    return { kind: "unchanged" };
  }
  config.aliases.clear();
  config.groups.clear();
  return { kind: "apply", script: "unalias -a" };
}

// ---------------------------------------------------------------------------
// move / rename / edit

/** Move an alias into `group`, or out of any group when `group` is undefined. */
export function moveAlias(
  config: AliasConfig,
  shell: ShellType,
  name: string,
  group: string | undefined,
): Outcome {
  const alias = getAlias(config, name);
  if (group !== undefined) {
    assertGroupExists(config, group);
    assertValidMemberName(name, group);
  }

  return withDelta(config, shell, () => {
    if (alias.group === group) return false;
    if (group === undefined) {
      delete alias.group;
    } else {
      alias.group = group;
    }
    return true;
  });
}

export function renameAlias(
  config: AliasConfig,
  shell: ShellType,
  oldName: string,
  newName: string,
): Outcome {
  const alias = getAlias(config, oldName);
  assertAliasNameFree(config, newName);
  if (alias.group !== undefined) assertValidMemberName(newName, alias.group);
  return withDelta(config, shell, () => {
    config.aliases = renameKey(config.aliases, oldName, newName);
    return true;
  });
}

export function renameGroup(config: AliasConfig, oldName: string, newName: string): Outcome {
  assertGroupExists(config, oldName);
  assertGroupNameFree(config, newName);
  config.groups = renameKey(config.groups, oldName, newName);
  for (const alias of config.aliases.values()) {
    if (alias.group === oldName) alias.group = newName;
  }
  return { kind: "changed" };
}

export interface AliasChanges {
  command?: string;
  global?: boolean;
  /** A group name, or `null` to ungroup. */
  group?: string | null;
}

export function editAlias(
  config: AliasConfig,
  shell: ShellType,
  name: string,
  changes: AliasChanges,
): Outcome {
  const alias = getAlias(config, name);
  if (typeof changes.group === "string") {
    assertGroupExists(config, changes.group);
    assertValidMemberName(name, changes.group);
  }

  return withDelta(config, shell, () => {
    const updated: Alias = { ...alias };
    if (changes.command !== undefined) updated.command = changes.command;
    if (changes.global !== undefined) updated.global = changes.global;
    if (changes.group === null) delete updated.group;
    else if (changes.group !== undefined) updated.group = changes.group;

    if (sameAlias(alias, updated)) return false;
    config.aliases.set(name, updated);
    return true;
  });
}

// ---------------------------------------------------------------------------
// enable / disable

export function setAliasEnabled(
  config: AliasConfig,
  shell: ShellType,
  name: string,
  enabled: boolean,
): Outcome {
  const alias = getAlias(config, name);
  return withDelta(config, shell, () => {
    if (alias.enabled === enabled) return false;
    alias.enabled = enabled;
    return true;
  });
}

export function setGroupEnabled(
  config: AliasConfig,
  shell: ShellType,
  name: string,
  enabled: boolean,
): Outcome {
  assertGroupExists(config, name);
  return withDelta(config, shell, () => {
    const group = config.groups.get(name);
    if (!group || group.enabled === enabled) return false;
    group.enabled = enabled;
    return true;
  });
}

// ---------------------------------------------------------------------------
// sort

export type SortScope =
  | { kind: "all"; }
  | { kind: "ungrouped"; }
  | { kind: "group"; name: string; };

function byName(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Sort aliases by name. A scoped sort only reorders the aliases in scope,
 * among the positions they already occupy.
 */
export function sortAliases(config: AliasConfig, scope: SortScope): Outcome {
  if (scope.kind === "group") assertGroupExists(config, scope.name);

  const inScope = (alias: Alias): boolean => {
    switch (scope.kind) {
      case "all":
        return true;
      case "ungrouped":
        return alias.group === undefined;
      case "group":
        return alias.group === scope.name;
    }
  };

  const entries = [...config.aliases];
  const slots: number[] = [];
  entries.forEach(([, alias], index) => {
    if (inScope(alias)) slots.push(index);
  });
  const sorted = slots.map(i => entries[i]).sort((a, b) => byName(a[0], b[0]));
  const reordered = [...entries];
  slots.forEach((slot, i) => {
    reordered[slot] = sorted[i];
  });

  if (reordered.every((entry, i) => entry[0] === entries[i][0])) {
    return { kind: "unchanged" };
  }
  config.aliases = new Map(reordered);
  return { kind: "changed" };
}

export function sortGroups(config: AliasConfig): Outcome {
  const names = [...config.groups.keys()];
  const sorted = [...names].sort(byName);
  if (sorted.every((name, i) => name === names[i])) return { kind: "unchanged" };

  const groups = new Map<string, Group>();
  for (const name of sorted) {
    const group = config.groups.get(name);
    if (group) groups.set(name, group);
  }
  config.groups = groups;
  return { kind: "changed" };
}
