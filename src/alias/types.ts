/**
 * Alias configuration types.
 */

export interface Alias {
  command: string;
  enabled: boolean;
  /** zsh-only: expanded anywhere on the command line. */
  global: boolean;
  group?: string;
}

export interface Group {
  enabled: boolean;
}

/**
 * In-memory model of the alias file. Map order is file order; a group's
 * members are the aliases whose `group` names it, in alias order.
 */
export interface AliasConfig {
  aliases: Map<string, Alias>;
  groups: Map<string, Group>;
}

/**
 * Result of a mutating operation.
 * - `apply`: config changed and the shell has to run `script`
 * - `changed`: config changed, shell state is unaffected
 * - `unchanged`: nothing to save
 */
export type Outcome =
  | { kind: "apply"; script: string; }
  | { kind: "changed"; }
  | { kind: "unchanged"; };

export function createConfig(): AliasConfig {
  return { aliases: new Map(), groups: new Map() };
}

export function createAlias(
  command: string,
  options: { enabled?: boolean; global?: boolean; group?: string; } = {},
): Alias {
  const alias: Alias = {
    command,
    enabled: options.enabled ?? true,
    global: options.global ?? false,
  };
  if (options.group !== undefined) alias.group = options.group;
  return alias;
}

/** Aliases written as `name = { ... }` instead of `name = "command"`. */
export function isDetailed(alias: Alias): boolean {
  return !alias.enabled || alias.global;
}
