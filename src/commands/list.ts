/**
 * `aliasmgr list`: print aliases grouped by section on stdout.
 */

import type { Command } from "commander";
import type { Alias } from "../alias/types.js";
import type { AliasSection, GroupFilter, ListFilters } from "../shell/projector.js";
import { selectAliases } from "../shell/projector.js";
import { openSession, invalidArguments } from "./common.js";
import { bold, cyan, dim, yellow } from "../util/format.js";
import { log } from "../util/logger.js";

interface ListOptions {
  group?: string | boolean;
  enabled?: boolean;
  disabled?: boolean;
  global?: boolean;
}

function formatFlags(alias: Alias): string {
  const flags: string[] = [];
  if (!alias.enabled) flags.push("disabled");
  if (alias.global) flags.push("global");
  return flags.length > 0 ? ` ${yellow(`(${flags.join(", ")})`)}` : "";
}

export function formatSections(sections: AliasSection[]): string[] {
  const lines: string[] = [];
  for (const section of sections) {
    let indent = "";
    if (section.group !== undefined) {
      const state = section.enabled ? "" : ` ${yellow("(disabled)")}`;
      lines.push(`${bold(`[${section.group}]`)}${state}`);
      indent = "  ";
    }
    for (const { name, alias } of section.aliases) {
      lines.push(`${indent}${cyan(name)} ${dim("=")} ${alias.command}${formatFlags(alias)}`);
    }
  }
  return lines;
}

export function toListFilters(pattern: string | undefined, options: ListOptions): ListFilters {
  if (options.enabled && options.disabled) {
    throw invalidArguments("--enabled and --disabled cannot be combined");
  }

  const filters: ListFilters = {};
  if (pattern !== undefined) filters.pattern = pattern;
  if (options.group !== undefined) {
    const group: GroupFilter = typeof options.group === "string"
      ? { kind: "named", name: options.group }
      : { kind: "ungrouped" };
    filters.group = group;
  }
  if (options.enabled) filters.state = "enabled";
  if (options.disabled) filters.state = "disabled";
  if (options.global) filters.global = true;
  return filters;
}

export function registerListCommand(program: Command): void {
  program
    .command("list [pattern]")
    .alias("ls")
    .description("List aliases, optionally filtered by a name pattern (* and ? wildcards)")
    .option("-g, --group [group]", "Only aliases in GROUP; ungrouped aliases when GROUP is omitted")
    .option("-e, --enabled", "Only aliases that are active")
    .option("-d, --disabled", "Only aliases that are disabled or in a disabled group")
    .option("--global", "Only global aliases (zsh)")
    .action(async (pattern: string | undefined, options: ListOptions) => {
      const filters = toListFilters(pattern, options);
      const { config, shell } = await openSession();
      const lines = formatSections(selectAliases(config, shell, filters));
      if (lines.length === 0) {
        log("No aliases match");
        return;
      }
      for (const line of lines) console.log(line);
    });
}
