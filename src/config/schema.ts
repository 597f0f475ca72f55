/**
 * Zod schemas for validating the parsed alias file.
 *
 * Shapes accepted per top-level key:
 *   name = "command"                                   alias, shorthand
 *   name = { command = "...", enabled = false, ... }   alias, detailed
 *   [name] ...                                         group of aliases
 */

import { z } from "zod";

const detailedAliasSchema = z
  .object({
    command: z.string(),
    enabled: z.boolean().optional(),
    global: z.boolean().optional(),
  })
  .strict();

export const aliasEntrySchema = z.union([
  z.string().transform(command => ({ command, enabled: true, global: false })),
  detailedAliasSchema.transform(entry => ({
    command: entry.command,
    enabled: entry.enabled ?? true,
    global: entry.global ?? false,
  })),
]);

export type AliasEntry = z.infer<typeof aliasEntrySchema>;

export const groupEntrySchema = z
  .record(z.string(), z.union([z.boolean(), aliasEntrySchema]))
  .superRefine((entries, ctx) => {
    for (const [key, value] of Object.entries(entries)) {
      if (key === "enabled" && typeof value !== "boolean") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "Group flag 'enabled' must be a boolean",
        });
      } else if (key !== "enabled" && typeof value === "boolean") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "Expected an alias command",
        });
      }
    }
  })
  .transform(entries => {
    const aliases: Array<[string, AliasEntry]> = [];
    let enabled = true;
    for (const [key, value] of Object.entries(entries)) {
      if (typeof value === "boolean") {
        enabled = value;
      } else {
        aliases.push([key, value]);
      }
    }
    return { kind: "group" as const, enabled, aliases };
  });

export const aliasFileSchema = z.record(
  z.string(),
  z.union([
    aliasEntrySchema.transform(alias => ({ kind: "alias" as const, ...alias })),
    groupEntrySchema,
  ]),
);

export type ValidatedAliasFile = z.infer<typeof aliasFileSchema>;

export function validateAliasFile(data: unknown): ValidatedAliasFile {
  return aliasFileSchema.parse(data);
}
