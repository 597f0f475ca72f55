/**
 * Name rules for aliases and groups.
 *
 * Names end up as shell words (`alias name='...'`, `unalias 'name'`) and as
 * TOML keys, so whitespace, `=` and quotes are rejected. Integer-like keys
 * are rejected too: they would not keep their position through a reload.
 */

import { AliasmgrError } from "../util/errors.js";

const INVALID_NAME_CHARS = /[\s='"]/;
const INTEGER_NAME = /^(0|[1-9]\d*)$/;

/** Keys a group table reads as its own, so they cannot name a member alias. */
export const RESERVED_MEMBER_NAMES: readonly string[] = ["enabled", "command"];

export type NameKind = "alias" | "group";

export function isValidName(name: string): boolean {
  return name.length > 0 && !INVALID_NAME_CHARS.test(name) && !INTEGER_NAME.test(name);
}

export function isReservedMemberName(name: string): boolean {
  return RESERVED_MEMBER_NAMES.includes(name);
}

export function assertValidName(kind: NameKind, name: string): void {
  if (name.length === 0) {
    throw new AliasmgrError("INVALID_NAME", `${capitalize(kind)} name must not be empty`);
  }
  if (INTEGER_NAME.test(name)) {
    throw new AliasmgrError(
      "INVALID_NAME",
      `Invalid ${kind} name "${name}": plain integers are not allowed`,
    );
  }
  if (!isValidName(name)) {
    throw new AliasmgrError(
      "INVALID_NAME",
      `Invalid ${kind} name "${name}": whitespace, '=' and quotes are not allowed`,
    );
  }
}

/** Aliases inside a group must not collide with the group table's own keys. */
export function assertValidMemberName(name: string, group: string): void {
  if (isReservedMemberName(name)) {
    throw new AliasmgrError(
      "INVALID_NAME",
      `Alias "${name}" cannot be in group "${group}": ${RESERVED_MEMBER_NAMES.map(n => `"${n}"`).join(" and ")} are reserved inside groups`,
    );
  }
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}
