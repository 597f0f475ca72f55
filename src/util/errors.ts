/**
 * Error type shared by the store, the alias operations and the commands.
 */

export type AliasmgrErrorCode =
  | "FILE_IO"
  | "MALFORMED_CONFIG"
  | "ALIAS_EXISTS"
  | "GROUP_EXISTS"
  | "ALIAS_NOT_FOUND"
  | "GROUP_NOT_FOUND"
  | "INVALID_NAME"
  | "INVALID_ARGUMENTS"
  | "DELTA_UNAVAILABLE";

export class AliasmgrError extends Error {
  constructor(
    public readonly code: AliasmgrErrorCode,
    message: string,
    options?: { cause?: unknown; },
  ) {
    super(message, options);
    this.name = "AliasmgrError";
  }
}

export function isAliasmgrError(
  err: unknown,
  code?: AliasmgrErrorCode,
): err is AliasmgrError {
  return err instanceof AliasmgrError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
