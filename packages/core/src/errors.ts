/**
 * packages/core/src/errors.ts — Error type shared by all cellterm packages.
 */

export type CellTermErrorCode =
  | "INVALID_DIMENSIONS"
  | "VIEWPORT_TOO_SMALL"
  | "INVALID_ARGUMENT"
  | "NOT_A_TTY";

/**
 * Error class for startup and argument failures.
 * The `code` property identifies the specific failure.
 */
export class CellTermError extends Error {
  override readonly name = "CellTermError";
  readonly code: CellTermErrorCode;

  constructor(code: CellTermErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CellTermError);
    }
  }
}

export function isCellTermError(value: unknown): value is CellTermError {
  return value instanceof CellTermError;
}
