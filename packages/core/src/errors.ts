/**
 * packages/core/src/errors.ts — Error classes for deterministic violations.
 *
 * Why: Callers branch on `code`, not on message text. Configuration problems
 * get their own subclass so hosts can refuse to start on an invalid table.
 */

export type ConfigurationErrorCode =
  | "DUPLICATE_CHORD"
  | "EMPTY_CHORD"
  | "PREFIX_CONFLICT"
  | "INVALID_OPTION"
  | "INVALID_CONFIG";

export type KeychordErrorCode = ConfigurationErrorCode | "REENTRANT_CALL";

/**
 * Base error for the library.
 * The `code` property identifies the specific violation.
 */
export class KeychordError extends Error {
  override readonly name: string = "KeychordError";
  readonly code: KeychordErrorCode;

  constructor(code: KeychordErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Raised when a chord table or its options cannot be built.
 * A matcher is never created from an invalid table.
 */
export class ConfigurationError extends KeychordError {
  override readonly name: string = "ConfigurationError";
  declare readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message?: string) {
    super(code, message);
  }
}
