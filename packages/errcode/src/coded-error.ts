/**
 * errcode/coded-error
 *
 * Attach an explicit canonical code to an error.
 *
 * @example
 * ```typescript
 * import { Code, withCode, codedErrorCoder } from 'errcode';
 *
 * const error = withCode(Code.NotFound, new Error('user 42'));
 * error.message;                       // 'user 42'
 * error.unwrap();                      // the original Error
 * codedErrorCoder().errorCode(error);  // Code.NotFound
 * ```
 */

import { Code, isCode } from "./code";
import { findCause } from "./chain";
import { messageOf } from "./message";
import { fromFunc, type ErrorCoder } from "./coder";

// =============================================================================
// Capability
// =============================================================================

/**
 * Anything that carries an explicit canonical code.
 */
export interface CanonicalCodeCarrier {
  readonly canonicalCode: Code;
}

/**
 * Check if a value carries an explicit canonical code.
 */
export function isCanonicalCodeCarrier(value: unknown): value is CanonicalCodeCarrier {
  return (
    typeof value === "object" &&
    value !== null &&
    "canonicalCode" in value &&
    isCode(value.canonicalCode)
  );
}

// =============================================================================
// CodedError
// =============================================================================

/**
 * An error with an explicit code.
 *
 * The message is the wrapped error's message, unchanged.
 */
export class CodedError extends Error implements CanonicalCodeCarrier {
  readonly _tag = "CodedError" as const;
  readonly canonicalCode: Code;
  override readonly cause: unknown;

  constructor(code: Code, cause: unknown) {
    super(messageOf(cause));
    this.canonicalCode = code;
    this.cause = cause;
    if (cause instanceof Error) {
      this.name = cause.name;
    }
  }

  /**
   * The wrapped error.
   */
  unwrap(): unknown {
    return this.cause;
  }
}

/**
 * Wrap an error and add an explicit code.
 *
 * Any code is accepted, including `Code.OK` and `Code.Unknown`.
 */
export function withCode(code: Code, cause: unknown): CodedError {
  return new CodedError(code, cause);
}

/**
 * Check if an error is a CodedError.
 */
export function isCodedError(error: unknown): error is CodedError {
  return error instanceof CodedError;
}

// =============================================================================
// Coder
// =============================================================================

/**
 * Returns the explicit code of the first carrier in the error's chain.
 */
export function codedErrorCode(error: unknown): Code {
  if (error === null || error === undefined) {
    return Code.OK;
  }
  const carrier = findCause(error, isCanonicalCodeCarrier);
  return carrier ? carrier.canonicalCode : Code.Unknown;
}

const codedErrorCoderInstance: ErrorCoder = fromFunc(codedErrorCode);

/**
 * Returns an ErrorCoder that handles explicitly coded errors.
 */
export function codedErrorCoder(): ErrorCoder {
  return codedErrorCoderInstance;
}
