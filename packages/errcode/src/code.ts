/**
 * errcode/code
 *
 * The canonical status codes every coder classifies into.
 * Numeric values match the gRPC wire codes, so a code can be handed to an
 * RPC layer without translation.
 */

// =============================================================================
// Code
// =============================================================================

/**
 * Canonical status codes.
 *
 * @example
 * ```typescript
 * import { Code, codeName } from 'errcode';
 *
 * if (code === Code.Unavailable) retryLater();
 * logger.info({ code: codeName(code) });
 * ```
 */
export const Code = Object.freeze({
  /** Not an error. */
  OK: 0,
  /** The operation was canceled, typically by the caller. */
  Canceled: 1,
  /** The error could not be classified. */
  Unknown: 2,
  InvalidArgument: 3,
  DeadlineExceeded: 4,
  NotFound: 5,
  AlreadyExists: 6,
  PermissionDenied: 7,
  ResourceExhausted: 8,
  FailedPrecondition: 9,
  Aborted: 10,
  OutOfRange: 11,
  Unimplemented: 12,
  Internal: 13,
  Unavailable: 14,
  DataLoss: 15,
  Unauthenticated: 16,
} as const);

export type CodeName = keyof typeof Code;

export type Code = (typeof Code)[CodeName];

const names: readonly CodeName[] = Object.keys(Code).filter(isCodeName);

/**
 * Check if a value is one of the canonical codes.
 */
export function isCode(value: unknown): value is Code {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value < names.length;
}

/**
 * Check if a value is the name of a canonical code.
 */
export function isCodeName(value: unknown): value is CodeName {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(Code, value);
}

/**
 * Name of a code, e.g. `"NotFound"` for `Code.NotFound`.
 */
export function codeName(code: Code): CodeName {
  return names[code] ?? "Unknown";
}
