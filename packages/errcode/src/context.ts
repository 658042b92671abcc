/**
 * errcode/context
 *
 * Classify cancellation: aborted signals and timeouts.
 *
 * `AbortSignal.timeout()` aborts with a `TimeoutError` reason and
 * `AbortSignal.abort()` / `AbortController.abort()` with an `AbortError`
 * reason; Node's own abortable APIs reject with an `AbortError` whose code
 * is `ABORT_ERR`.
 *
 * @example
 * ```typescript
 * import { contextErrorCode } from 'errcode/context';
 *
 * try {
 *   await fetch(url, { signal: AbortSignal.timeout(5000) });
 * } catch (error) {
 *   contextErrorCode(error); // Code.DeadlineExceeded
 * }
 * ```
 */

import { Code } from "./code";
import { findCause } from "./chain";
import { fromFunc, type ErrorCoder } from "./coder";

interface Named {
  readonly name: string;
}

function isTimeout(value: unknown): value is Named {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    value.name === "TimeoutError"
  );
}

function isAbort(value: unknown): value is Named {
  if (typeof value !== "object" || value === null) return false;
  return (
    ("name" in value && value.name === "AbortError") ||
    ("code" in value && value.code === "ABORT_ERR")
  );
}

/**
 * Returns DeadlineExceeded for timeouts and Canceled for aborts.
 */
export function contextErrorCode(error: unknown): Code {
  if (error === null || error === undefined) {
    return Code.OK;
  }
  if (findCause(error, isTimeout) !== undefined) {
    return Code.DeadlineExceeded;
  }
  if (findCause(error, isAbort) !== undefined) {
    return Code.Canceled;
  }
  return Code.Unknown;
}

const contextErrorCoderInstance: ErrorCoder = fromFunc(contextErrorCode);

/**
 * Returns an ErrorCoder that handles abort and timeout errors.
 */
export function contextErrorCoder(): ErrorCoder {
  return contextErrorCoderInstance;
}
