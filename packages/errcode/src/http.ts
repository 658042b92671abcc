/**
 * errcode/http
 *
 * Attach HTTP status codes to errors and translate them into canonical codes.
 *
 * @example
 * ```typescript
 * import { withHttpStatus, httpErrorCoder, fromHttpStatus } from 'errcode/http';
 *
 * const error = withHttpStatus(503, new Error('upstream down'));
 * httpErrorCoder().errorCode(error); // Code.Unavailable
 *
 * fromHttpStatus(429); // Code.ResourceExhausted
 * ```
 */

import { Code } from "./code";
import { findCause } from "./chain";
import { fromFunc, type ErrorCoder } from "./coder";
import { messageOf } from "./message";

// =============================================================================
// Capability
// =============================================================================

/**
 * Anything that carries an HTTP status code.
 */
export interface HttpStatusCarrier {
  readonly httpStatus: number;
}

/**
 * Check if a value carries an HTTP status code.
 */
export function isHttpStatusCarrier(value: unknown): value is HttpStatusCarrier {
  return (
    typeof value === "object" &&
    value !== null &&
    "httpStatus" in value &&
    typeof value.httpStatus === "number"
  );
}

// =============================================================================
// HttpError
// =============================================================================

/**
 * An error with an explicit HTTP status.
 */
export class HttpError extends Error implements HttpStatusCarrier {
  readonly _tag = "HttpError" as const;
  readonly httpStatus: number;
  override readonly cause: unknown;

  constructor(httpStatus: number, cause: unknown) {
    super(messageOf(cause));
    this.httpStatus = httpStatus;
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
 * Wrap an error and add an HTTP status.
 */
export function withHttpStatus(httpStatus: number, cause: unknown): HttpError {
  return new HttpError(httpStatus, cause);
}

/**
 * Check if an error is an HttpError.
 */
export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

// =============================================================================
// Status table
// =============================================================================

const httpStatusCodes: ReadonlyMap<number, Code> = new Map([
  [400, Code.InvalidArgument], // Bad Request
  [401, Code.Unauthenticated], // Unauthorized
  [403, Code.PermissionDenied], // Forbidden
  [404, Code.NotFound], // Not Found
  [409, Code.Aborted], // Conflict
  [416, Code.OutOfRange], // Range Not Satisfiable
  [429, Code.ResourceExhausted], // Too Many Requests
  [499, Code.Canceled], // Client Closed Request
  [500, Code.Internal], // Internal Server Error
  [501, Code.Unimplemented], // Not Implemented
  [503, Code.Unavailable], // Service Unavailable
  [504, Code.DeadlineExceeded], // Gateway Timeout
]);

/**
 * Returns the canonical code for an HTTP status code.
 *
 * Any 2xx status is OK; statuses without a mapping are Unknown.
 */
export function fromHttpStatus(httpStatus: number): Code {
  if (httpStatus >= 200 && httpStatus <= 299) {
    return Code.OK;
  }
  return httpStatusCodes.get(httpStatus) ?? Code.Unknown;
}

// =============================================================================
// Coder
// =============================================================================

/**
 * Returns the code for the HTTP status of the first carrier in the chain.
 */
export function httpErrorCode(error: unknown): Code {
  if (error === null || error === undefined) {
    return Code.OK;
  }
  const carrier = findCause(error, isHttpStatusCarrier);
  return carrier ? fromHttpStatus(carrier.httpStatus) : Code.Unknown;
}

const httpErrorCoderInstance: ErrorCoder = fromFunc(httpErrorCode);

/**
 * Returns the HTTP ErrorCoder.
 */
export function httpErrorCoder(): ErrorCoder {
  return httpErrorCoderInstance;
}
