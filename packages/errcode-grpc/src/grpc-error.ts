import { status } from "@grpc/grpc-js";
import { Code, findCause, fromFunc, type ErrorCoder } from "errcode";

// =============================================================================
// Capability
// =============================================================================

/**
 * An error carrying a gRPC status: the shape of `ServiceError` from
 * `@grpc/grpc-js`, and of client errors built on it.
 *
 * `code` is optional because some clients attach metadata before a status
 * is known.
 */
export interface GrpcStatusError extends Error {
  code?: unknown;
  details?: unknown;
  metadata: unknown;
}

/**
 * Check if a value carries a gRPC status.
 */
export function isGrpcStatusError(value: unknown): value is GrpcStatusError {
  return value instanceof Error && "metadata" in value && "code" in value;
}

// =============================================================================
// Status table
// =============================================================================

const grpcStatusCodes: Readonly<Record<status, Code>> = {
  [status.OK]: Code.OK,
  [status.CANCELLED]: Code.Canceled,
  [status.UNKNOWN]: Code.Unknown,
  [status.INVALID_ARGUMENT]: Code.InvalidArgument,
  [status.DEADLINE_EXCEEDED]: Code.DeadlineExceeded,
  [status.NOT_FOUND]: Code.NotFound,
  [status.ALREADY_EXISTS]: Code.AlreadyExists,
  [status.PERMISSION_DENIED]: Code.PermissionDenied,
  [status.RESOURCE_EXHAUSTED]: Code.ResourceExhausted,
  [status.FAILED_PRECONDITION]: Code.FailedPrecondition,
  [status.ABORTED]: Code.Aborted,
  [status.OUT_OF_RANGE]: Code.OutOfRange,
  [status.UNIMPLEMENTED]: Code.Unimplemented,
  [status.INTERNAL]: Code.Internal,
  [status.UNAVAILABLE]: Code.Unavailable,
  [status.DATA_LOSS]: Code.DataLoss,
  [status.UNAUTHENTICATED]: Code.Unauthenticated,
};

function isStatus(value: unknown): value is status {
  return typeof value === "number" && Object.prototype.hasOwnProperty.call(grpcStatusCodes, value);
}

/**
 * Returns the canonical code for a gRPC status.
 */
export function fromGrpcStatus(grpcStatus: status): Code {
  return grpcStatusCodes[grpcStatus];
}

// =============================================================================
// Coder
// =============================================================================

/**
 * Returns the gRPC code of the first status error in the chain.
 *
 * A status error whose `code` is missing or not a gRPC status has no
 * sensible code and yields Unknown.
 */
export function grpcErrorCode(error: unknown): Code {
  if (error === null || error === undefined) {
    return Code.OK;
  }
  const statusError = findCause(error, isGrpcStatusError);
  if (statusError === undefined || !isStatus(statusError.code)) {
    return Code.Unknown;
  }
  return fromGrpcStatus(statusError.code);
}

const grpcErrorCoderInstance: ErrorCoder = fromFunc(grpcErrorCode);

/**
 * Returns the gRPC ErrorCoder.
 */
export function grpcErrorCoder(): ErrorCoder {
  return grpcErrorCoderInstance;
}
