import { GaxiosError } from "gaxios";
import {
  Code,
  ErrorCoders,
  findCause,
  fromFunc,
  fromHttpStatus,
  httpErrorCoder,
  type ErrorCoder,
} from "errcode";
import { grpcErrorCoder } from "errcode-grpc";

function isGaxiosError(value: unknown): value is GaxiosError {
  return value instanceof GaxiosError;
}

/**
 * Returns the code for the HTTP status of the first `GaxiosError` in the
 * chain that received a response.
 */
export function gaxiosErrorCode(error: unknown): Code {
  if (error === null || error === undefined) {
    return Code.OK;
  }
  const gaxiosError = findCause(error, isGaxiosError);
  const httpStatus = gaxiosError?.response?.status;
  return httpStatus === undefined ? Code.Unknown : fromHttpStatus(httpStatus);
}

// Errors from gRPC-based clients carry a full status and are preferred over
// REST errors, which only carry an HTTP status.
const googleApiErrorCoderInstance = new ErrorCoders([
  grpcErrorCoder(),
  httpErrorCoder(),
  fromFunc(gaxiosErrorCode),
]);

/**
 * Returns the Google API ErrorCoder.
 */
export function googleApiErrorCoder(): ErrorCoder {
  return googleApiErrorCoderInstance;
}

/**
 * Returns the code of a Google API client error.
 */
export function googleApiErrorCode(error: unknown): Code {
  return googleApiErrorCoderInstance.errorCode(error);
}
