/**
 * errcode
 *
 * Canonical status codes for errors from any source.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Code, compact, codedErrorCoder, contextErrorCoder, fileSystemErrorCoder } from 'errcode';
 *
 * const coder = compact(codedErrorCoder(), contextErrorCoder(), fileSystemErrorCoder());
 *
 * switch (coder.errorCode(error)) {
 *   case Code.NotFound: return res.status(404);
 *   case Code.Unavailable: return retryLater();
 * }
 * ```
 *
 * ## Entry Points
 *
 * **Core (this package):**
 * - `errcode` - Code, coders, composition, tagged errors
 * - `errcode/http` - HTTP status tagging and translation
 * - `errcode/context` - abort and timeout classification
 * - `errcode/fs` - filesystem error classification
 *
 * **Adapters:**
 * - `errcode-grpc` - gRPC status errors (`@grpc/grpc-js`)
 * - `errcode-mysql` - MySQL server errors (`mysql2`)
 * - `errcode-googleapis` - Google API client errors (`gaxios`)
 */

// =============================================================================
// Codes
// =============================================================================

export { Code, type CodeName, isCode, isCodeName, codeName } from "./code";

// =============================================================================
// Coders
// =============================================================================

export {
  type ErrorCoder,
  type ErrorCodeFn,
  fromFunc,
  ErrorCoders,
  errorCoders,
  compact,
} from "./coder";

// =============================================================================
// Tagged errors
// =============================================================================

export {
  type CanonicalCodeCarrier,
  isCanonicalCodeCarrier,
  CodedError,
  withCode,
  isCodedError,
  codedErrorCode,
  codedErrorCoder,
} from "./coded-error";

// =============================================================================
// Cause chain
// =============================================================================

export { causes, findCause } from "./chain";

// =============================================================================
// Built-in coders
// =============================================================================

export { contextErrorCode, contextErrorCoder } from "./context";
export { type SystemError, isSystemError, fileSystemErrorCode, fileSystemErrorCoder } from "./fs";
export {
  type HttpStatusCarrier,
  isHttpStatusCarrier,
  HttpError,
  withHttpStatus,
  isHttpError,
  fromHttpStatus,
  httpErrorCode,
  httpErrorCoder,
} from "./http";
