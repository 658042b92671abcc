/**
 * errcode-grpc
 *
 * Canonical codes for gRPC status errors from `@grpc/grpc-js`.
 *
 * @example
 * ```typescript
 * import { compact, codedErrorCoder, contextErrorCoder } from 'errcode';
 * import { grpcErrorCoder } from 'errcode-grpc';
 *
 * const coder = compact(codedErrorCoder(), grpcErrorCoder(), contextErrorCoder());
 *
 * client.getUser({ id }, (error, user) => {
 *   if (coder.errorCode(error) === Code.NotFound) return respond(404);
 * });
 * ```
 */

export {
  type GrpcStatusError,
  isGrpcStatusError,
  fromGrpcStatus,
  grpcErrorCode,
  grpcErrorCoder,
} from "./grpc-error";
