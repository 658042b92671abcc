/**
 * errcode-googleapis
 *
 * Canonical codes for errors from Google API clients: gRPC-based clients
 * (`ServiceError`-shaped errors) and REST clients built on `gaxios`.
 *
 * @example
 * ```typescript
 * import { compact, contextErrorCoder } from 'errcode';
 * import { googleApiErrorCoder } from 'errcode-googleapis';
 *
 * const coder = compact(googleApiErrorCoder(), contextErrorCoder());
 *
 * try {
 *   await storage.bucket('uploads').file(name).download();
 * } catch (error) {
 *   coder.errorCode(error); // Code.NotFound for a 404
 * }
 * ```
 */

export { gaxiosErrorCode, googleApiErrorCode, googleApiErrorCoder } from "./googleapi-error";
