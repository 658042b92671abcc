/**
 * errcode/context entry point
 *
 * Abort and timeout classification.
 */
export { contextErrorCode, contextErrorCoder } from "./context";
