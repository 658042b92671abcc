/**
 * errcode/fs entry point
 *
 * Filesystem error classification.
 */
export {
  type SystemError,
  isSystemError,
  fileSystemErrorCode,
  fileSystemErrorCoder,
} from "./fs";
