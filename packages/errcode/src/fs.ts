/**
 * errcode/fs
 *
 * Classify Node.js filesystem errors by their system error code.
 */

import { Code } from "./code";
import { findCause } from "./chain";
import { fromFunc, type ErrorCoder } from "./coder";

/**
 * The shape of a Node.js system error (`NodeJS.ErrnoException`).
 */
export interface SystemError {
  readonly code: string;
  readonly errno?: number;
  readonly syscall?: string;
  readonly path?: string;
}

/**
 * Check if a value looks like a Node.js system error.
 */
export function isSystemError(value: unknown): value is SystemError {
  return (
    typeof value === "object" &&
    value !== null &&
    "code" in value &&
    typeof value.code === "string"
  );
}

// Checked in order across the whole chain
const families: ReadonlyArray<readonly [Code, ReadonlySet<string>]> = [
  [Code.AlreadyExists, new Set(["EEXIST", "ENOTEMPTY"])],
  [Code.NotFound, new Set(["ENOENT"])],
  [Code.PermissionDenied, new Set(["EACCES", "EPERM"])],
  [Code.InvalidArgument, new Set(["EINVAL"])],
];

/**
 * Returns the code of a filesystem error.
 *
 * | System code            | Code             |
 * |------------------------|------------------|
 * | `EEXIST`, `ENOTEMPTY`  | AlreadyExists    |
 * | `ENOENT`               | NotFound         |
 * | `EACCES`, `EPERM`      | PermissionDenied |
 * | `EINVAL`               | InvalidArgument  |
 */
export function fileSystemErrorCode(error: unknown): Code {
  if (error === null || error === undefined) {
    return Code.OK;
  }
  for (const [code, systemCodes] of families) {
    const match = findCause(
      error,
      (value): value is SystemError => isSystemError(value) && systemCodes.has(value.code)
    );
    if (match !== undefined) return code;
  }
  return Code.Unknown;
}

const fileSystemErrorCoderInstance: ErrorCoder = fromFunc(fileSystemErrorCode);

/**
 * Returns an ErrorCoder that handles filesystem errors.
 */
export function fileSystemErrorCoder(): ErrorCoder {
  return fileSystemErrorCoderInstance;
}
