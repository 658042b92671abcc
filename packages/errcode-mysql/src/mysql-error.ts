/**
 * Canonical codes for MySQL server errors raised through `mysql2`.
 *
 * Server error numbers come from the MySQL server error reference; the
 * table lives in `server-errors.json`, grouped by canonical code with the
 * symbolic `ER_*` name of each number.
 */

import type { QueryError } from "mysql2";
import { Code, findCause, fromFunc, isCodeName, type ErrorCoder } from "errcode";
import serverErrors from "./server-errors.json";

// =============================================================================
// Server error table
// =============================================================================

function buildTable(groups: Readonly<Record<string, Readonly<Record<string, string>>>>): ReadonlyMap<number, Code> {
  const table = new Map<number, Code>();
  for (const [name, numbers] of Object.entries(groups)) {
    if (!isCodeName(name)) {
      throw new TypeError(`server-errors.json: unknown code name ${name}`);
    }
    for (const errno of Object.keys(numbers)) {
      table.set(Number(errno), Code[name]);
    }
  }
  return table;
}

const serverErrorCodes = buildTable(serverErrors);

/**
 * Returns the canonical code for a MySQL server error number.
 */
export function fromServerErrorNumber(errno: number): Code {
  return serverErrorCodes.get(errno) ?? Code.Unknown;
}

// =============================================================================
// Capability
// =============================================================================

/**
 * Check if a value is a MySQL server error: a `mysql2` QueryError carrying
 * the server's error number and SQLSTATE.
 *
 * Connection-level errors (`ECONNREFUSED`, `PROTOCOL_CONNECTION_LOST`) carry
 * no SQLSTATE and are not server errors.
 */
export function isMysqlServerError(value: unknown): value is QueryError & { errno: number } {
  return (
    value instanceof Error &&
    "errno" in value &&
    typeof value.errno === "number" &&
    "sqlState" in value &&
    typeof value.sqlState === "string"
  );
}

// =============================================================================
// Coder
// =============================================================================

/**
 * Returns the code of the first MySQL server error in the chain.
 */
export function mysqlErrorCode(error: unknown): Code {
  if (error === null || error === undefined) {
    return Code.OK;
  }
  const serverError = findCause(error, isMysqlServerError);
  return serverError ? fromServerErrorNumber(serverError.errno) : Code.Unknown;
}

const mysqlErrorCoderInstance: ErrorCoder = fromFunc(mysqlErrorCode);

/**
 * Returns the MySQL ErrorCoder.
 */
export function mysqlErrorCoder(): ErrorCoder {
  return mysqlErrorCoderInstance;
}
