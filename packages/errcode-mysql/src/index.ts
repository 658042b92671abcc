/**
 * errcode-mysql
 *
 * Canonical codes for MySQL server errors from `mysql2`.
 *
 * @example
 * ```typescript
 * import { Code } from 'errcode';
 * import { mysqlErrorCoder } from 'errcode-mysql';
 *
 * try {
 *   await pool.execute('INSERT INTO users (email) VALUES (?)', [email]);
 * } catch (error) {
 *   if (mysqlErrorCoder().errorCode(error) === Code.AlreadyExists) {
 *     return err('EMAIL_TAKEN');
 *   }
 *   throw error;
 * }
 * ```
 */

export {
  fromServerErrorNumber,
  isMysqlServerError,
  mysqlErrorCode,
  mysqlErrorCoder,
} from "./mysql-error";
