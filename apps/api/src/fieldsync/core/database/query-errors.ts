import { QueryFailedError } from 'typeorm';

/** PostgreSQL unique_violation SQLSTATE. */
const PG_UNIQUE_VIOLATION = '23505';

/** better-sqlite3 extended result code. */
const SQLITE_UNIQUE_VIOLATION = 'SQLITE_CONSTRAINT_UNIQUE';

/**
 * True when a TypeORM query failed on a unique index, on either supported
 * driver.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }

  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) {
    return false;
  }

  const code = 'code' in driverError ? driverError.code : undefined;
  return code === PG_UNIQUE_VIOLATION || code === SQLITE_UNIQUE_VIOLATION;
}
