import { QueryFailedError } from 'typeorm';

// postgres SQLSTATE and better-sqlite3 result code
const UNIQUE_VIOLATION_CODES: ReadonlySet<unknown> = new Set(['23505', 'SQLITE_CONSTRAINT_UNIQUE']);

/** True when a write lost a race against a unique index. */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}
