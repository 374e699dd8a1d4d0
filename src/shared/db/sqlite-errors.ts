/**
 * src/shared/db/sqlite-errors.ts
 *
 * better-sqlite3 raises SqliteError with a string `code` (e.g. SQLITE_CONSTRAINT_UNIQUE).
 * DAL code rethrows these untouched; flows use the helpers below to map them.
 */

export function sqliteErrorCode(err: unknown): string | null {
  if (!(err instanceof Error) || !('code' in err)) return null;
  return typeof err.code === 'string' ? err.code : null;
}

export function isUniqueViolation(err: unknown): boolean {
  return sqliteErrorCode(err) === 'SQLITE_CONSTRAINT_UNIQUE';
}
