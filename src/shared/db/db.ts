/**
 * src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - The Users table lives in a single SQLite file (or ':memory:' in tests).
 *
 * HOW TO USE:
 * - createDb(config.databaseFile) once for long-lived handles.
 * - Operation handlers never call this; they receive a StoreConnector
 *   (see store-connector.ts) and get a scoped connection per call.
 */

import SQLite from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';

import type { Database } from './schema';

export type Db = Kysely<Database>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both a plain handle and a transaction (`trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<Database>;

export function createDb(filename: string): Db {
  const database = new SQLite(filename);
  // Safe defaults for a single-writer console app.
  database.pragma('foreign_keys = ON');
  database.pragma('busy_timeout = 5000');

  return new Kysely<Database>({
    dialect: new SqliteDialect({ database }),
  });
}
