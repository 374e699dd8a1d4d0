/**
 * src/shared/db/store-connector.ts
 *
 * WHY:
 * - Operations must not hold a database handle across calls.
 *   Each call acquires a connection, works inside it, and releases it.
 * - Connectors are injected, so nothing reaches for an ambient global handle.
 *
 * HOW TO USE:
 * - Production: new FileStoreConnector(config.databaseFile)
 * - Tests / ':memory:': new SharedStoreConnector(db)
 * - withConnection(connector, (db) => ...) guarantees release on every exit path.
 */

import { createDb } from './db';
import type { Db, DbExecutor } from './db';

export type StoreConnection = {
  db: DbExecutor;
  release: () => Promise<void>;
};

export interface StoreConnector {
  connect(): Promise<StoreConnection>;
}

/**
 * Opens a fresh SQLite handle per connect() and destroys it on release.
 * Schema must already exist (run migrations once at startup).
 */
export class FileStoreConnector implements StoreConnector {
  constructor(private readonly filename: string) {}

  connect(): Promise<StoreConnection> {
    const db = createDb(this.filename);
    return Promise.resolve({
      db,
      release: () => db.destroy(),
    });
  }
}

/**
 * Hands out one long-lived handle. Release is a no-op; the owner destroys it.
 * Required for ':memory:' databases, where a new handle would be a new, empty database.
 */
export class SharedStoreConnector implements StoreConnector {
  constructor(private readonly db: Db) {}

  connect(): Promise<StoreConnection> {
    return Promise.resolve({
      db: this.db,
      release: () => Promise.resolve(),
    });
  }
}

export async function withConnection<T>(
  connector: StoreConnector,
  fn: (db: DbExecutor) => Promise<T>,
): Promise<T> {
  const conn = await connector.connect();
  try {
    return await fn(conn.db);
  } finally {
    await conn.release();
  }
}
