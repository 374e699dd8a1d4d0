/**
 * src/shared/db/migrator.ts
 *
 * WHY:
 * - One migration path for startup, the db:migrate script and tests.
 * - Migrations are imported statically (./migrations/index.ts), so the same
 *   code works under tsx, Vitest and ':memory:' databases.
 *
 * RULES:
 * - Throws on failure; callers decide whether to exit.
 */

import { Migrator } from 'kysely';

import type { Db } from './db';
import type { Logger } from '../logger/logger';
import { MIGRATIONS } from './migrations';

export async function migrateToLatest(db: Db, logger: Logger): Promise<void> {
  const migrator = new Migrator({
    db,
    provider: {
      getMigrations: () => Promise.resolve(MIGRATIONS),
    },
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migration.error', { migration: r.migrationName });
  });

  if (error) {
    logger.error('db.migration.failed', { err: error });
    throw error instanceof Error ? error : new Error(String(error));
  }
}
