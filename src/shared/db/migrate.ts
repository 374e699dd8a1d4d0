/**
 * src/shared/db/migrate.ts
 *
 * WHY:
 * - Create/upgrade the SQLite schema without starting the chat loop.
 *
 * HOW TO USE:
 * - npm run db:migrate
 * - `npm start` also migrates on boot, so this is optional in dev.
 */

import { createDb } from './db';
import { migrateToLatest } from './migrator';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseFile);

  try {
    await migrateToLatest(db, logger);
    logger.info('db.migrations.up_to_date', { databaseFile: config.databaseFile });
  } finally {
    await db.destroy();
  }
}

void runMigrations().catch((err: unknown) => {
  logger.error('db.migrations.fatal', { err });
  process.exitCode = 1;
});
