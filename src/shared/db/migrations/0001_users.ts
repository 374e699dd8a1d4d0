/**
 * src/shared/db/migrations/0001_users.ts
 *
 * WHY:
 * - The single record type: Users(Id, Name, Email, CreatedAt).
 * - AUTOINCREMENT so ids are monotonic and never reused after a delete.
 * - UNIQUE on Email backs up the create-time duplicate check.
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('Users')
    .ifNotExists()
    .addColumn('Id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('Name', 'text', (col) => col.notNull())
    .addColumn('Email', 'text', (col) => col.notNull().unique())
    .addColumn('CreatedAt', 'text', (col) => col.notNull())
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('Users').ifExists().execute();
}
