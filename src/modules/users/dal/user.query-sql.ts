/**
 * src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 * - "Natural order" is Id ascending everywhere.
 */

import { sql } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { UsersRow } from '../../../shared/db/schema';

export type UserRow = UsersRow;

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db.selectFrom('Users').selectAll().where('Id', '=', userId).executeTakeFirst();
}

/** Exact, case-sensitive email match. */
export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('Users').selectAll().where('Email', '=', email).executeTakeFirst();
}

/**
 * First row whose Name contains `fragment`.
 * instr() rather than LIKE: LIKE is case-insensitive for ASCII in SQLite
 * and would also treat % and _ in the fragment as wildcards.
 */
export async function selectFirstUserByNameFragmentSql(
  db: DbExecutor,
  fragment: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('Users')
    .selectAll()
    .where(sql<number>`instr(${sql.ref('Name')}, ${fragment})`, '>', 0)
    .orderBy('Id', 'asc')
    .limit(1)
    .executeTakeFirst();
}

export async function selectAllUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db.selectFrom('Users').selectAll().orderBy('Id', 'asc').execute();
}
