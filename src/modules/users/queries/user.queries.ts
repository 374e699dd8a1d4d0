/**
 * src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectAllUsersSql,
  selectFirstUserByNameFragmentSql,
  selectUserByEmailSql,
  selectUserByIdSql,
} from '../dal/user.query-sql';
import { toUser } from '../user.mapper';
import type { User, UserId } from '../user.types';

export async function getUserById(db: DbExecutor, userId: UserId): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUser(row);
}

export async function findUserByNameFragment(
  db: DbExecutor,
  fragment: string,
): Promise<User | undefined> {
  const row = await selectFirstUserByNameFragmentSql(db, fragment);
  if (!row) return undefined;
  return toUser(row);
}

/** Fresh snapshot on every call. */
export async function listUsers(db: DbExecutor): Promise<User[]> {
  const rows = await selectAllUsersSql(db);
  return rows.map(toUser);
}
