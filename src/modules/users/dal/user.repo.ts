/**
 * src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (dispatcher owns tx).
 * - No AppError. Constraint violations propagate as raw SqliteErrors.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UsersPatch } from '../../../shared/db/schema';
import { getUserById } from '../queries/user.queries';
import { toUser } from '../user.mapper';
import type { User, UserId, UserPatch } from '../user.types';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Creates a new user. Email must be unique (enforced by DB constraint).
   * Id is assigned by SQLite (AUTOINCREMENT: monotonic, never reused).
   */
  async insertUser(params: { name: string; email: string; createdAt: Date }): Promise<User> {
    const row = await this.db
      .insertInto('Users')
      .values({
        Name: params.name,
        Email: params.email,
        CreatedAt: params.createdAt.toISOString(),
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toUser(row);
  }

  /**
   * Applies only the supplied fields. Returns undefined when no row has `userId`.
   */
  async updateUser(userId: UserId, patch: UserPatch): Promise<User | undefined> {
    const set: UsersPatch = {};
    if (patch.name !== undefined) set.Name = patch.name;
    if (patch.email !== undefined) set.Email = patch.email;

    // Nothing to write: report the stored state unchanged.
    if (Object.keys(set).length === 0) return getUserById(this.db, userId);

    const row = await this.db
      .updateTable('Users')
      .set(set)
      .where('Id', '=', userId)
      .returningAll()
      .executeTakeFirst();

    return row ? toUser(row) : undefined;
  }

  /**
   * Removes the row and returns its prior state, or undefined if none existed.
   */
  async deleteUser(userId: UserId): Promise<User | undefined> {
    const row = await this.db
      .deleteFrom('Users')
      .where('Id', '=', userId)
      .returningAll()
      .executeTakeFirst();

    return row ? toUser(row) : undefined;
  }
}
