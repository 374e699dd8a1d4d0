/**
 * src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs one interface describing every table it may touch.
 * - Mirrors the migrations in ./migrations. Change both together.
 *
 * RULES:
 * - Column names follow the persisted layout (PascalCase), not domain naming.
 * - Domain types live in the modules; only DAL files import from here.
 */

import type { Generated, Insertable, Selectable, Updateable } from 'kysely';

export interface UsersTable {
  Id: Generated<number>;
  Name: string;
  Email: string;
  /** ISO-8601 UTC timestamp. */
  CreatedAt: string;
}

export interface Database {
  Users: UsersTable;
}

export type UsersRow = Selectable<UsersTable>;
export type NewUsersRow = Insertable<UsersTable>;
export type UsersPatch = Updateable<UsersTable>;
