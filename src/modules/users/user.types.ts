/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 *
 * RULES:
 * - Keep aligned with the Users table (shared/db/schema.ts).
 * - Avoid leaking DB naming (PascalCase columns) outside DAL/queries.
 */

export type UserId = number;

export type User = {
  id: UserId;
  name: string;
  email: string;
  createdAt: Date;
};

/** Fields an update may change. Absent keys keep their stored value. */
export type UserPatch = {
  name?: string;
  email?: string;
};
