/**
 * src/modules/users/policies/user-params.policy.ts
 *
 * WHY:
 * - Centralizes the "what must be present" rules for user operations.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level UserErrors.
 */

import type { User, UserId, UserPatch } from '../user.types';
import { UserErrors } from '../user.errors';

export function requireNameAndEmail(
  name: string | undefined,
  email: string | undefined,
): { name: string; email: string } {
  if (name === undefined || email === undefined) {
    throw UserErrors.nameAndEmailRequired({ hasName: name !== undefined, hasEmail: email !== undefined });
  }
  return { name, email };
}

export function assertUpdateIdPresent(userId: UserId | undefined): asserts userId is UserId {
  if (userId === undefined) throw UserErrors.idRequiredForUpdate();
}

export function assertDeleteIdPresent(userId: UserId | undefined): asserts userId is UserId {
  if (userId === undefined) throw UserErrors.idRequiredForDelete();
}

export function assertUserFoundById(
  user: User | undefined,
  userId: UserId,
): asserts user is User {
  if (!user) throw UserErrors.userNotFoundById(userId);
}

export function assertUserFoundByName(
  user: User | undefined,
  fragment: string,
): asserts user is User {
  if (!user) throw UserErrors.userNotFoundByName(fragment);
}

export function assertPatchHasFields(patch: UserPatch): void {
  if (patch.name === undefined && patch.email === undefined) {
    throw UserErrors.noFieldsToUpdate();
  }
}

/**
 * Email must stay unique on update too. The holder may be the user being
 * updated (re-sending the current email is not a conflict).
 */
export function assertEmailFreeFor(
  holder: User | undefined,
  userId: UserId,
  email: string,
): void {
  if (holder && holder.id !== userId) throw UserErrors.emailTaken(email);
}
