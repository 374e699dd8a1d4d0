/**
 * src/modules/users/flows/update-user-flow.ts
 *
 * Check order: id present -> user exists -> at least one field -> email free.
 *
 * RULES:
 * - Only supplied fields change.
 * - Email uniqueness is enforced here as well as on create.
 */

import type { ParamBag } from '../../../shared/params/param-bag';
import { optionalInteger, optionalString } from '../../../shared/params/param-bag';
import { isUniqueViolation } from '../../../shared/db/sqlite-errors';
import { getUserByEmail, getUserById } from '../queries/user.queries';
import {
  assertEmailFreeFor,
  assertPatchHasFields,
  assertUpdateIdPresent,
  assertUserFoundById,
} from '../policies/user-params.policy';
import { UserErrors } from '../user.errors';
import type { User, UserPatch } from '../user.types';
import type { UserFlowDeps } from './flow.types';

export async function executeUpdateUserFlow(
  deps: UserFlowDeps,
  params: ParamBag,
): Promise<string> {
  const userId = optionalInteger(params, 'id');
  assertUpdateIdPresent(userId);

  const current = await getUserById(deps.db, userId);
  assertUserFoundById(current, userId);

  const patch: UserPatch = {
    name: optionalString(params, 'name'),
    email: optionalString(params, 'email'),
  };
  assertPatchHasFields(patch);

  if (patch.email !== undefined && patch.email !== current.email) {
    const holder = await getUserByEmail(deps.db, patch.email);
    assertEmailFreeFor(holder, userId, patch.email);
  }

  let updated: User | undefined;
  try {
    updated = await deps.userRepo.updateUser(userId, patch);
  } catch (err: unknown) {
    if (isUniqueViolation(err) && patch.email !== undefined) throw UserErrors.emailTaken(patch.email);
    throw err;
  }
  assertUserFoundById(updated, userId);

  return `User ${updated.id} updated successfully`;
}
