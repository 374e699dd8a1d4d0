/**
 * src/modules/users/flows/add-user-flow.ts
 *
 * RULES:
 * - Duplicate check and insert run in the caller's transaction.
 * - The UNIQUE index is the last line: a violation maps to the same conflict.
 */

import type { ParamBag } from '../../../shared/params/param-bag';
import { optionalString } from '../../../shared/params/param-bag';
import { isUniqueViolation } from '../../../shared/db/sqlite-errors';
import { getUserByEmail } from '../queries/user.queries';
import { requireNameAndEmail } from '../policies/user-params.policy';
import { UserErrors } from '../user.errors';
import type { User } from '../user.types';
import type { UserFlowDeps } from './flow.types';

export async function executeAddUserFlow(deps: UserFlowDeps, params: ParamBag): Promise<string> {
  const { name, email } = requireNameAndEmail(
    optionalString(params, 'name'),
    optionalString(params, 'email'),
  );

  const existing = await getUserByEmail(deps.db, email);
  if (existing) throw UserErrors.emailTaken(email);

  let user: User;
  try {
    user = await deps.userRepo.insertUser({ name, email, createdAt: deps.now() });
  } catch (err: unknown) {
    if (isUniqueViolation(err)) throw UserErrors.emailTaken(email);
    throw err;
  }

  return `User '${user.name}' added successfully with ID ${user.id}`;
}
