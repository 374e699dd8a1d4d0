/**
 * src/modules/users/flows/get-user-flow.ts
 *
 * Lookup by `id` (exact) or `name` (first case-sensitive substring match).
 * When both are given, `id` wins.
 */

import type { ParamBag } from '../../../shared/params/param-bag';
import { optionalInteger, optionalString } from '../../../shared/params/param-bag';
import { findUserByNameFragment, getUserById } from '../queries/user.queries';
import { assertUserFoundById, assertUserFoundByName } from '../policies/user-params.policy';
import { formatUserLine } from '../user.format';
import { UserErrors } from '../user.errors';
import type { UserFlowDeps } from './flow.types';

export async function executeGetUserFlow(deps: UserFlowDeps, params: ParamBag): Promise<string> {
  const userId = optionalInteger(params, 'id');
  if (userId !== undefined) {
    const user = await getUserById(deps.db, userId);
    assertUserFoundById(user, userId);
    return formatUserLine(user);
  }

  const fragment = optionalString(params, 'name');
  if (fragment !== undefined) {
    const user = await findUserByNameFragment(deps.db, fragment);
    assertUserFoundByName(user, fragment);
    return formatUserLine(user);
  }

  throw UserErrors.lookupKeyRequired();
}
