import type { ParamBag } from '../../../shared/params/param-bag';
import { optionalInteger } from '../../../shared/params/param-bag';
import { assertDeleteIdPresent, assertUserFoundById } from '../policies/user-params.policy';
import type { UserFlowDeps } from './flow.types';

export async function executeDeleteUserFlow(
  deps: UserFlowDeps,
  params: ParamBag,
): Promise<string> {
  const userId = optionalInteger(params, 'id');
  assertDeleteIdPresent(userId);

  const deleted = await deps.userRepo.deleteUser(userId);
  assertUserFoundById(deleted, userId);

  return `User '${deleted.name}' (ID=${deleted.id}) deleted successfully`;
}
