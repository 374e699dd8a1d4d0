import type { ParamBag } from '../../../shared/params/param-bag';
import { listUsers } from '../queries/user.queries';
import { formatUserList } from '../user.format';
import type { UserFlowDeps } from './flow.types';

// Parameters are accepted and ignored.
export async function executeListUsersFlow(deps: UserFlowDeps, _params: ParamBag): Promise<string> {
  const users = await listUsers(deps.db);
  return formatUserList(users);
}
