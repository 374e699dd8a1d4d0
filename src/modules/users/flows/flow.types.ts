import type { DbExecutor } from '../../../shared/db/db';
import type { ParamBag } from '../../../shared/params/param-bag';
import type { UserRepo } from '../dal/user.repo';

/**
 * Everything a flow may touch. `db` and `userRepo` are bound to the
 * transaction the dispatcher opened for this call.
 */
export type UserFlowDeps = {
  db: DbExecutor;
  userRepo: UserRepo;
  now: () => Date;
};

export type UserFlow = (deps: UserFlowDeps, params: ParamBag) => Promise<string>;
