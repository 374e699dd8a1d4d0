/**
 * src/modules/users/operations/user-operation.dispatcher.ts
 *
 * WHY:
 * - Single entry point: (operation name, parameter bag) -> result text.
 * - Callers (chat loop, tests, future tools) only ever display the string.
 *
 * HOW IT WORKS:
 * - Resolve the alias to a canonical operation.
 * - Acquire a fresh store connection, run the flow inside ONE transaction,
 *   release the connection on every exit path.
 * - Everything thrown (AppError or not) becomes a failed OperationOutcome.
 *
 * RULES:
 * - handleUserOperation() never rejects.
 * - No state survives between calls.
 */

import type { StoreConnector } from '../../../shared/db/store-connector';
import { withConnection } from '../../../shared/db/store-connector';
import { toAppError } from '../../../shared/errors/errors';
import type { Logger } from '../../../shared/logger/logger';
import { logger as defaultLogger } from '../../../shared/logger/logger';
import { withOperationContext } from '../../../shared/logger/with-context';
import type { ParamBag } from '../../../shared/params/param-bag';
import { EMPTY_PARAMS } from '../../../shared/params/param-bag';

import { UserRepo } from '../dal/user.repo';
import { executeAddUserFlow } from '../flows/add-user-flow';
import { executeDeleteUserFlow } from '../flows/delete-user-flow';
import type { UserFlow } from '../flows/flow.types';
import { executeGetUserFlow } from '../flows/get-user-flow';
import { executeListUsersFlow } from '../flows/list-users-flow';
import { executeUpdateUserFlow } from '../flows/update-user-flow';
import { UserErrors } from '../user.errors';

import type { UserOperation } from './operation-name';
import { resolveUserOperation } from './operation-name';
import type { OperationOutcome } from './operation-outcome';
import { failed, renderOutcome, succeeded } from './operation-outcome';

const FLOWS: Record<UserOperation, UserFlow> = {
  add: executeAddUserFlow,
  get: executeGetUserFlow,
  list: executeListUsersFlow,
  update: executeUpdateUserFlow,
  delete: executeDeleteUserFlow,
};

export type UserDispatcherDeps = {
  connector: StoreConnector;
  logger?: Logger;
  now?: () => Date;
};

export async function executeUserOperation(
  deps: UserDispatcherDeps,
  operation: string,
  params: ParamBag = EMPTY_PARAMS,
): Promise<OperationOutcome> {
  const canonical = resolveUserOperation(operation);
  const log = withOperationContext(deps.logger ?? defaultLogger, { operation, canonical });

  if (canonical === null) {
    log.warn('users.op.unknown');
    return failed(UserErrors.unknownOperation(operation));
  }

  const flow = FLOWS[canonical];
  const now = deps.now ?? (() => new Date());

  log.debug('users.op.start', { paramKeys: Object.keys(params) });

  try {
    const message = await withConnection(deps.connector, (db) =>
      db.transaction().execute((trx) =>
        flow({ db: trx, userRepo: new UserRepo(trx), now }, params),
      ),
    );

    log.info('users.op.done');
    return succeeded(message);
  } catch (err: unknown) {
    const error = toAppError(err);

    if (error.code === 'INTERNAL') {
      log.error('users.op.failed', { err });
    } else {
      log.info('users.op.rejected', { code: error.code, message: error.message });
    }

    return failed(error);
  }
}

/**
 * Public boundary. Always resolves to display text.
 */
export async function handleUserOperation(
  deps: UserDispatcherDeps,
  operation: string,
  params: ParamBag = EMPTY_PARAMS,
): Promise<string> {
  const outcome = await executeUserOperation(deps, operation, params);
  return renderOutcome(outcome);
}
