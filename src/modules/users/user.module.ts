/**
 * src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - The chat layer only sees `handle(operation, params)`.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { StoreConnector } from '../../shared/db/store-connector';
import type { Logger } from '../../shared/logger/logger';
import type { ParamBag } from '../../shared/params/param-bag';
import { handleUserOperation } from './operations/user-operation.dispatcher';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  connector: StoreConnector;
  logger: Logger;
  now?: () => Date;
}) {
  return {
    handle: (operation: string, params?: ParamBag) => handleUserOperation(deps, operation, params),
  };
}
