/**
 * src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /flows or /dal.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export { handleUserOperation, executeUserOperation } from './operations/user-operation.dispatcher';
export type { OperationOutcome } from './operations/operation-outcome';
export type { User } from './user.types';
