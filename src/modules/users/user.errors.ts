/**
 * src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics and the exact wording callers see.
 * - Prevents shared/errors/errors.ts from becoming a giant god-file.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Messages carry no "Error: " prefix; rendering adds it (see operations/operation-outcome.ts).
 */

import { AppError, type AppErrorMeta } from '../../shared/errors/errors';
import type { UserId } from './user.types';

export const UserErrors = {
  nameAndEmailRequired(meta?: AppErrorMeta) {
    return AppError.validationError('Name and email are required', meta);
  },

  lookupKeyRequired(meta?: AppErrorMeta) {
    return AppError.validationError("Please provide either 'id' or 'name' to find a user", meta);
  },

  idRequiredForUpdate(meta?: AppErrorMeta) {
    return AppError.validationError('User ID is required for update', meta);
  },

  idRequiredForDelete(meta?: AppErrorMeta) {
    return AppError.validationError('User ID is required for deletion', meta);
  },

  noFieldsToUpdate(meta?: AppErrorMeta) {
    return AppError.validationError("No fields to update. Provide 'name' or 'email'", meta);
  },

  userNotFoundById(userId: UserId) {
    return AppError.notFound(`User with ID ${userId} not found`, { userId });
  },

  userNotFoundByName(fragment: string) {
    return AppError.notFound(`User with name '${fragment}' not found`, { fragment });
  },

  emailTaken(email: string) {
    return AppError.conflict(`User with email '${email}' already exists`, { email });
  },

  unknownOperation(operation: string) {
    return AppError.unknownOperation(`Unknown operation: ${operation}`, { operation });
  },
} as const;
