/**
 * src/modules/users/operations/operation-outcome.ts
 *
 * WHY:
 * - Handlers keep error kinds distinguishable (AppError.code) right up to the
 *   public boundary; only renderOutcome() turns them into text.
 *
 * RENDERING:
 * - NOT_FOUND and UNKNOWN_OPERATION are ordinary negative answers: bare message.
 * - Every other failure is prefixed "Error: ".
 */

import type { AppError } from '../../../shared/errors/errors';

export type OperationOutcome =
  | { ok: true; message: string }
  | { ok: false; error: AppError };

export function succeeded(message: string): OperationOutcome {
  return { ok: true, message };
}

export function failed(error: AppError): OperationOutcome {
  return { ok: false, error };
}

export function renderOutcome(outcome: OperationOutcome): string {
  if (outcome.ok) return outcome.message;

  switch (outcome.error.code) {
    case 'NOT_FOUND':
    case 'UNKNOWN_OPERATION':
      return outcome.error.message;
    default:
      return `Error: ${outcome.error.message}`;
  }
}
