import { describe, it, expect } from 'vitest';

import {
  failed,
  renderOutcome,
  succeeded,
} from '../../../src/modules/users/operations/operation-outcome';
import { AppError } from '../../../src/shared/errors/errors';
import { UserErrors } from '../../../src/modules/users/user.errors';

describe('renderOutcome', () => {
  it('renders success as the bare message', () => {
    expect(renderOutcome(succeeded('User 1 updated successfully'))).toBe(
      'User 1 updated successfully',
    );
  });

  it('renders not-found and unknown-operation without a prefix', () => {
    expect(renderOutcome(failed(UserErrors.userNotFoundById(5)))).toBe('User with ID 5 not found');
    expect(renderOutcome(failed(UserErrors.unknownOperation('foo_bar')))).toBe(
      'Unknown operation: foo_bar',
    );
  });

  it('prefixes validation, conflict and internal failures with "Error: "', () => {
    expect(renderOutcome(failed(UserErrors.nameAndEmailRequired()))).toBe(
      'Error: Name and email are required',
    );
    expect(renderOutcome(failed(UserErrors.emailTaken('a@example.com')))).toBe(
      "Error: User with email 'a@example.com' already exists",
    );
    expect(renderOutcome(failed(AppError.internal('database is locked')))).toBe(
      'Error: database is locked',
    );
  });
});
