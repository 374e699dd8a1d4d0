import type { UsersRow } from '../../shared/db/schema';
import type { User } from './user.types';

export function toUser(row: UsersRow): User {
  return {
    id: row.Id,
    name: row.Name,
    email: row.Email,
    createdAt: new Date(row.CreatedAt),
  };
}
