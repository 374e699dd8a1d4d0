/**
 * src/modules/users/user.format.ts
 *
 * Text rendering of users for operation results. Output is fed back to the
 * model verbatim, so the line shape is fixed:
 *   User: ID=<id>, Name=<name>, Email=<email>, Created=<yyyy-MM-dd>
 */

import type { User } from './user.types';

/** yyyy-MM-dd in UTC. */
export function formatDateUtc(date: Date): string {
  const yyyy = String(date.getUTCFullYear()).padStart(4, '0');
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

export function formatUserLine(user: User): string {
  return `User: ID=${user.id}, Name=${user.name}, Email=${user.email}, Created=${formatDateUtc(user.createdAt)}`;
}

export function formatUserList(users: readonly User[]): string {
  if (users.length === 0) return 'No users in database';

  const lines = users.map(formatUserLine).join('\n');
  return `Found ${users.length} user(s):\n${lines}`.trimEnd();
}
