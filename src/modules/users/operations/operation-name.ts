/**
 * src/modules/users/operations/operation-name.ts
 *
 * Operation names are case-insensitive; several aliases map to each
 * canonical operation.
 */

export const USER_OPERATIONS = ['add', 'get', 'list', 'update', 'delete'] as const;

export type UserOperation = (typeof USER_OPERATIONS)[number];

export const USER_OPERATION_ALIASES: Readonly<Record<string, UserOperation>> = {
  add_user: 'add',
  create_user: 'add',
  get_user: 'get',
  find_user: 'get',
  list_users: 'list',
  get_all_users: 'list',
  update_user: 'update',
  delete_user: 'delete',
};

export function resolveUserOperation(name: string): UserOperation | null {
  const key = name.toLowerCase();
  if (!Object.prototype.hasOwnProperty.call(USER_OPERATION_ALIASES, key)) return null;
  return USER_OPERATION_ALIASES[key] ?? null;
}
