/**
 * src/shared/db/migrations/index.ts
 *
 * Static migration list. Keys sort in apply order.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_users';

export const MIGRATIONS: Record<string, Migration> = {
  '0001_users': m0001,
};
