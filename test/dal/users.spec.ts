import { describe, it, expect } from 'vitest';

import { buildTestStore } from '../helpers/build-test-store';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import {
  selectFirstUserByNameFragmentSql,
  selectUserByEmailSql,
  selectUserByIdSql,
} from '../../src/modules/users/dal/user.query-sql';
import { getUserById, listUsers } from '../../src/modules/users/queries/user.queries';
import { isUniqueViolation } from '../../src/shared/db/sqlite-errors';

const createdAt = new Date('2024-01-15T08:00:00.000Z');

describe('users DAL', () => {
  it('insertUser assigns ids and stores CreatedAt as ISO-8601', async () => {
    const store = await buildTestStore();
    try {
      const repo = new UserRepo(store.db);
      const alice = await repo.insertUser({ name: 'Alice', email: 'alice@example.com', createdAt });
      const bob = await repo.insertUser({ name: 'Bob', email: 'bob@example.com', createdAt });

      expect(alice.id).toBe(1);
      expect(bob.id).toBe(2);
      expect(alice.createdAt.toISOString()).toBe('2024-01-15T08:00:00.000Z');

      const row = await selectUserByIdSql(store.db, bob.id);
      expect(row).toEqual({
        Id: 2,
        Name: 'Bob',
        Email: 'bob@example.com',
        CreatedAt: '2024-01-15T08:00:00.000Z',
      });
    } finally {
      await store.close();
    }
  });

  it('rejects a duplicate email with a unique violation', async () => {
    const store = await buildTestStore();
    try {
      const repo = new UserRepo(store.db);
      await repo.insertUser({ name: 'Alice', email: 'alice@example.com', createdAt });

      const err = await repo
        .insertUser({ name: 'Alice Again', email: 'alice@example.com', createdAt })
        .then(
          () => null,
          (e: unknown) => e,
        );

      expect(isUniqueViolation(err)).toBe(true);
    } finally {
      await store.close();
    }
  });

  it('selectUserByEmailSql matches exactly', async () => {
    const store = await buildTestStore();
    try {
      const repo = new UserRepo(store.db);
      await repo.insertUser({ name: 'Alice', email: 'alice@example.com', createdAt });

      expect(await selectUserByEmailSql(store.db, 'alice@example.com')).toBeDefined();
      expect(await selectUserByEmailSql(store.db, 'ALICE@example.com')).toBeUndefined();
    } finally {
      await store.close();
    }
  });

  it('name fragment lookup is case-sensitive, literal and returns the lowest id', async () => {
    const store = await buildTestStore();
    try {
      const repo = new UserRepo(store.db);
      await repo.insertUser({ name: 'Alice Smith', email: 'alice@example.com', createdAt });
      await repo.insertUser({ name: 'Bob Smith', email: 'bob@example.com', createdAt });

      const first = await selectFirstUserByNameFragmentSql(store.db, 'Smith');
      expect(first?.Name).toBe('Alice Smith');

      expect(await selectFirstUserByNameFragmentSql(store.db, 'smith')).toBeUndefined();
      expect(await selectFirstUserByNameFragmentSql(store.db, '%')).toBeUndefined();
    } finally {
      await store.close();
    }
  });

  it('updateUser applies only supplied fields', async () => {
    const store = await buildTestStore();
    try {
      const repo = new UserRepo(store.db);
      const user = await repo.insertUser({ name: 'Alice', email: 'alice@example.com', createdAt });

      const updated = await repo.updateUser(user.id, { email: 'alice@new.example.com' });

      expect(updated).toEqual({
        id: user.id,
        name: 'Alice',
        email: 'alice@new.example.com',
        createdAt,
      });
    } finally {
      await store.close();
    }
  });

  it('updateUser with an empty patch returns the stored user', async () => {
    const store = await buildTestStore();
    try {
      const repo = new UserRepo(store.db);
      const user = await repo.insertUser({ name: 'Alice', email: 'alice@example.com', createdAt });

      expect(await repo.updateUser(user.id, {})).toEqual(user);
      expect(await repo.updateUser(999, {})).toBeUndefined();
    } finally {
      await store.close();
    }
  });

  it('updateUser returns undefined for an unknown id', async () => {
    const store = await buildTestStore();
    try {
      const repo = new UserRepo(store.db);
      expect(await repo.updateUser(5, { name: 'Nobody' })).toBeUndefined();
    } finally {
      await store.close();
    }
  });

  it('deleteUser returns the prior state once', async () => {
    const store = await buildTestStore();
    try {
      const repo = new UserRepo(store.db);
      const user = await repo.insertUser({ name: 'Alice', email: 'alice@example.com', createdAt });

      expect(await repo.deleteUser(user.id)).toEqual(user);
      expect(await repo.deleteUser(user.id)).toBeUndefined();
      expect(await getUserById(store.db, user.id)).toBeUndefined();
    } finally {
      await store.close();
    }
  });

  it('listUsers returns a fresh snapshot in id order', async () => {
    const store = await buildTestStore();
    try {
      const repo = new UserRepo(store.db);
      await repo.insertUser({ name: 'Carol', email: 'carol@example.com', createdAt });
      await repo.insertUser({ name: 'Alice', email: 'alice@example.com', createdAt });

      const before = await listUsers(store.db);
      await repo.insertUser({ name: 'Bob', email: 'bob@example.com', createdAt });
      const after = await listUsers(store.db);

      expect(before.map((u) => u.name)).toEqual(['Carol', 'Alice']);
      expect(after.map((u) => u.name)).toEqual(['Carol', 'Alice', 'Bob']);
    } finally {
      await store.close();
    }
  });

  it('withDb binds the repo to a transaction that can roll back', async () => {
    const store = await buildTestStore();
    try {
      const repo = new UserRepo(store.db);

      await store.db
        .transaction()
        .execute(async (trx) => {
          await repo.withDb(trx).insertUser({ name: 'Ghost', email: 'ghost@example.com', createdAt });
          throw new Error('rollback');
        })
        .catch((err: unknown) => {
          expect(err).toBeInstanceOf(Error);
        });

      expect(await listUsers(store.db)).toEqual([]);
    } finally {
      await store.close();
    }
  });
});
