import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { buildConfig } from '../../src/app/config';
import { buildDeps } from '../../src/app/di';
import { FileStoreConnector, withConnection } from '../../src/shared/db/store-connector';
import { FakeChatModel } from '../helpers/fake-chat-model';
import { TEST_NOW } from '../helpers/build-test-store';

describe('file-backed store', () => {
  let dir: string;
  let databaseFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'llama-users-'));
    databaseFile = join(dir, 'users.db');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function configFor(file: string) {
    return buildConfig({ NODE_ENV: 'test', DATABASE_FILE: file });
  }

  it('uses a per-call connector and persists writes between calls', async () => {
    const deps = await buildDeps(configFor(databaseFile), {
      model: new FakeChatModel([]),
      now: () => TEST_NOW,
    });
    try {
      expect(deps.connector).toBeInstanceOf(FileStoreConnector);

      expect(await deps.users.handle('add_user', { name: 'Ann', email: 'ann@example.com' })).toBe(
        "User 'Ann' added successfully with ID 1",
      );
      expect(await deps.users.handle('update_user', { id: 1, name: 'Anna' })).toBe(
        'User 1 updated successfully',
      );
      expect(await deps.users.handle('get_user', { id: 1 })).toBe(
        'User: ID=1, Name=Anna, Email=ann@example.com, Created=2024-03-05',
      );
    } finally {
      await deps.close();
    }
  });

  it('a second startup on the same file sees earlier data', async () => {
    const first = await buildDeps(configFor(databaseFile), {
      model: new FakeChatModel([]),
      now: () => TEST_NOW,
    });
    try {
      await first.users.handle('add_user', { name: 'Ben', email: 'ben@example.com' });
    } finally {
      await first.close();
    }

    const second = await buildDeps(configFor(databaseFile), {
      model: new FakeChatModel([]),
      now: () => TEST_NOW,
    });
    try {
      expect(await second.users.handle('list_users')).toBe(
        'Found 1 user(s):\nUser: ID=1, Name=Ben, Email=ben@example.com, Created=2024-03-05',
      );
      expect(await second.users.handle('add_user', { name: 'Ben', email: 'ben@example.com' })).toBe(
        "Error: User with email 'ben@example.com' already exists",
      );
    } finally {
      await second.close();
    }
  });

  it('FileStoreConnector destroys its handle on release', async () => {
    const deps = await buildDeps(configFor(databaseFile), { model: new FakeChatModel([]) });
    await deps.close();

    const connector = new FileStoreConnector(databaseFile);
    const count = await withConnection(connector, async (db) => {
      const rows = await db.selectFrom('Users').select('Id').execute();
      return rows.length;
    });
    expect(count).toBe(0);

    const conn = await connector.connect();
    await conn.release();
    await expect(conn.db.selectFrom('Users').select('Id').execute()).rejects.toBeInstanceOf(Error);
  });
});
