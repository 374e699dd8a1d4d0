import { describe, it, expect } from 'vitest';

import { ChatSession } from '../../src/modules/chat/chat-session';
import { SYSTEM_PROMPT } from '../../src/modules/chat/system-prompt';
import { logger } from '../../src/shared/logger/logger';
import { buildTestStore } from '../helpers/build-test-store';
import { FakeChatModel } from '../helpers/fake-chat-model';

const ADD_ADAM =
  'Sure! {"action":"database_operation","operation":"add_user","parameters":{"name":"Adam","email":"adam@test.com"}}';

describe('ChatSession', () => {
  it('returns plain replies and records them in history', async () => {
    const model = new FakeChatModel(['Hello! How can I help?']);
    const session = new ChatSession({
      model,
      runOperation: () => Promise.reject(new Error('should not run')),
      logger,
    });

    const turn = await session.send('hi');

    expect(turn).toEqual({ kind: 'reply', text: 'Hello! How can I help?', durationSeconds: null });
    expect(session.history).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Hello! How can I help?' },
    ]);
  });

  it('runs a database command and asks the model to explain the result', async () => {
    const store = await buildTestStore();
    try {
      const model = new FakeChatModel([
        { content: ADD_ADAM, totalDurationNs: 2_500_000_000 },
        'Adam has been added with ID 1.',
      ]);
      const session = new ChatSession({ model, runOperation: store.handle, logger });

      const turn = await session.send('add user named Adam with email adam@test.com');

      expect(turn).toEqual({
        kind: 'operation',
        command: { operation: 'add_user', parameters: { name: 'Adam', email: 'adam@test.com' } },
        result: "User 'Adam' added successfully with ID 1",
        explanation: 'Adam has been added with ID 1.',
        durationSeconds: 2.5,
      });

      expect(model.calls).toHaveLength(2);
      expect(model.calls[1]?.[3]).toEqual({
        role: 'user',
        content:
          "The database operation returned: User 'Adam' added successfully with ID 1. Please explain this result to the user in natural language.",
      });
      expect(session.history).toHaveLength(5);
      expect(await store.countUsers()).toBe(1);
    } finally {
      await store.close();
    }
  });

  it('passes operation errors back to the model as text', async () => {
    const store = await buildTestStore();
    try {
      const model = new FakeChatModel([
        '{"action":"database_operation","operation":"get_user","parameters":{"id":9}}',
        'There is no user with ID 9.',
      ]);
      const session = new ChatSession({ model, runOperation: store.handle, logger });

      const turn = await session.send('find user 9');

      expect(turn.kind).toBe('operation');
      if (turn.kind === 'operation') {
        expect(turn.result).toBe('User with ID 9 not found');
      }
    } finally {
      await store.close();
    }
  });

  it('rolls history back when the model call fails', async () => {
    const model = new FakeChatModel([new Error('connection refused')]);
    const session = new ChatSession({
      model,
      runOperation: () => Promise.resolve('unused'),
      logger,
    });

    await expect(session.send('hi')).rejects.toThrow('connection refused');
    expect(session.history).toHaveLength(1);
  });
});
