/**
 * src/modules/chat/chat.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - One ChatSession per console session; create more for more conversations.
 */

import type { Logger } from '../../shared/logger/logger';
import type { ChatModel } from './chat.types';
import type { RunOperation } from './chat-session';
import { ChatSession } from './chat-session';

export type ChatModule = ReturnType<typeof createChatModule>;

export function createChatModule(deps: {
  model: ChatModel;
  runOperation: RunOperation;
  logger: Logger;
}) {
  return {
    createSession: (systemPrompt?: string) => new ChatSession({ ...deps, systemPrompt }),
  };
}
