/**
 * src/modules/chat/chat-session.ts
 *
 * WHY:
 * - Owns the conversation history for one console session.
 * - One turn = ask the model; if the reply is a database command, run it and
 *   ask the model again to explain the result.
 *
 * RULES:
 * - No console I/O here (the REPL renders ChatTurn).
 * - If the model call fails, history is rolled back to before the turn.
 * - Operation failures are NOT turn failures: the dispatcher returns text.
 */

import type { Logger } from '../../shared/logger/logger';
import type { ParamBag } from '../../shared/params/param-bag';
import type { ChatMessage, ChatModel } from './chat.types';
import type { DatabaseCommand } from './database-command';
import { parseDatabaseCommand } from './database-command';
import { SYSTEM_PROMPT, explainResultPrompt } from './system-prompt';

export type RunOperation = (operation: string, params: ParamBag) => Promise<string>;

export type ChatTurn =
  | {
      kind: 'reply';
      text: string;
      durationSeconds: number | null;
    }
  | {
      kind: 'operation';
      command: DatabaseCommand;
      result: string;
      explanation: string;
      durationSeconds: number | null;
    };

function toSeconds(ns: number | null): number | null {
  return ns === null ? null : ns / 1_000_000_000;
}

export class ChatSession {
  private readonly messages: ChatMessage[];

  constructor(
    private readonly deps: {
      model: ChatModel;
      runOperation: RunOperation;
      logger: Logger;
      systemPrompt?: string;
    },
  ) {
    this.messages = [{ role: 'system', content: deps.systemPrompt ?? SYSTEM_PROMPT }];
  }

  get modelName(): string {
    return this.deps.model.name;
  }

  get history(): readonly ChatMessage[] {
    return this.messages;
  }

  async send(text: string): Promise<ChatTurn> {
    const checkpoint = this.messages.length;

    try {
      return await this.runTurn(text);
    } catch (err: unknown) {
      this.messages.length = checkpoint;
      throw err;
    }
  }

  private async runTurn(text: string): Promise<ChatTurn> {
    this.messages.push({ role: 'user', content: text });

    const first = await this.deps.model.complete(this.messages);
    const durationSeconds = toSeconds(first.totalDurationNs);
    const command = parseDatabaseCommand(first.content);

    if (!command) {
      this.messages.push({ role: 'assistant', content: first.content });
      return { kind: 'reply', text: first.content, durationSeconds };
    }

    this.deps.logger.info('chat.command.detected', { operation: command.operation });

    const result = await this.deps.runOperation(command.operation, command.parameters);

    this.messages.push({ role: 'assistant', content: first.content });
    this.messages.push({ role: 'user', content: explainResultPrompt(result) });

    const second = await this.deps.model.complete(this.messages);
    this.messages.push({ role: 'assistant', content: second.content });

    return {
      kind: 'operation',
      command,
      result,
      explanation: second.content,
      durationSeconds,
    };
  }
}
