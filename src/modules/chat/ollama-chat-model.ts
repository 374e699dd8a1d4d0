/**
 * src/modules/chat/ollama-chat-model.ts
 *
 * WHY:
 * - Talks to a local Ollama server: POST /api/chat, non-streaming.
 * - Response shape is validated with Zod; nothing downstream trusts raw JSON.
 *
 * HOW TO USE:
 * - new OllamaChatModel({ baseUrl, model, timeoutMs, logger })
 * - Tests inject `fetchFn` instead of touching the network.
 */

import { z } from 'zod';

import type { Logger } from '../../shared/logger/logger';
import type { ChatCompletion, ChatMessage, ChatModel } from './chat.types';
import { ChatErrors } from './chat.errors';

const OllamaChatResponseSchema = z.object({
  message: z.object({
    role: z.string().optional(),
    content: z.string(),
  }),
  total_duration: z.number().nonnegative().optional(),
});

export type OllamaChatModelOptions = {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  logger: Logger;
  fetchFn?: typeof fetch;
};

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

export class OllamaChatModel implements ChatModel {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly opts: OllamaChatModelOptions) {
    this.fetchFn = opts.fetchFn ?? ((input, init) => fetch(input, init));
  }

  get name(): string {
    return this.opts.model;
  }

  async complete(messages: readonly ChatMessage[]): Promise<ChatCompletion> {
    const url = `${this.opts.baseUrl}/api/chat`;

    this.opts.logger.debug('chat.model.request', {
      model: this.opts.model,
      messageCount: messages.length,
    });

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ model: this.opts.model, messages, stream: false }),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (err: unknown) {
      if (isTimeout(err)) throw ChatErrors.timedOut(this.opts.baseUrl, this.opts.timeoutMs, err);
      throw ChatErrors.unreachable(this.opts.baseUrl, this.opts.model, err);
    }

    if (!response.ok) {
      throw ChatErrors.badStatus(response.status, await response.text());
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw ChatErrors.badResponse('body is not JSON');
    }

    const parsed = OllamaChatResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw ChatErrors.badResponse(parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', '));
    }

    this.opts.logger.debug('chat.model.response', {
      model: this.opts.model,
      totalDurationNs: parsed.data.total_duration ?? null,
    });

    return {
      content: parsed.data.message.content,
      totalDurationNs: parsed.data.total_duration ?? null,
    };
  }
}
