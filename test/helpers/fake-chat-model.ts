import type { ChatCompletion, ChatMessage, ChatModel } from '../../src/modules/chat/chat.types';

type ScriptedReply = string | ChatCompletion | Error;

/**
 * In-process stand-in for the model server. Replies are consumed in order;
 * an Error entry is thrown instead of returned.
 */
export class FakeChatModel implements ChatModel {
  readonly calls: ChatMessage[][] = [];
  private readonly script: ScriptedReply[];

  constructor(
    script: ScriptedReply[],
    readonly name = 'test-model',
  ) {
    this.script = [...script];
  }

  complete(messages: readonly ChatMessage[]): Promise<ChatCompletion> {
    this.calls.push(messages.map((m) => ({ ...m })));

    const next = this.script.shift();
    if (next === undefined) return Promise.reject(new Error('FakeChatModel: script exhausted'));
    if (next instanceof Error) return Promise.reject(next);
    if (typeof next === 'string') return Promise.resolve({ content: next, totalDurationNs: null });
    return Promise.resolve(next);
  }
}
