/**
 * src/modules/chat/chat.types.ts
 *
 * The model is consumed as an opaque capability: role-tagged messages in,
 * text out.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatCompletion = {
  content: string;
  /** Server-reported generation time in nanoseconds, when it sends one. */
  totalDurationNs: number | null;
};

export interface ChatModel {
  readonly name: string;
  complete(messages: readonly ChatMessage[]): Promise<ChatCompletion>;
}
