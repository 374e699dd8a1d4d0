/**
 * src/modules/chat/chat.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - UNAVAILABLE means "could not talk to the model server at all";
 *   the console prints the connection hint only for that code.
 */

import { AppError } from '../../shared/errors/errors';

export const ChatErrors = {
  unreachable(baseUrl: string, model: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return AppError.unavailable(detail, { baseUrl, model }, cause);
  },

  timedOut(baseUrl: string, timeoutMs: number, cause: unknown) {
    return AppError.unavailable(`Request timed out after ${timeoutMs}ms`, { baseUrl, timeoutMs }, cause);
  },

  badStatus(status: number, body: string) {
    return AppError.internal(`Model server responded with HTTP ${status}`, {
      status,
      body: body.slice(0, 500),
    });
  },

  badResponse(reason: string) {
    return AppError.internal(`Unexpected model server response: ${reason}`);
  },
} as const;
