/**
 * src/shared/errors/errors.ts
 *
 * WHY:
 * - Central error primitive used by operation handlers and the chat layer.
 * - Keeps the error kinds distinguishable until the outermost boundary
 *   turns them into text.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. users/user.errors.ts).
 */

export const APP_ERROR_CODES = [
  'VALIDATION_ERROR',
  'NOT_FOUND',
  'CONFLICT',
  'UNKNOWN_OPERATION',
  'UNAVAILABLE',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; meta?: AppErrorMeta; cause?: unknown }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = opts.code;
    this.meta = opts.meta;
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', message, meta });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', message, meta });
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFLICT', message, meta });
  }

  static unknownOperation(message: string, meta?: AppErrorMeta) {
    return new AppError({ code: 'UNKNOWN_OPERATION', message, meta });
  }

  static unavailable(message = 'Service unavailable', meta?: AppErrorMeta, cause?: unknown) {
    return new AppError({ code: 'UNAVAILABLE', message, meta, cause });
  }

  static internal(message = 'Internal error', meta?: AppErrorMeta, cause?: unknown) {
    return new AppError({ code: 'INTERNAL', message, meta, cause });
  }
}

/**
 * Wraps anything thrown into an AppError. AppErrors pass through untouched.
 */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof Error) return AppError.internal(err.message, undefined, err);
  return AppError.internal(String(err));
}
