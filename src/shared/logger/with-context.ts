/**
 * src/shared/logger/with-context.ts
 *
 * WHY:
 * - Every log line for one dispatched operation should carry the raw name the
 *   caller sent and the canonical operation it resolved to.
 * - We don't want every handler repeating the same fields manually.
 *
 * HOW TO USE:
 * - `withOperationContext(logger, { operation, canonical }).info('users.op.done', { ... })`
 */

import type { Logger } from './logger';

type LogMeta = Record<string, unknown>;

export type OperationLogContext = {
  operation: string;
  canonical: string | null;
};

export function withOperationContext(logger: Logger, ctx: OperationLogContext) {
  const base = {
    operation: ctx.operation,
    canonical: ctx.canonical,
  };

  return {
    info: (msg: string, meta: LogMeta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg: string, meta: LogMeta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg: string, meta: LogMeta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg: string, meta: LogMeta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}
