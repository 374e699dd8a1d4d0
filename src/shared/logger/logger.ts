/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Keeps logging consistent across modules.
 * - Adds stable metadata (service, env) to every line.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Prefer `withOperationContext(...)` inside operation handlers.
 * - Do not log raw Error objects only; pass `{ err }` so stack/message is preserved.
 *
 * RULES:
 * - stdout belongs to the chat transcript. Every level goes to stderr.
 * - Silent under NODE_ENV=test.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'llama-users';
const level = process.env.LOG_LEVEL ?? 'warn';

export const logger = winston.createLogger({
  level,
  silent: nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }), // ensures Error.stack is serialized
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
});

export type Logger = winston.Logger;
