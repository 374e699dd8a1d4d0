/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, values come from .env via dotenv.
 * - Tests call buildConfig({ ... }) with an explicit env object.
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,

  // SQLite file backing the Users table. ':memory:' keeps everything in-process.
  DATABASE_FILE: z.string().min(1).default('llama.db'),

  // Local inference server
  OLLAMA_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().min(1).default('llama3.2'),
  OLLAMA_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1_000)
    .default(5 * 60 * 1_000),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('warn'),
  SERVICE_NAME: z.string().default('llama-users'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  databaseFile: string;

  ollama: {
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };

  logLevel: string;
  serviceName: string;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    databaseFile: parsed.DATABASE_FILE,

    ollama: {
      baseUrl: parsed.OLLAMA_URL.replace(/\/+$/, ''),
      model: parsed.OLLAMA_MODEL,
      timeoutMs: parsed.OLLAMA_TIMEOUT_MS,
    },

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,
  };
}
