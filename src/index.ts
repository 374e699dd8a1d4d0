/**
 * src/index.ts
 *
 * WHY:
 * - Single entrypoint for the console app.
 * - Keeps startup logic small: load config -> build deps -> run the chat loop.
 */

import { buildConfig } from './app/config';
import { buildDeps } from './app/di';
import { runRepl } from './cli/repl';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const deps = await buildDeps(config);

  logger.info('app.started', {
    env: config.nodeEnv,
    service: config.serviceName,
    databaseFile: config.databaseFile,
    model: config.ollama.model,
  });
  process.stdout.write('[Database initialized]\n\n');

  const shutdown = async (signal: string) => {
    logger.info('app.shutdown', { signal });
    await deps.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await runRepl({
      session: deps.chat.createSession(),
      input: process.stdin,
      output: process.stdout,
      logger,
      ollamaUrl: config.ollama.baseUrl,
      showSpinner: process.stdout.isTTY === true,
    });
  } finally {
    await deps.close();
  }
}

void main().catch((err: unknown) => {
  logger.error('app.fatal_startup_error', { err });
  process.exit(1);
});
