/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra ONCE (schema migration, model client) and wires modules.
 * - Keeps modules testable (tests pass fakes for `model` / a shared connector).
 *
 * RULES:
 * - No business logic here.
 * - No console I/O here.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import { migrateToLatest } from '../shared/db/migrator';
import { FileStoreConnector, SharedStoreConnector } from '../shared/db/store-connector';
import type { StoreConnector } from '../shared/db/store-connector';

import { logger as defaultLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule } from '../modules/users';
import type { UserModule } from '../modules/users';

import { createChatModule, OllamaChatModel } from '../modules/chat';
import type { ChatModel, ChatModule } from '../modules/chat';

const IN_MEMORY = ':memory:';

export type AppDeps = {
  logger: Logger;
  connector: StoreConnector;

  // modules
  users: UserModule;
  chat: ChatModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(
  config: AppConfig,
  overrides: { model?: ChatModel; logger?: Logger; now?: () => Date } = {},
): Promise<AppDeps> {
  const logger = overrides.logger ?? defaultLogger;

  // Schema is created once up front. For a file database every operation then
  // opens its own short-lived handle; ':memory:' must share one handle.
  const schemaDb = createDb(config.databaseFile);
  await migrateToLatest(schemaDb, logger);

  let connector: StoreConnector;
  let close: () => Promise<void>;

  if (config.databaseFile === IN_MEMORY) {
    connector = new SharedStoreConnector(schemaDb);
    close = () => schemaDb.destroy();
  } else {
    await schemaDb.destroy();
    connector = new FileStoreConnector(config.databaseFile);
    close = () => Promise.resolve();
  }

  const users = createUserModule({ connector, logger, now: overrides.now });

  const model =
    overrides.model ??
    new OllamaChatModel({
      baseUrl: config.ollama.baseUrl,
      model: config.ollama.model,
      timeoutMs: config.ollama.timeoutMs,
      logger,
    });

  const chat = createChatModule({ model, runOperation: users.handle, logger });

  return {
    logger,
    connector,
    users,
    chat,
    close,
  };
}
