export { createChatModule } from './chat.module';
export type { ChatModule } from './chat.module';
export { ChatSession } from './chat-session';
export type { ChatTurn, RunOperation } from './chat-session';
export { OllamaChatModel } from './ollama-chat-model';
export { parseDatabaseCommand } from './database-command';
export type { DatabaseCommand } from './database-command';
export type { ChatCompletion, ChatMessage, ChatModel } from './chat.types';
