/**
 * src/cli/repl.ts
 *
 * WHY:
 * - Console read-eval loop around a ChatSession.
 * - All presentation lives here: banner, prompt, spinner, result lines.
 *
 * RULES:
 * - Blank input, `exit` or `quit` (any case) ends the session. So does EOF.
 * - A failed turn prints an error and the loop continues.
 */

import { createInterface } from 'node:readline';

import { AppError } from '../shared/errors/errors';
import type { Logger } from '../shared/logger/logger';
import type { ChatSession, ChatTurn } from '../modules/chat';
import { Spinner } from './spinner';

export type ReplOptions = {
  session: ChatSession;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  logger: Logger;
  ollamaUrl: string;
  showSpinner?: boolean;
};

const EXIT_COMMANDS = new Set(['exit', 'quit']);

export function isExitCommand(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || EXIT_COMMANDS.has(trimmed.toLowerCase());
}

export function bannerLines(modelName: string): string[] {
  const title = `Ollama ${modelName} Interactive Chat with User Database`;
  return [
    title,
    '='.repeat(title.length),
    "Type 'exit' or 'quit' to end the session",
    'You can ask me to manage users, like:',
    "  - 'add user named John with email john@example.com'",
    "  - 'list all users'",
    "  - 'find user with id 1'",
    "  - 'delete user with id 2'",
    '',
  ];
}

export function renderTurn(modelName: string, turn: ChatTurn): string[] {
  const lines: string[] = [];

  if (turn.kind === 'operation') {
    lines.push('[Database operation executed]', '');
    lines.push(`Result: ${turn.result}`, '');
    lines.push(`${modelName}: ${turn.explanation}`);
  } else {
    lines.push(`${modelName}: ${turn.text}`);
  }

  if (turn.durationSeconds !== null) {
    lines.push(`[Generated in ${turn.durationSeconds.toFixed(2)}s]`, '');
  }

  return lines;
}

export function renderTurnError(err: unknown, modelName: string, ollamaUrl: string): string[] {
  if (err instanceof AppError && err.code === 'UNAVAILABLE') {
    return [
      `Error: Could not connect to Ollama at ${ollamaUrl}`,
      `Make sure Ollama is running and ${modelName} model is installed.`,
      `Details: ${err.message}`,
      '',
    ];
  }

  const message = err instanceof Error ? err.message : String(err);
  return [`Error: ${message}`, ''];
}

export async function runRepl(opts: ReplOptions): Promise<void> {
  const { session, output } = opts;
  const writeLines = (lines: string[]) => {
    output.write(`${lines.join('\n')}\n`);
  };

  const spinner = opts.showSpinner ? new Spinner(output) : null;
  const rl = createInterface({ input: opts.input, output, terminal: false });
  rl.setPrompt('You: ');

  writeLines(bannerLines(session.modelName));

  try {
    rl.prompt();
    for await (const line of rl) {
      if (isExitCommand(line)) break;

      try {
        const task = () => session.send(line);
        const turn = spinner ? await spinner.while(task) : await task();
        writeLines(renderTurn(session.modelName, turn));
      } catch (err: unknown) {
        opts.logger.warn('chat.turn.failed', { err });
        writeLines(renderTurnError(err, session.modelName, opts.ollamaUrl));
      }

      rl.prompt();
    }
  } finally {
    rl.close();
  }

  writeLines(['', 'Goodbye!']);
}
