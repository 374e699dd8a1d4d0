/**
 * src/modules/chat/database-command.ts
 *
 * WHY:
 * - Model replies are free text that MAY embed a JSON command object.
 * - We find every balanced {...} candidate, parse it, and accept the first one
 *   that validates as a database command. Anything else is ordinary chat.
 *
 * RULES:
 * - Never throws. Malformed JSON / wrong shape => null.
 * - Parameter values other than strings and finite numbers are dropped
 *   (null, booleans, nested objects read as "absent").
 */

import { z } from 'zod';

import type { ParamBag, ParamValue } from '../../shared/params/param-bag';

export const DATABASE_OPERATION_ACTION = 'database_operation';

const DatabaseCommandSchema = z.object({
  action: z.literal(DATABASE_OPERATION_ACTION),
  operation: z.string().trim().min(1),
  parameters: z.record(z.unknown()).nullish(),
});

export type DatabaseCommand = {
  operation: string;
  parameters: ParamBag;
};

/**
 * Index of the brace closing the object that opens at `start`, or -1.
 * Braces inside JSON strings are ignored.
 */
function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

/** Every balanced {...} substring, outermost first by start position. */
export function extractJsonObjects(text: string): string[] {
  const candidates: string[] = [];

  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = findObjectEnd(text, start);
    if (end !== -1) candidates.push(text.slice(start, end + 1));
  }

  return candidates;
}

function toParamBag(raw: Record<string, unknown> | null | undefined): ParamBag {
  const bag: Record<string, ParamValue> = {};
  if (!raw) return bag;

  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') bag[key] = value;
    else if (typeof value === 'number' && Number.isFinite(value)) bag[key] = value;
  }

  return bag;
}

function tryParseJson(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

export function parseDatabaseCommand(reply: string): DatabaseCommand | null {
  if (!reply.includes(DATABASE_OPERATION_ACTION)) return null;

  for (const candidate of extractJsonObjects(reply)) {
    if (!candidate.includes(DATABASE_OPERATION_ACTION)) continue;

    const parsed = DatabaseCommandSchema.safeParse(tryParseJson(candidate));
    if (!parsed.success) continue;

    return {
      operation: parsed.data.operation,
      parameters: toParamBag(parsed.data.parameters),
    };
  }

  return null;
}
