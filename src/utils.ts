import { pino, type Logger } from 'pino';

import type { EnvVars } from './config.js';
import type { PromptRecord } from './interfaces.js';

/**
 * Builds the application logger. Pretty-prints outside production.
 */
export function createLogger(config: Pick<EnvVars, 'LOG_LEVEL' | 'NODE_ENV' | 'NAME'>): Logger {
  return pino({
    level: config.LOG_LEVEL,
    name: config.NAME,
    ...(config.NODE_ENV !== 'production' && {
      transport: {
        options: {
          colorize: true,
        },
        target: 'pino-pretty',
      },
    }),
  });
}

/**
 * Sorts prompts by creation date, newest first unless `descending` is false.
 * Returns a new array; ties keep their input order.
 */
export function sortPromptsByDate<T extends Pick<PromptRecord, 'createdAt'>>(
  prompts: T[],
  descending = true,
): T[] {
  const direction = descending ? -1 : 1;
  return [...prompts].sort((a, b) => {
    const delta = Date.parse(a.createdAt) - Date.parse(b.createdAt);
    return delta === 0 ? 0 : Math.sign(delta) * direction;
  });
}

export function filterPromptsByCollection<T extends Pick<PromptRecord, 'collectionId'>>(
  prompts: T[],
  collectionId: string,
): T[] {
  return prompts.filter(p => p.collectionId === collectionId);
}

/**
 * Case-insensitive substring match on title and description.
 */
export function searchPrompts<T extends Pick<PromptRecord, 'title' | 'description'>>(
  prompts: T[],
  query: string,
): T[] {
  const needle = query.toLowerCase();
  return prompts.filter(
    p => p.title.toLowerCase().includes(needle) || (p.description?.toLowerCase().includes(needle) ?? false),
  );
}

/**
 * Content passes when it holds at least 10 characters once trimmed.
 */
export function validatePromptContent(content: string | null | undefined): boolean {
  if (!content) return false;
  return content.trim().length >= 10;
}

/**
 * Names of the `{{variable}}` placeholders in `content`, in order of
 * appearance. Repeats are kept. Only word characters count as a name.
 */
export function extractVariables(content: string): string[] {
  return Array.from(content.matchAll(/\{\{(\w+)\}\}/g), match => match[1]);
}
