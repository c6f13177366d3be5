import type { Prompt, TagMatchMode } from './interfaces.js';
import { normalizeTagName } from './tag-name.js';

/**
 * Turns a `tags` query value into normalized, deduplicated names.
 * Accepts a comma-separated string or a repeated parameter; blank pieces
 * and anything unparseable yield no names, which means "no filter".
 */
export function parseTagNames(raw: unknown): string[] {
  const values = typeof raw === 'string' ? [raw] : Array.isArray(raw) ? raw : [];
  const names = new Set<string>();
  for (const value of values) {
    if (typeof value !== 'string') continue;
    for (const piece of value.split(',')) {
      const name = normalizeTagName(piece);
      if (name) names.add(name);
    }
  }
  return Array.from(names);
}

export function parseTagMatchMode(raw: unknown): TagMatchMode {
  return typeof raw === 'string' && raw.trim().toLowerCase() === 'any' ? 'any' : 'all';
}

/**
 * Keeps the prompts whose tags satisfy `names` under `mode`, preserving order.
 * Prompts must already carry their tags.
 */
export function filterPromptsByTags<T extends Pick<Prompt, 'tags'>>(
  prompts: T[],
  names: Iterable<string>,
  mode: TagMatchMode = 'all',
): T[] {
  const requested = new Set(Array.from(names, normalizeTagName).filter(Boolean));
  if (requested.size === 0) {
    return prompts;
  }

  return prompts.filter(prompt => {
    const own = new Set(prompt.tags.map(tag => tag.name.toLowerCase()));
    const wanted = Array.from(requested);
    return mode === 'any' ? wanted.some(name => own.has(name)) : wanted.every(name => own.has(name));
  });
}
