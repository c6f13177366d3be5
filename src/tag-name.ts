import { TagNameError } from './errors.js';

export const MAX_TAG_NAME_LENGTH = 50;

const TAG_NAME_PATTERN = /^[a-z0-9_-]+$/;

/**
 * Trims and lowercases a tag name. Applied before validation, storage,
 * lookup and comparison.
 */
export function normalizeTagName(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * Normalizes `raw` and returns it if it can be stored as a tag name.
 * @throws TagNameError with reason EMPTY_NAME, INVALID_CHARACTERS or TOO_LONG
 */
export function validateTagName(raw: string): string {
  const name = normalizeTagName(raw);

  if (name.length === 0) {
    throw new TagNameError('EMPTY_NAME', 'Tag name cannot be empty or just whitespace.');
  }
  if (!TAG_NAME_PATTERN.test(name)) {
    throw new TagNameError(
      'INVALID_CHARACTERS',
      `Tag name '${name}' may only contain lowercase letters, digits, hyphens and underscores.`,
    );
  }
  if (name.length > MAX_TAG_NAME_LENGTH) {
    throw new TagNameError(
      'TOO_LONG',
      `Tag name cannot be longer than ${MAX_TAG_NAME_LENGTH} characters.`,
    );
  }

  return name;
}
