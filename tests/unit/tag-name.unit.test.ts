import { TagNameError, ValidationError } from '../../src/errors.js';
import { MAX_TAG_NAME_LENGTH, normalizeTagName, validateTagName } from '../../src/tag-name.js';

function reasonFor(raw: string): string | undefined {
  try {
    validateTagName(raw);
    return undefined;
  } catch (error) {
    return error instanceof TagNameError ? error.reason : 'unexpected';
  }
}

describe('normalizeTagName', () => {
  it('should trim and lowercase', () => {
    expect(normalizeTagName('  Code-Review  ')).toBe('code-review');
    expect(normalizeTagName('CODE-REVIEW ')).toBe('code-review');
  });

  it('should be idempotent', () => {
    for (const raw of ['GPT-4', ' a_b ', 'x', '\tMixed_Case-1\n']) {
      const once = normalizeTagName(raw);
      expect(normalizeTagName(once)).toBe(once);
    }
  });
});

describe('validateTagName', () => {
  it('should return the normalized name for valid input', () => {
    expect(validateTagName('gpt-4_test')).toBe('gpt-4_test');
    expect(validateTagName('  Code-Review  ')).toBe('code-review');
    expect(validateTagName('a'.repeat(MAX_TAG_NAME_LENGTH))).toBe('a'.repeat(50));
  });

  it('should reject empty and blank names', () => {
    expect(reasonFor('')).toBe('EMPTY_NAME');
    expect(reasonFor('   ')).toBe('EMPTY_NAME');
  });

  it('should reject characters outside [a-z0-9_-]', () => {
    expect(reasonFor('my tag!')).toBe('INVALID_CHARACTERS');
    expect(reasonFor('tag.name')).toBe('INVALID_CHARACTERS');
    expect(reasonFor('café')).toBe('INVALID_CHARACTERS');
  });

  it('should reject names longer than 50 characters after trimming', () => {
    expect(reasonFor('a'.repeat(51))).toBe('TOO_LONG');
    expect(reasonFor(`  ${'b'.repeat(50)}  `)).toBeUndefined();
  });

  it('should check characters before length', () => {
    expect(reasonFor('!'.repeat(60))).toBe('INVALID_CHARACTERS');
  });

  it('should raise a ValidationError with status 422', () => {
    let caught: unknown;
    try {
      validateTagName('bad name');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ reason: 'INVALID_CHARACTERS', statusCode: 422 });
  });
});
