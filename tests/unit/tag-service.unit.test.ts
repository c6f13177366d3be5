import { jest } from '@jest/globals';
import type { MemoryAdapter } from '../../src/adapters.js';
import { DuplicateError, NotFoundError, TagNameError } from '../../src/errors.js';
import type { PromptService } from '../../src/prompt-service.js';
import type { TagService } from '../../src/tag-service.js';
import { createTestContext } from '../setup.js';

describe('TagService', () => {
  let adapter: MemoryAdapter;
  let tagService: TagService;
  let promptService: PromptService;

  beforeEach(async () => {
    ({ adapter, tagService, promptService } = await createTestContext());
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('createTag', () => {
    it('should store the normalized name', async () => {
      const tag = await tagService.createTag('  Code-Review  ');
      expect(tag.name).toBe('code-review');
      expect(tag.id).toEqual(expect.any(String));
      expect(tag.createdAt).toEqual(expect.any(String));
      expect(await adapter.getTag(tag.id)).toEqual(tag);
    });

    it('should reject a name that only differs by case or whitespace', async () => {
      await tagService.createTag('Code-Review');
      await expect(tagService.createTag('CODE-REVIEW ')).rejects.toThrow(DuplicateError);
      await expect(tagService.createTag('code-review')).rejects.toThrow("Tag 'code-review' already exists.");
      expect(await adapter.listTags()).toHaveLength(1);
    });

    it('should reject invalid names without storing anything', async () => {
      await expect(tagService.createTag('my tag!')).rejects.toThrow(TagNameError);
      await expect(tagService.createTag('')).rejects.toThrow(TagNameError);
      await expect(tagService.createTag('a'.repeat(51))).rejects.toThrow(TagNameError);
      expect(await adapter.listTags()).toEqual([]);
    });

    it('should let only one of two concurrent creates with the same name win', async () => {
      const results = await Promise.allSettled([tagService.createTag('dup'), tagService.createTag('DUP')]);
      expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected']);
      expect(await adapter.listTags()).toHaveLength(1);
    });
  });

  describe('listTags', () => {
    it('should return an empty list when there are no tags', async () => {
      expect(await tagService.listTags()).toEqual([]);
    });

    it('should sort by name and count prompts per tag', async () => {
      const zebra = await tagService.createTag('zebra');
      const alpha = await tagService.createTag('alpha');
      await tagService.createTag('middle');
      await promptService.createPrompt({ content: 'One', tagIds: [zebra.id, alpha.id], title: 'One' });
      await promptService.createPrompt({ content: 'Two', tagIds: [alpha.id], title: 'Two' });

      const tags = await tagService.listTags();

      expect(tags.map(t => [t.name, t.promptCount])).toEqual([
        ['alpha', 2],
        ['middle', 0],
        ['zebra', 1],
      ]);
    });
  });

  describe('getTag', () => {
    it('should return the tag with its prompt count', async () => {
      const tag = await tagService.createTag('solo');
      await promptService.createPrompt({ content: 'Body', tagIds: [tag.id], title: 'Title' });
      expect(await tagService.getTag(tag.id)).toEqual({ ...tag, promptCount: 1 });
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(tagService.getTag('missing')).rejects.toThrow(NotFoundError);
    });
  });

  describe('listPromptsForTag', () => {
    it('should return tagged prompts newest first with their tags', async () => {
      jest.useFakeTimers({
        doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'],
        now: new Date('2024-01-01T00:00:00.000Z'),
      });
      const tag = await tagService.createTag('shared');
      const older = await promptService.createPrompt({ content: 'Body', tagIds: [tag.id], title: 'Older' });
      jest.setSystemTime(new Date('2024-01-02T00:00:00.000Z'));
      const newer = await promptService.createPrompt({ content: 'Body', tagIds: [tag.id], title: 'Newer' });
      await promptService.createPrompt({ content: 'Body', title: 'Untagged' });

      const prompts = await tagService.listPromptsForTag(tag.id);

      expect(prompts.map(p => p.id)).toEqual([newer.id, older.id]);
      expect(prompts[0].tags).toEqual([tag]);
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(tagService.listPromptsForTag('missing')).rejects.toThrow(NotFoundError);
    });
  });

  describe('deleteTag', () => {
    it('should detach the tag from every prompt and keep the prompts', async () => {
      const t1 = await tagService.createTag('t1');
      const t2 = await tagService.createTag('t2');
      const p1 = await promptService.createPrompt({ content: 'Body', tagIds: [t1.id, t2.id], title: 'P1' });
      const p2 = await promptService.createPrompt({ content: 'Body', tagIds: [t1.id], title: 'P2' });

      await tagService.deleteTag(t1.id);

      expect(await adapter.getTag(t1.id)).toBeNull();
      expect((await promptService.getPrompt(p1.id)).tags).toEqual([t2]);
      expect((await promptService.getPrompt(p2.id)).tags).toEqual([]);
      expect(await adapter.getPromptTagIds(p1.id)).toEqual(new Set([t2.id]));
    });

    it('should free the name for reuse', async () => {
      const tag = await tagService.createTag('reuse');
      await tagService.deleteTag(tag.id);
      await expect(tagService.createTag('reuse')).resolves.toMatchObject({ name: 'reuse' });
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(tagService.deleteTag('missing')).rejects.toThrow(NotFoundError);
    });
  });
});
