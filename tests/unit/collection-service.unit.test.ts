import type { MemoryAdapter } from '../../src/adapters.js';
import type { CollectionService } from '../../src/collection-service.js';
import { NotFoundError } from '../../src/errors.js';
import type { PromptService } from '../../src/prompt-service.js';
import type { TagService } from '../../src/tag-service.js';
import { createTestContext } from '../setup.js';

describe('CollectionService', () => {
  let adapter: MemoryAdapter;
  let collectionService: CollectionService;
  let promptService: PromptService;
  let tagService: TagService;

  beforeEach(async () => {
    ({ adapter, collectionService, promptService, tagService } = await createTestContext());
  });

  it('should create and fetch a collection', async () => {
    const collection = await collectionService.createCollection({ description: 'Dev prompts', name: 'Development' });

    expect(collection).toEqual({
      createdAt: expect.any(String),
      description: 'Dev prompts',
      id: expect.any(String),
      name: 'Development',
    });
    expect(await collectionService.getCollection(collection.id)).toEqual(collection);
  });

  it('should omit a null description', async () => {
    const collection = await collectionService.createCollection({ description: null, name: 'Bare' });
    expect(collection).not.toHaveProperty('description');
  });

  it('should list every collection', async () => {
    await collectionService.createCollection({ name: 'One' });
    await collectionService.createCollection({ name: 'Two' });
    expect((await collectionService.listCollections()).map(c => c.name)).toEqual(['One', 'Two']);
  });

  it('should throw NotFoundError for an unknown id', async () => {
    await expect(collectionService.getCollection('missing')).rejects.toThrow(NotFoundError);
    await expect(collectionService.deleteCollection('missing')).rejects.toThrow('Collection not found: missing');
  });

  it('should delete the prompts filed under it with their tag entries', async () => {
    const doomed = await collectionService.createCollection({ name: 'Doomed' });
    const kept = await collectionService.createCollection({ name: 'Kept' });
    const tag = await tagService.createTag('shared');
    const inside = await promptService.createPrompt({
      collectionId: doomed.id,
      content: 'Body',
      tagIds: [tag.id],
      title: 'Inside',
    });
    const outside = await promptService.createPrompt({
      collectionId: kept.id,
      content: 'Body',
      tagIds: [tag.id],
      title: 'Outside',
    });

    await collectionService.deleteCollection(doomed.id);

    expect(await adapter.getCollection(doomed.id)).toBeNull();
    expect(await adapter.getPrompt(inside.id)).toBeNull();
    expect(await adapter.getPrompt(outside.id)).not.toBeNull();
    expect(await adapter.getPromptTagIds(inside.id)).toEqual(new Set());
    expect((await tagService.getTag(tag.id)).promptCount).toBe(1);
  });
});
