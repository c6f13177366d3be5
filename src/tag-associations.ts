import type { StorageAdapter, Tag } from './interfaces.js';

export function sortTagsByName<T extends Tag>(tags: T[]): T[] {
  return [...tags].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Bookkeeping over the prompt↔tag association index.
 *
 * Every method assumes the referenced prompt and tags exist; the services
 * check that first, inside the same `withLock` section. Nothing here takes
 * the lock itself.
 */
export class TagAssociations {
  private storage: StorageAdapter;

  public constructor(storage: StorageAdapter) {
    this.storage = storage;
  }

  /**
   * Adds `tagIds` to the prompt's set. Ids already attached are no-ops.
   */
  public async attach(promptId: string, tagIds: Iterable<string>): Promise<void> {
    const current = await this.storage.getPromptTagIds(promptId);
    for (const tagId of tagIds) {
      current.add(tagId);
    }
    await this.storage.setPromptTagIds(promptId, current);
  }

  /**
   * Removes `tagIds` from the prompt's set. Ids not attached are ignored.
   */
  public async detach(promptId: string, tagIds: Iterable<string>): Promise<void> {
    const current = await this.storage.getPromptTagIds(promptId);
    for (const tagId of tagIds) {
      current.delete(tagId);
    }
    await this.storage.setPromptTagIds(promptId, current);
  }

  public async replace(promptId: string, tagIds: Iterable<string>): Promise<void> {
    await this.storage.setPromptTagIds(promptId, tagIds);
  }

  /**
   * The prompt's tags sorted by name. Ids whose tag no longer exists are skipped.
   */
  public async tagsFor(promptId: string): Promise<Tag[]> {
    const tags: Tag[] = [];
    for (const tagId of await this.storage.getPromptTagIds(promptId)) {
      const tag = await this.storage.getTag(tagId);
      if (tag) {
        tags.push(tag);
      }
    }
    return sortTagsByName(tags);
  }

  public async promptCountFor(tagId: string): Promise<number> {
    return (await this.promptIdsFor(tagId)).length;
  }

  public async promptIdsFor(tagId: string): Promise<string[]> {
    const entries = await this.storage.listPromptTagEntries();
    return entries.filter(([, tagIds]) => tagIds.has(tagId)).map(([promptId]) => promptId);
  }

  /**
   * Ids with no tag in storage, deduplicated, in request order.
   */
  public async findMissingTagIds(tagIds: Iterable<string>): Promise<string[]> {
    const missing: string[] = [];
    for (const tagId of new Set(tagIds)) {
      if (!(await this.storage.getTag(tagId))) {
        missing.push(tagId);
      }
    }
    return missing;
  }

  /**
   * Cascade: removes the tag from every prompt's set. Call it in the same
   * critical section as the tag store delete.
   */
  public async onTagDeleted(tagId: string): Promise<void> {
    for (const [promptId, tagIds] of await this.storage.listPromptTagEntries()) {
      if (tagIds.delete(tagId)) {
        await this.storage.setPromptTagIds(promptId, tagIds);
      }
    }
  }

  public async onPromptDeleted(promptId: string): Promise<void> {
    await this.storage.deletePromptTagIds(promptId);
  }
}
