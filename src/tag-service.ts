import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';

import { DuplicateError, NotFoundError } from './errors.js';
import type { Prompt, StorageAdapter, Tag, TagWithCount } from './interfaces.js';
import { sortTagsByName, type TagAssociations } from './tag-associations.js';
import { validateTagName } from './tag-name.js';
import { sortPromptsByDate } from './utils.js';

export class TagService {
  private storage: StorageAdapter;
  private associations: TagAssociations;
  private logger: Logger;

  public constructor(storage: StorageAdapter, associations: TagAssociations, logger: Logger) {
    this.storage = storage;
    this.associations = associations;
    this.logger = logger.child({ service: 'tags' });
  }

  /**
   * Create a tag. The name is normalized first, so `Code-Review` and
   * `code-review ` collide.
   */
  public async createTag(rawName: string): Promise<Tag> {
    const name = validateTagName(rawName);

    return this.storage.withLock(async () => {
      if (await this.storage.getTagByName(name)) {
        throw new DuplicateError(`Tag '${name}' already exists.`);
      }

      const tag = await this.storage.saveTag({
        createdAt: new Date().toISOString(),
        id: uuidv4(),
        name,
      });
      this.logger.info({ tagId: tag.id, name }, 'Tag created');
      return tag;
    });
  }

  /**
   * All tags sorted by name, each with the number of prompts carrying it.
   */
  public async listTags(): Promise<TagWithCount[]> {
    return this.storage.withLock(async () => {
      const entries = await this.storage.listPromptTagEntries();
      const counts = new Map<string, number>();
      for (const [, tagIds] of entries) {
        for (const tagId of tagIds) {
          counts.set(tagId, (counts.get(tagId) ?? 0) + 1);
        }
      }

      const tags = await this.storage.listTags();
      return sortTagsByName(tags.map(tag => ({ ...tag, promptCount: counts.get(tag.id) ?? 0 })));
    });
  }

  public async getTag(id: string): Promise<TagWithCount> {
    return this.storage.withLock(async () => {
      const tag = await this.requireTag(id);
      return { ...tag, promptCount: await this.associations.promptCountFor(id) };
    });
  }

  /**
   * Prompts carrying the tag, with their tags, newest first.
   */
  public async listPromptsForTag(id: string): Promise<Prompt[]> {
    return this.storage.withLock(async () => {
      await this.requireTag(id);

      const prompts: Prompt[] = [];
      for (const promptId of await this.associations.promptIdsFor(id)) {
        const record = await this.storage.getPrompt(promptId);
        if (record) {
          prompts.push({ ...record, tags: await this.associations.tagsFor(promptId) });
        }
      }
      return sortPromptsByDate(prompts);
    });
  }

  /**
   * Delete a tag and detach it from every prompt, as one step.
   * The prompts themselves are kept.
   */
  public async deleteTag(id: string): Promise<void> {
    await this.storage.withLock(async () => {
      await this.requireTag(id);
      await this.associations.onTagDeleted(id);
      await this.storage.deleteTag(id);
      this.logger.info({ tagId: id }, 'Tag deleted');
    });
  }

  private async requireTag(id: string): Promise<Tag> {
    const tag = await this.storage.getTag(id);
    if (!tag) {
      throw new NotFoundError(`Tag not found: ${id}`);
    }
    return tag;
  }
}
