import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';

import { NotFoundError } from './errors.js';
import type { Collection, CreateCollectionParams, StorageAdapter } from './interfaces.js';
import type { TagAssociations } from './tag-associations.js';
import { filterPromptsByCollection } from './utils.js';

export class CollectionService {
  private storage: StorageAdapter;
  private associations: TagAssociations;
  private logger: Logger;

  public constructor(storage: StorageAdapter, associations: TagAssociations, logger: Logger) {
    this.storage = storage;
    this.associations = associations;
    this.logger = logger.child({ service: 'collections' });
  }

  public async createCollection(params: CreateCollectionParams): Promise<Collection> {
    return this.storage.withLock(async () => {
      const collection: Collection = {
        createdAt: new Date().toISOString(),
        id: uuidv4(),
        name: params.name,
      };
      if (params.description !== null && params.description !== undefined) {
        collection.description = params.description;
      }

      const saved = await this.storage.saveCollection(collection);
      this.logger.info({ collectionId: saved.id }, 'Collection created');
      return saved;
    });
  }

  public async listCollections(): Promise<Collection[]> {
    return this.storage.withLock(() => this.storage.listCollections());
  }

  public async getCollection(id: string): Promise<Collection> {
    return this.storage.withLock(async () => {
      const collection = await this.storage.getCollection(id);
      if (!collection) {
        throw new NotFoundError(`Collection not found: ${id}`);
      }
      return collection;
    });
  }

  /**
   * Delete a collection together with every prompt filed under it,
   * so no prompt is left pointing at a missing collection.
   */
  public async deleteCollection(id: string): Promise<void> {
    await this.storage.withLock(async () => {
      if (!(await this.storage.getCollection(id))) {
        throw new NotFoundError(`Collection not found: ${id}`);
      }

      const prompts = filterPromptsByCollection(await this.storage.listPrompts(), id);
      for (const prompt of prompts) {
        await this.associations.onPromptDeleted(prompt.id);
        await this.storage.deletePrompt(prompt.id);
      }
      await this.storage.deleteCollection(id);
      this.logger.info({ collectionId: id, deletedPrompts: prompts.length }, 'Collection deleted');
    });
  }
}
