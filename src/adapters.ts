/**
 * Storage adapters
 * The memory adapter keeps every entity and the prompt↔tag association
 * index in process memory.
 */

import type { Logger } from 'pino';

import type { EnvVars } from './config.js';
import type { Collection, PromptRecord, StorageAdapter, Tag } from './interfaces.js';

export function adapterFactory(config: Pick<EnvVars, 'STORAGE_TYPE'>, logger: Logger): StorageAdapter {
  switch (config.STORAGE_TYPE) {
    case 'memory':
      logger.info('Using memory storage adapter');
      return new MemoryAdapter();
    default:
      throw new Error(`Unknown storage type: ${String(config.STORAGE_TYPE)}`);
  }
}

export class MemoryAdapter implements StorageAdapter {
  private prompts = new Map<string, PromptRecord>();
  private collections = new Map<string, Collection>();
  private tags = new Map<string, Tag>();
  private tagIdsByName = new Map<string, string>();
  private promptTags = new Map<string, Set<string>>();
  private queue: Promise<void> = Promise.resolve();
  private connected = false;

  public async connect(): Promise<void> {
    this.connected = true;
  }

  public async disconnect(): Promise<void> {
    this.connected = false;
  }

  public async isConnected(): Promise<boolean> {
    return this.connected;
  }

  public async healthCheck(): Promise<boolean> {
    return this.connected;
  }

  public withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    // The next section waits for this one however it settles; the caller still sees the rejection.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  public async clearAll(): Promise<void> {
    this.prompts.clear();
    this.collections.clear();
    this.tags.clear();
    this.tagIdsByName.clear();
    this.promptTags.clear();
  }

  // --- Prompts ---

  public async savePrompt(prompt: PromptRecord): Promise<PromptRecord> {
    this.assertConnected();
    this.prompts.set(prompt.id, { ...prompt });
    return { ...prompt };
  }

  public async getPrompt(id: string): Promise<PromptRecord | null> {
    const prompt = this.prompts.get(id);
    return prompt ? { ...prompt } : null;
  }

  public async listPrompts(): Promise<PromptRecord[]> {
    return Array.from(this.prompts.values(), p => ({ ...p }));
  }

  public async updatePrompt(id: string, prompt: PromptRecord): Promise<PromptRecord | null> {
    this.assertConnected();
    if (!this.prompts.has(id)) {
      return null;
    }
    const updated = { ...prompt, id };
    this.prompts.set(id, updated);
    return { ...updated };
  }

  public async deletePrompt(id: string): Promise<boolean> {
    this.assertConnected();
    return this.prompts.delete(id);
  }

  // --- Collections ---

  public async saveCollection(collection: Collection): Promise<Collection> {
    this.assertConnected();
    this.collections.set(collection.id, { ...collection });
    return { ...collection };
  }

  public async getCollection(id: string): Promise<Collection | null> {
    const collection = this.collections.get(id);
    return collection ? { ...collection } : null;
  }

  public async listCollections(): Promise<Collection[]> {
    return Array.from(this.collections.values(), c => ({ ...c }));
  }

  public async updateCollection(id: string, collection: Collection): Promise<Collection | null> {
    this.assertConnected();
    if (!this.collections.has(id)) {
      return null;
    }
    const updated = { ...collection, id };
    this.collections.set(id, updated);
    return { ...updated };
  }

  public async deleteCollection(id: string): Promise<boolean> {
    this.assertConnected();
    return this.collections.delete(id);
  }

  // --- Tags ---

  public async saveTag(tag: Tag): Promise<Tag> {
    this.assertConnected();
    const previous = this.tags.get(tag.id);
    if (previous) {
      this.tagIdsByName.delete(previous.name);
    }
    this.tags.set(tag.id, { ...tag });
    this.tagIdsByName.set(tag.name, tag.id);
    return { ...tag };
  }

  public async getTag(id: string): Promise<Tag | null> {
    const tag = this.tags.get(id);
    return tag ? { ...tag } : null;
  }

  public async getTagByName(name: string): Promise<Tag | null> {
    const id = this.tagIdsByName.get(name);
    return id === undefined ? null : this.getTag(id);
  }

  public async listTags(): Promise<Tag[]> {
    return Array.from(this.tags.values(), t => ({ ...t }));
  }

  public async deleteTag(id: string): Promise<boolean> {
    this.assertConnected();
    const tag = this.tags.get(id);
    if (!tag) {
      return false;
    }
    this.tagIdsByName.delete(tag.name);
    return this.tags.delete(id);
  }

  // --- Association index ---

  public async getPromptTagIds(promptId: string): Promise<Set<string>> {
    return new Set(this.promptTags.get(promptId));
  }

  public async setPromptTagIds(promptId: string, tagIds: Iterable<string>): Promise<void> {
    this.assertConnected();
    this.promptTags.set(promptId, new Set(tagIds));
  }

  public async deletePromptTagIds(promptId: string): Promise<boolean> {
    this.assertConnected();
    return this.promptTags.delete(promptId);
  }

  public async listPromptTagEntries(): Promise<Array<[string, Set<string>]>> {
    return Array.from(
      this.promptTags.entries(),
      ([promptId, tagIds]): [string, Set<string>] => [promptId, new Set(tagIds)],
    );
  }

  private assertConnected(): void {
    if (!this.connected) {
      throw new Error('Memory storage not connected');
    }
  }
}
