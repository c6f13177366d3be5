import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';

import { NotFoundError, ReferentialError } from './errors.js';
import type {
  CreatePromptParams,
  ListPromptsOptions,
  Prompt,
  PromptPatch,
  PromptRecord,
  ReplacePromptParams,
  StorageAdapter,
} from './interfaces.js';
import type { TagAssociations } from './tag-associations.js';
import { filterPromptsByTags } from './tag-filter.js';
import { filterPromptsByCollection, searchPrompts, sortPromptsByDate } from './utils.js';

type NullableField = 'description' | 'collectionId';

const PATCH_FIELDS: ReadonlyArray<keyof PromptPatch> = [
  'title',
  'content',
  'description',
  'collectionId',
  'tagIds',
];

function setNullableField(record: PromptRecord, key: NullableField, value: string | null | undefined) {
  if (value === null || value === undefined) {
    delete record[key];
  } else {
    record[key] = value;
  }
}

function isPresent(patch: PromptPatch, key: keyof PromptPatch): boolean {
  return Object.prototype.hasOwnProperty.call(patch, key) && patch[key] !== undefined;
}

export class PromptService {
  private storage: StorageAdapter;
  private associations: TagAssociations;
  private logger: Logger;

  public constructor(storage: StorageAdapter, associations: TagAssociations, logger: Logger) {
    this.storage = storage;
    this.associations = associations;
    this.logger = logger.child({ service: 'prompts' });
  }

  /**
   * Create a prompt, attaching `tagIds` when given.
   * Nothing is stored if the collection or any tag id is unknown.
   */
  public async createPrompt(params: CreatePromptParams): Promise<Prompt> {
    return this.storage.withLock(async () => {
      await this.checkCollectionReference(params.collectionId);
      await this.checkTagReferences(params.tagIds);

      const now = new Date().toISOString();
      const record: PromptRecord = {
        content: params.content,
        createdAt: now,
        id: uuidv4(),
        title: params.title,
        updatedAt: now,
      };
      setNullableField(record, 'description', params.description);
      setNullableField(record, 'collectionId', params.collectionId);

      const saved = await this.storage.savePrompt(record);
      await this.associations.replace(saved.id, params.tagIds ?? []);
      this.logger.info({ promptId: saved.id }, 'Prompt created');
      return this.withTags(saved);
    });
  }

  public async getPrompt(id: string): Promise<Prompt> {
    return this.storage.withLock(async () => this.withTags(await this.requirePrompt(id)));
  }

  /**
   * List prompts with their tags, filtered and sorted newest first.
   * Unknown tag names simply match nothing.
   */
  public async listPrompts(options: ListPromptsOptions = {}): Promise<Prompt[]> {
    return this.storage.withLock(async () => {
      const records = await this.storage.listPrompts();
      let prompts: Prompt[] = [];
      for (const record of records) {
        prompts.push(await this.withTags(record));
      }

      if (options.collectionId) {
        prompts = filterPromptsByCollection(prompts, options.collectionId);
      }
      if (options.search) {
        prompts = searchPrompts(prompts, options.search);
      }
      if (options.tags && options.tags.length > 0) {
        prompts = filterPromptsByTags(prompts, options.tags, options.tagMatch ?? 'all');
      }

      return sortPromptsByDate(prompts);
    });
  }

  /**
   * Replace every editable field (PUT). Omitted optional fields are cleared;
   * the tag set is replaced only when `tagIds` is supplied.
   */
  public async replacePrompt(id: string, params: ReplacePromptParams): Promise<Prompt> {
    return this.storage.withLock(async () => {
      const existing = await this.requirePrompt(id);
      await this.checkCollectionReference(params.collectionId);
      await this.checkTagReferences(params.tagIds);

      const record: PromptRecord = {
        content: params.content,
        createdAt: existing.createdAt,
        id,
        title: params.title,
        updatedAt: new Date().toISOString(),
      };
      setNullableField(record, 'description', params.description);
      setNullableField(record, 'collectionId', params.collectionId);

      const saved = await this.save(record);
      if (params.tagIds !== undefined) {
        await this.associations.replace(id, params.tagIds);
      }
      this.logger.info({ promptId: id }, 'Prompt replaced');
      return this.withTags(saved);
    });
  }

  /**
   * Apply only the fields present in `patch` (PATCH). An empty patch returns
   * the prompt as it is, without touching `updatedAt`.
   */
  public async patchPrompt(id: string, patch: PromptPatch): Promise<Prompt> {
    return this.storage.withLock(async () => {
      const existing = await this.requirePrompt(id);
      const fields = PATCH_FIELDS.filter(key => isPresent(patch, key));
      if (fields.length === 0) {
        return this.withTags(existing);
      }

      if (isPresent(patch, 'collectionId')) {
        await this.checkCollectionReference(patch.collectionId);
      }
      if (isPresent(patch, 'tagIds')) {
        await this.checkTagReferences(patch.tagIds);
      }

      const record: PromptRecord = { ...existing, updatedAt: new Date().toISOString() };
      if (patch.title !== undefined) record.title = patch.title;
      if (patch.content !== undefined) record.content = patch.content;
      if (isPresent(patch, 'description')) setNullableField(record, 'description', patch.description);
      if (isPresent(patch, 'collectionId')) setNullableField(record, 'collectionId', patch.collectionId);

      const saved = await this.save(record);
      if (patch.tagIds !== undefined) {
        await this.associations.replace(id, patch.tagIds);
      }
      this.logger.info({ promptId: id, fields }, 'Prompt patched');
      return this.withTags(saved);
    });
  }

  /**
   * Delete a prompt and its association entry.
   */
  public async deletePrompt(id: string): Promise<void> {
    await this.storage.withLock(async () => {
      await this.requirePrompt(id);
      await this.associations.onPromptDeleted(id);
      await this.storage.deletePrompt(id);
      this.logger.info({ promptId: id }, 'Prompt deleted');
    });
  }

  /**
   * Attach tags to a prompt. Already attached ids are ignored; if any id is
   * unknown the prompt is left untouched.
   */
  public async attachTags(id: string, tagIds: string[]): Promise<Prompt> {
    return this.storage.withLock(async () => {
      const existing = await this.requirePrompt(id);
      await this.checkTagReferences(tagIds);
      await this.associations.attach(id, tagIds);
      this.logger.debug({ promptId: id, tagIds }, 'Tags attached');
      return this.withTags(await this.touch(existing));
    });
  }

  /**
   * Detach tags from a prompt. Ids that are not attached are ignored.
   */
  public async detachTags(id: string, tagIds: string[]): Promise<Prompt> {
    return this.storage.withLock(async () => {
      const existing = await this.requirePrompt(id);
      await this.associations.detach(id, tagIds);
      this.logger.debug({ promptId: id, tagIds }, 'Tags detached');
      return this.withTags(await this.touch(existing));
    });
  }

  private async withTags(record: PromptRecord): Promise<Prompt> {
    return { ...record, tags: await this.associations.tagsFor(record.id) };
  }

  private async requirePrompt(id: string): Promise<PromptRecord> {
    const prompt = await this.storage.getPrompt(id);
    if (!prompt) {
      throw new NotFoundError(`Prompt not found: ${id}`);
    }
    return prompt;
  }

  private async save(record: PromptRecord): Promise<PromptRecord> {
    const saved = await this.storage.updatePrompt(record.id, record);
    if (!saved) {
      throw new NotFoundError(`Prompt not found: ${record.id}`);
    }
    return saved;
  }

  private async touch(record: PromptRecord): Promise<PromptRecord> {
    return this.save({ ...record, updatedAt: new Date().toISOString() });
  }

  private async checkCollectionReference(collectionId: string | null | undefined): Promise<void> {
    if (collectionId === null || collectionId === undefined) {
      return;
    }
    if (!(await this.storage.getCollection(collectionId))) {
      throw new ReferentialError(`Collection not found: ${collectionId}`, [collectionId]);
    }
  }

  private async checkTagReferences(tagIds: string[] | undefined): Promise<void> {
    if (!tagIds || tagIds.length === 0) {
      return;
    }
    const missing = await this.associations.findMissingTagIds(tagIds);
    if (missing.length > 0) {
      throw new ReferentialError(`Tag(s) not found: ${missing.join(', ')}`, missing);
    }
  }
}
