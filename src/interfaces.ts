/**
 * Unified Interface Definitions
 * Contains the entity, storage and service contracts for the PromptLab API
 */

/**
 * A label attached to prompts. `name` is always stored normalized.
 */
export interface Tag {
  /** Unique identifier (UUID v4) */
  id: string;

  /** Normalized name: lowercase letters, digits, `-` and `_`, 1-50 characters */
  name: string;

  /** Date when the tag was created (ISO string) */
  createdAt: string;
}

export interface TagWithCount extends Tag {
  /** Number of prompts currently carrying this tag */
  promptCount: number;
}

/**
 * A prompt as it sits in storage. Tags live in the association index,
 * never on the record.
 */
export interface PromptRecord {
  /** Unique identifier (UUID v4) */
  id: string;

  /** Display name of the prompt */
  title: string;

  /** The prompt template text; may contain `{{variable}}` placeholders */
  content: string;

  /** Optional short summary */
  description?: string;

  /** Collection the prompt belongs to, if any */
  collectionId?: string;

  /** Date when the prompt was created (ISO string) */
  createdAt: string;

  /** Date when the prompt was last updated (ISO string) */
  updatedAt: string;
}

/**
 * A prompt as returned by every read: the record joined with its tags,
 * sorted by name.
 */
export interface Prompt extends PromptRecord {
  tags: Tag[];
}

/**
 * A folder grouping prompts.
 */
export interface Collection {
  id: string;
  name: string;
  description?: string;
  createdAt: string;
}

export type TagMatchMode = 'all' | 'any';

/**
 * Options for listing prompts
 */
export interface ListPromptsOptions {
  /** Keep only prompts in this collection */
  collectionId?: string;

  /** Case-insensitive substring of title or description */
  search?: string;

  /** Normalized tag names to filter on */
  tags?: string[];

  /** How `tags` is combined, `all` when omitted */
  tagMatch?: TagMatchMode;
}

export interface CreatePromptParams {
  title: string;
  content: string;
  description?: string | null;
  collectionId?: string | null;
  tagIds?: string[];
}

/**
 * Full replacement of a prompt's editable fields (PUT).
 * `tagIds` replaces the tag set only when supplied.
 */
export type ReplacePromptParams = CreatePromptParams;

/**
 * Partial update (PATCH). An absent key leaves the field untouched;
 * `null` clears the nullable fields.
 */
export interface PromptPatch {
  title?: string;
  content?: string;
  description?: string | null;
  collectionId?: string | null;
  tagIds?: string[];
}

export interface CreateCollectionParams {
  name: string;
  description?: string | null;
}

/**
 * Storage primitives. No business rules live behind this interface.
 */
export interface StorageAdapter {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): Promise<boolean>;
  healthCheck?(): Promise<boolean>;

  /**
   * Runs `fn` once every critical section queued before it has settled.
   * Not reentrant: `fn` must not call `withLock` again.
   */
  withLock<T>(fn: () => Promise<T>): Promise<T>;

  /** Drops every entity and association. Test isolation only. */
  clearAll(): Promise<void>;

  savePrompt(prompt: PromptRecord): Promise<PromptRecord>;
  getPrompt(id: string): Promise<PromptRecord | null>;
  listPrompts(): Promise<PromptRecord[]>;
  /** Returns null, and stores nothing, when the id is unknown. */
  updatePrompt(id: string, prompt: PromptRecord): Promise<PromptRecord | null>;
  deletePrompt(id: string): Promise<boolean>;

  saveCollection(collection: Collection): Promise<Collection>;
  getCollection(id: string): Promise<Collection | null>;
  listCollections(): Promise<Collection[]>;
  updateCollection(id: string, collection: Collection): Promise<Collection | null>;
  deleteCollection(id: string): Promise<boolean>;

  saveTag(tag: Tag): Promise<Tag>;
  getTag(id: string): Promise<Tag | null>;
  getTagByName(name: string): Promise<Tag | null>;
  listTags(): Promise<Tag[]>;
  deleteTag(id: string): Promise<boolean>;

  /** A copy of the prompt's tag id set; empty when it has none. */
  getPromptTagIds(promptId: string): Promise<Set<string>>;
  setPromptTagIds(promptId: string, tagIds: Iterable<string>): Promise<void>;
  deletePromptTagIds(promptId: string): Promise<boolean>;
  listPromptTagEntries(): Promise<Array<[string, Set<string>]>>;
}
