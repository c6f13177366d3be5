import { z } from 'zod';

const title = z
  .string({
    invalid_type_error: 'Title must be a string.',
    required_error: 'Title is required.',
  })
  .min(1, { message: 'Title cannot be empty.' })
  .max(200, { message: 'Title cannot be longer than 200 characters.' });

const content = z
  .string({
    invalid_type_error: 'Content must be a string.',
    required_error: 'Content is required.',
  })
  .min(1, { message: 'Content cannot be empty.' });

const description = z
  .string()
  .max(500, { message: 'Description cannot be longer than 500 characters.' })
  .nullish();

const tagIds = z.array(z.string().min(1, { message: 'Tag ids cannot be empty strings.' }));

/**
 * Body of POST /prompts and PUT /prompts/:promptId.
 */
const createPromptSchema = z
  .object({
    collectionId: z.string().nullish(),
    content,
    description,
    tagIds: tagIds.optional(),
    title,
  })
  .strict();

/**
 * Schemas for prompt-related API requests, derived from a base schema
 * to ensure consistency.
 */
export const promptSchemas = {
  create: createPromptSchema,

  /**
   * Full replacement. Same fields as create.
   */
  replace: createPromptSchema,

  /**
   * Partial update. Every key is optional; `description` and
   * `collectionId` accept null to clear the field.
   */
  patch: createPromptSchema.partial(),

  tagAssignment: z
    .object({
      tagIds: tagIds.min(1, { message: 'At least one tag id is required.' }),
    })
    .strict(),
};

export const collectionSchemas = {
  create: z
    .object({
      description,
      name: z
        .string({
          invalid_type_error: 'Name must be a string.',
          required_error: 'Name is required.',
        })
        .min(1, { message: 'Name cannot be empty.' })
        .max(100, { message: 'Name cannot be longer than 100 characters.' }),
    })
    .strict(),
};

export const tagSchemas = {
  /**
   * Only the raw shape is checked here; normalization rules run in the service.
   */
  create: z
    .object({
      name: z.string({
        invalid_type_error: 'Name must be a string.',
        required_error: 'Name is required.',
      }),
    })
    .strict(),

  id: z.string().uuid({ message: 'Tag id must be a valid UUID.' }),
};
