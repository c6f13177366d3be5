import path from 'path';
import swaggerJSDoc from 'swagger-jsdoc';

const ref = (name: string) => ({ $ref: `#/components/schemas/${name}` });

const components = {
  schemas: {
    Tag: {
      type: 'object',
      properties: {
        id: { type: 'string', format: 'uuid' },
        name: { type: 'string', pattern: '^[a-z0-9_-]+$', maxLength: 50 },
        createdAt: { type: 'string', format: 'date-time' },
      },
    },
    TagWithCount: {
      allOf: [ref('Tag'), { type: 'object', properties: { promptCount: { type: 'integer', minimum: 0 } } }],
    },
    TagInput: {
      type: 'object',
      required: ['name'],
      properties: { name: { type: 'string', description: 'Trimmed and lowercased before validation' } },
    },
    Prompt: {
      type: 'object',
      properties: {
        id: { type: 'string', format: 'uuid' },
        title: { type: 'string', minLength: 1, maxLength: 200 },
        content: { type: 'string', minLength: 1 },
        description: { type: 'string', maxLength: 500 },
        collectionId: { type: 'string' },
        createdAt: { type: 'string', format: 'date-time' },
        updatedAt: { type: 'string', format: 'date-time' },
        tags: { type: 'array', items: ref('Tag') },
      },
    },
    PromptInput: {
      type: 'object',
      required: ['title', 'content'],
      properties: {
        title: { type: 'string', minLength: 1, maxLength: 200 },
        content: { type: 'string', minLength: 1 },
        description: { type: 'string', maxLength: 500, nullable: true },
        collectionId: { type: 'string', nullable: true },
        tagIds: { type: 'array', items: { type: 'string' } },
      },
    },
    Collection: {
      type: 'object',
      properties: {
        id: { type: 'string', format: 'uuid' },
        name: { type: 'string', minLength: 1, maxLength: 100 },
        description: { type: 'string', maxLength: 500 },
        createdAt: { type: 'string', format: 'date-time' },
      },
    },
    CollectionInput: {
      type: 'object',
      required: ['name'],
      properties: {
        name: { type: 'string', minLength: 1, maxLength: 100 },
        description: { type: 'string', maxLength: 500, nullable: true },
      },
    },
    TagAssignment: {
      type: 'object',
      required: ['tagIds'],
      properties: { tagIds: { type: 'array', minItems: 1, items: { type: 'string' } } },
    },
    Error: {
      type: 'object',
      properties: {
        error: {
          type: 'object',
          properties: {
            code: { type: 'string' },
            message: { type: 'string' },
            details: {},
          },
        },
      },
    },
  },
  parameters: {
    PromptId: { in: 'path', name: 'promptId', required: true, schema: { type: 'string' } },
    CollectionId: { in: 'path', name: 'collectionId', required: true, schema: { type: 'string' } },
    TagId: { in: 'path', name: 'tagId', required: true, schema: { type: 'string', format: 'uuid' } },
  },
  responses: {
    Error: {
      description: 'Error body',
      content: { 'application/json': { schema: ref('Error') } },
    },
  },
};

/**
 * OpenAPI document served under /api-docs. Paths come from the `@openapi`
 * blocks on the routes in http-server.
 */
export function buildOpenApiDocument(version: string) {
  const swaggerDefinition = {
    openapi: '3.0.0',
    info: {
      title: 'PromptLab API',
      version,
      description: 'Prompts, collections and tags',
    },
    components,
  };

  const swaggerOptions = {
    swaggerDefinition,
    apis: [path.join(__dirname, 'http-server.{ts,js}')],
  };
  return swaggerJSDoc(swaggerOptions);
}
