import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import http from 'http';
import type { Logger } from 'pino';
import swaggerUi from 'swagger-ui-express';
import { z } from 'zod';

import type { CollectionService } from './collection-service.js';
import { AppError, HttpErrorCode } from './errors.js';
import { buildOpenApiDocument } from './openapi.js';
import type { PromptService } from './prompt-service.js';
import { collectionSchemas, promptSchemas, tagSchemas } from './schemas.js';
import { parseTagMatchMode, parseTagNames } from './tag-filter.js';
import type { TagService } from './tag-service.js';

export interface HttpServerConfig {
  port: number;
  host: string;
  corsOrigin?: string;
  version: string;
}

export interface ServerServices {
  promptService: PromptService;
  tagService: TagService;
  collectionService: CollectionService;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * The 4xx status carried by a body-parser error (oversized body, unsupported
 * charset or encoding), if any.
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) {
    return undefined;
  }
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

const CLIENT_ERROR_CODES: Record<number, HttpErrorCode> = {
  413: HttpErrorCode.PAYLOAD_TOO_LARGE,
  415: HttpErrorCode.UNSUPPORTED_MEDIA_TYPE,
};

/**
 * Maps thrown errors to `{ error: { code, message, details } }` responses.
 */
export function createErrorHandler(logger: Logger): express.ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (err instanceof z.ZodError) {
      res.status(422).json({
        error: {
          code: HttpErrorCode.VALIDATION_ERROR,
          message: 'Invalid input data.',
          details: err.errors,
        },
      });
      return;
    }
    if (err instanceof AppError) {
      logger.debug({ err, path: req.path }, err.message);
      res.status(err.statusCode).json({
        error: {
          code: err.code,
          message: err.message,
          details: err.details,
        },
      });
      return;
    }
    if (isBodyParseError(err)) {
      res.status(400).json({
        error: {
          code: HttpErrorCode.BAD_REQUEST,
          message: 'Request body is not valid JSON.',
        },
      });
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      logger.debug({ err, path: req.path, status }, 'Rejected request body');
      res.status(status).json({
        error: {
          code: CLIENT_ERROR_CODES[status] ?? HttpErrorCode.BAD_REQUEST,
          message: err instanceof Error ? err.message : 'Bad request.',
        },
      });
      return;
    }
    logger.error({ err, path: req.path }, 'Unhandled error');
    res.status(500).json({
      error: {
        code: HttpErrorCode.INTERNAL_SERVER_ERROR,
        message: 'An unexpected error occurred',
      },
    });
  };
}

const catchAsync = (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) => {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
};

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createApp(
  config: Pick<HttpServerConfig, 'corsOrigin' | 'version'>,
  services: ServerServices,
  logger: Logger,
): express.Express {
  const app = express();
  const { promptService, tagService, collectionService } = services;

  // Middleware
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin || '*' }));
  app.use(express.json());

  // Swagger docs
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(buildOpenApiDocument(config.version)));

  /**
   * @openapi
   * /health:
   *   get:
   *     summary: Health check
   *     responses:
   *       200:
   *         description: Service is healthy
   */
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'healthy', version: config.version });
  });

  // --- Prompts ---

  /**
   * @openapi
   * /prompts:
   *   get:
   *     summary: List prompts, newest first
   *     parameters:
   *       - in: query
   *         name: collectionId
   *         description: Also accepted as collection_id
   *         schema:
   *           type: string
   *       - in: query
   *         name: search
   *         schema:
   *           type: string
   *       - in: query
   *         name: tags
   *         description: Comma-separated tag names
   *         schema:
   *           type: string
   *       - in: query
   *         name: tagMatch
   *         description: Also accepted as tag_match
   *         schema:
   *           type: string
   *           enum: [all, any]
   *           default: all
   *       - in: query
   *         name: tag_match
   *         schema:
   *           type: string
   *           enum: [all, any]
   *       - in: query
   *         name: collection_id
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Prompts with a total count
   *   post:
   *     summary: Create a prompt
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/PromptInput'
   *     responses:
   *       201:
   *         description: Created
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Prompt'
   *       400:
   *         $ref: '#/components/responses/Error'
   *       422:
   *         $ref: '#/components/responses/Error'
   */

  app.get(
    '/prompts',
    catchAsync(async (req, res) => {
      const prompts = await promptService.listPrompts({
        collectionId: queryString(req.query.collectionId ?? req.query.collection_id),
        search: queryString(req.query.search),
        tagMatch: parseTagMatchMode(req.query.tagMatch ?? req.query.tag_match),
        tags: parseTagNames(req.query.tags),
      });
      res.json({ prompts, total: prompts.length });
    }),
  );

  /**
   * @openapi
   * /prompts/{promptId}:
   *   parameters:
   *     - $ref: '#/components/parameters/PromptId'
   *   get:
   *     summary: Get a prompt
   *     responses:
   *       200:
   *         description: The prompt
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Prompt'
   *       404:
   *         $ref: '#/components/responses/Error'
   *   put:
   *     summary: Replace a prompt
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/PromptInput'
   *     responses:
   *       200:
   *         description: Updated
   *       400:
   *         $ref: '#/components/responses/Error'
   *       404:
   *         $ref: '#/components/responses/Error'
   *   patch:
   *     summary: Partially update a prompt
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/PromptInput'
   *     responses:
   *       200:
   *         description: Updated
   *       400:
   *         $ref: '#/components/responses/Error'
   *       404:
   *         $ref: '#/components/responses/Error'
   *   delete:
   *     summary: Delete a prompt
   *     responses:
   *       204:
   *         description: Deleted
   *       404:
   *         $ref: '#/components/responses/Error'
   */
  app.get(
    '/prompts/:promptId',
    catchAsync(async (req, res) => {
      res.json(await promptService.getPrompt(req.params.promptId));
    }),
  );

  app.post(
    '/prompts',
    catchAsync(async (req, res) => {
      const body = promptSchemas.create.parse(req.body);
      res.status(201).json(await promptService.createPrompt(body));
    }),
  );

  app.put(
    '/prompts/:promptId',
    catchAsync(async (req, res) => {
      const body = promptSchemas.replace.parse(req.body);
      res.json(await promptService.replacePrompt(req.params.promptId, body));
    }),
  );

  app.patch(
    '/prompts/:promptId',
    catchAsync(async (req, res) => {
      const patch = promptSchemas.patch.parse(req.body);
      res.json(await promptService.patchPrompt(req.params.promptId, patch));
    }),
  );

  app.delete(
    '/prompts/:promptId',
    catchAsync(async (req, res) => {
      await promptService.deletePrompt(req.params.promptId);
      res.status(204).end();
    }),
  );

  /**
   * @openapi
   * /prompts/{promptId}/tags:
   *   parameters:
   *     - $ref: '#/components/parameters/PromptId'
   *   post:
   *     summary: Attach tags
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/TagAssignment'
   *     responses:
   *       200:
   *         description: Prompt with its tags
   *       400:
   *         $ref: '#/components/responses/Error'
   *       404:
   *         $ref: '#/components/responses/Error'
   *   delete:
   *     summary: Detach tags
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/TagAssignment'
   *     responses:
   *       200:
   *         description: Prompt with its tags
   *       404:
   *         $ref: '#/components/responses/Error'
   */
  app.post(
    '/prompts/:promptId/tags',
    catchAsync(async (req, res) => {
      const { tagIds } = promptSchemas.tagAssignment.parse(req.body);
      res.json(await promptService.attachTags(req.params.promptId, tagIds));
    }),
  );

  app.delete(
    '/prompts/:promptId/tags',
    catchAsync(async (req, res) => {
      const { tagIds } = promptSchemas.tagAssignment.parse(req.body);
      res.json(await promptService.detachTags(req.params.promptId, tagIds));
    }),
  );

  // --- Collections ---

  /**
   * @openapi
   * /collections:
   *   get:
   *     summary: List collections
   *     responses:
   *       200:
   *         description: Collections with a total count
   *   post:
   *     summary: Create a collection
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/CollectionInput'
   *     responses:
   *       201:
   *         description: Created
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Collection'
   *       422:
   *         $ref: '#/components/responses/Error'
   */

  app.get(
    '/collections',
    catchAsync(async (_req, res) => {
      const collections = await collectionService.listCollections();
      res.json({ collections, total: collections.length });
    }),
  );

  /**
   * @openapi
   * /collections/{collectionId}:
   *   parameters:
   *     - $ref: '#/components/parameters/CollectionId'
   *   get:
   *     summary: Get a collection
   *     responses:
   *       200:
   *         description: The collection
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Collection'
   *       404:
   *         $ref: '#/components/responses/Error'
   *   delete:
   *     summary: Delete a collection and its prompts
   *     responses:
   *       204:
   *         description: Deleted
   *       404:
   *         $ref: '#/components/responses/Error'
   */
  app.get(
    '/collections/:collectionId',
    catchAsync(async (req, res) => {
      res.json(await collectionService.getCollection(req.params.collectionId));
    }),
  );

  app.post(
    '/collections',
    catchAsync(async (req, res) => {
      const body = collectionSchemas.create.parse(req.body);
      res.status(201).json(await collectionService.createCollection(body));
    }),
  );

  app.delete(
    '/collections/:collectionId',
    catchAsync(async (req, res) => {
      await collectionService.deleteCollection(req.params.collectionId);
      res.status(204).end();
    }),
  );

  // --- Tags ---

  /**
   * @openapi
   * /tags:
   *   get:
   *     summary: List tags with prompt counts
   *     responses:
   *       200:
   *         description: Tags with a total count
   *   post:
   *     summary: Create a tag
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/TagInput'
   *     responses:
   *       201:
   *         description: Created
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Tag'
   *       409:
   *         $ref: '#/components/responses/Error'
   *       422:
   *         $ref: '#/components/responses/Error'
   */

  app.get(
    '/tags',
    catchAsync(async (_req, res) => {
      const tags = await tagService.listTags();
      res.json({ tags, total: tags.length });
    }),
  );

  app.post(
    '/tags',
    catchAsync(async (req, res) => {
      const { name } = tagSchemas.create.parse(req.body);
      res.status(201).json(await tagService.createTag(name));
    }),
  );

  /**
   * @openapi
   * /tags/{tagId}:
   *   parameters:
   *     - $ref: '#/components/parameters/TagId'
   *   get:
   *     summary: Get a tag with its prompt count
   *     responses:
   *       200:
   *         description: The tag
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/TagWithCount'
   *       404:
   *         $ref: '#/components/responses/Error'
   *       422:
   *         $ref: '#/components/responses/Error'
   *   delete:
   *     summary: Delete a tag and detach it from every prompt
   *     responses:
   *       204:
   *         description: Deleted
   *       404:
   *         $ref: '#/components/responses/Error'
   * /tags/{tagId}/prompts:
   *   parameters:
   *     - $ref: '#/components/parameters/TagId'
   *   get:
   *     summary: Prompts carrying a tag, newest first
   *     responses:
   *       200:
   *         description: Prompts with a total count
   *       404:
   *         $ref: '#/components/responses/Error'
   */
  app.get(
    '/tags/:tagId',
    catchAsync(async (req, res) => {
      res.json(await tagService.getTag(tagSchemas.id.parse(req.params.tagId)));
    }),
  );

  app.get(
    '/tags/:tagId/prompts',
    catchAsync(async (req, res) => {
      const prompts = await tagService.listPromptsForTag(tagSchemas.id.parse(req.params.tagId));
      res.json({ prompts, total: prompts.length });
    }),
  );

  app.delete(
    '/tags/:tagId',
    catchAsync(async (req, res) => {
      await tagService.deleteTag(tagSchemas.id.parse(req.params.tagId));
      res.status(204).end();
    }),
  );

  app.use(createErrorHandler(logger));

  return app;
}

/**
 * Builds the app and starts listening. Resolves once the port is bound.
 */
export async function startHttpServer(
  config: HttpServerConfig,
  services: ServerServices,
  logger: Logger,
): Promise<http.Server> {
  const app = createApp(config, services, logger);
  const server = http.createServer(app);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  logger.info(`HTTP server listening on ${config.host}:${config.port}`);
  return server;
}
