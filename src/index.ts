#!/usr/bin/env node
import type http from 'http';

import { adapterFactory } from './adapters.js';
import { CollectionService } from './collection-service.js';
import { loadConfig } from './config.js';
import { startHttpServer } from './http-server.js';
import { PromptService } from './prompt-service.js';
import { TagAssociations } from './tag-associations.js';
import { TagService } from './tag-service.js';
import { createLogger } from './utils.js';

async function main() {
  const env = loadConfig();
  const logger = createLogger(env);

  const storageAdapter = adapterFactory(env, logger);
  await storageAdapter.connect();

  const associations = new TagAssociations(storageAdapter);
  const promptService = new PromptService(storageAdapter, associations, logger);
  const tagService = new TagService(storageAdapter, associations, logger);
  const collectionService = new CollectionService(storageAdapter, associations, logger);

  let httpServer: http.Server;
  try {
    httpServer = await startHttpServer(
      {
        corsOrigin: env.CORS_ORIGIN,
        host: env.HOST,
        port: env.PORT,
        version: env.VERSION,
      },
      { collectionService, promptService, tagService },
      logger,
    );
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }

  logger.info(`${env.NAME} ${env.VERSION} started on ${env.HOST}:${env.PORT}`);

  /**
   * Graceful shutdown handler
   */
  async function shutdown() {
    logger.info('Shutting down...');
    await new Promise<void>((resolve, reject) => {
      if (httpServer.listening) {
        httpServer.close(err => (err ? reject(err) : resolve()));
      } else {
        resolve();
      }
    });
    await storageAdapter.disconnect();
    logger.info('Server shut down gracefully.');
    process.exit(0);
  }

  const onSignal = () => {
    shutdown().catch(err => {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  process.on('unhandledRejection', reason => {
    logger.error({ err: reason }, 'Unhandled rejection');
    onSignal();
  });
}

main().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
