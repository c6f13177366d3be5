import type http from 'http';
import { pino } from 'pino';

import { MemoryAdapter } from '../src/adapters.js';
import { CollectionService } from '../src/collection-service.js';
import { PromptService } from '../src/prompt-service.js';
import { TagAssociations } from '../src/tag-associations.js';
import { TagService } from '../src/tag-service.js';

export const silentLogger = pino({ level: 'silent' });

/**
 * A connected memory adapter with every service wired to it.
 */
export async function createTestContext() {
  const adapter = new MemoryAdapter();
  await adapter.connect();
  const associations = new TagAssociations(adapter);
  return {
    adapter,
    associations,
    collectionService: new CollectionService(adapter, associations, silentLogger),
    promptService: new PromptService(adapter, associations, silentLogger),
    tagService: new TagService(adapter, associations, silentLogger),
  };
}

// Helper for closing an HTTP server started by a test
export function closeServer(server: http.Server | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server || !server.listening) {
      return resolve();
    }

    server.keepAliveTimeout = 1;
    server.closeAllConnections();
    server.close(err => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
