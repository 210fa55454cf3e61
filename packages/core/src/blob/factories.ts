import { AdapterRegistry } from '../registry/index.js';
import { InMemoryBlobStoreAdapter } from './memory-adapter.js';
import type { BlobStoreAdapterFactory, BlobStoreRegistry } from './types.js';

/**
 * In-memory blob store; the root bucket exists from the start and the
 * configured secret key signs presigned URLs.
 */
export const memoryBlobStoreFactory: BlobStoreAdapterFactory = {
  createClient: (config, logger) =>
    new InMemoryBlobStoreAdapter({
      secret: config.connection.secretKey,
      buckets: [config.rootBucket],
      logger,
    }),
  metadata: {
    packageName: '@polystore/core',
    description: 'In-memory blob store for tests and development',
  },
};

/**
 * Fresh blob store registry with the `memory` framework registered
 */
export function createBlobStoreRegistry(): BlobStoreRegistry {
  const registry: BlobStoreRegistry = new AdapterRegistry();
  registry.register('memory', memoryBlobStoreFactory);
  return registry;
}
