import { AdapterRegistry } from '../registry/index.js';
import { InMemoryDocumentStoreAdapter } from './memory-adapter.js';
import type { DocumentStoreAdapterFactory, DocumentStoreRegistry } from './types.js';

export const memoryDocumentStoreFactory: DocumentStoreAdapterFactory = {
  createClient: (_config, logger) => new InMemoryDocumentStoreAdapter(logger),
  metadata: {
    packageName: '@polystore/core',
    description: 'In-memory document store for tests and development',
  },
};

/**
 * Fresh document store registry with the `memory` framework registered
 */
export function createDocumentStoreRegistry(): DocumentStoreRegistry {
  const registry: DocumentStoreRegistry = new AdapterRegistry();
  registry.register('memory', memoryDocumentStoreFactory);
  return registry;
}
