/**
 * @polystore/storage-mongodb
 *
 * MongoDB document store adapter for Polystore
 *
 * @example
 * ```typescript
 * import { DocumentStore, createDocumentStoreRegistry } from '@polystore/core';
 * import { registerMongoDocumentStore } from '@polystore/storage-mongodb';
 *
 * const registry = createDocumentStoreRegistry();
 * registerMongoDocumentStore(registry);
 *
 * const store = new DocumentStore(
 *   { framework: 'mongodb', connection: { host: 'localhost', port: 27017, database: 'app' } },
 *   { registry }
 * );
 * ```
 */

import type { DocumentStoreRegistry, RegisterOptions } from '@polystore/core';
import { mongoDocumentStoreFactory } from './adapter.js';

export {
  MongoDocumentStoreAdapter,
  classifyMongoError,
  createMongoClientOptions,
  mongoDocumentStoreFactory,
  toMongoFilter,
} from './adapter.js';

/**
 * Register the `mongodb` framework on a document store registry
 */
export function registerMongoDocumentStore(registry: DocumentStoreRegistry, options: RegisterOptions = {}): void {
  registry.register('mongodb', mongoDocumentStoreFactory, options);
}
