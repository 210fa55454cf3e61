export { DocumentStore } from './document-store.js';
export type { DocumentStoreEvents, DocumentStoreOptions } from './document-store.js';
export { InMemoryDocumentStoreAdapter } from './memory-adapter.js';
export { createDocumentStoreRegistry, memoryDocumentStoreFactory } from './factories.js';
export { isOperatorKey, isPlainObject, normalizeChanges } from './validation.js';
export { matchesFilter, applyChanges } from './matching.js';
export type {
  DocumentStoreAdapter,
  DocumentStoreAdapterFactory,
  DocumentStoreRegistry,
  ResolvedFindOptions,
  ResolvedUpdateOptions,
} from './types.js';
