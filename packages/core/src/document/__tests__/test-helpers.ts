import { vi } from 'vitest';
import { silentLogger } from '../../logger.js';
import type { Document, DocumentChanges, DocumentFilter } from '../../types.js';
import { DocumentStore } from '../document-store.js';
import { createDocumentStoreRegistry } from '../factories.js';
import type { DocumentStoreAdapter, ResolvedFindOptions, ResolvedUpdateOptions } from '../types.js';

/**
 * Adapter whose primitives are all spies, for asserting what the facade forwards
 */
export function createSpyDocumentAdapter() {
  let connected = false;

  return {
    framework: 'spy',
    connect: vi.fn(async (): Promise<void> => {
      connected = true;
    }),
    close: vi.fn(async (): Promise<void> => {
      connected = false;
    }),
    isConnected: vi.fn((): boolean => connected),
    ping: vi.fn(async (): Promise<void> => {}),
    insertDocument: vi.fn(async (_collection: string, _document: Document): Promise<string> => 'spy-id'),
    findDocuments: vi.fn(
      async (_collection: string, _filter: DocumentFilter, _options: ResolvedFindOptions): Promise<Document[]> => []
    ),
    updateDocuments: vi.fn(
      async (
        _collection: string,
        _filter: DocumentFilter,
        _changes: DocumentChanges,
        _options: ResolvedUpdateOptions
      ): Promise<number> => 1
    ),
    deleteDocuments: vi.fn(async (_collection: string, _filter: DocumentFilter): Promise<number> => 1),
    insertDocuments: vi.fn(
      async (_collection: string, documents: Document[]): Promise<string[]> => documents.map((_d, i) => `spy-${i}`)
    ),
    bulkUpdateDocuments: vi.fn(
      async (
        _collection: string,
        _filter: DocumentFilter,
        changes: DocumentChanges[],
        _options: ResolvedUpdateOptions
      ): Promise<number> => changes.length
    ),
    bulkDeleteDocuments: vi.fn(
      async (_collection: string, filters: DocumentFilter[]): Promise<number> => filters.length
    ),
  } satisfies DocumentStoreAdapter;
}

export type SpyDocumentAdapter = ReturnType<typeof createSpyDocumentAdapter>;

/**
 * DocumentStore wired to a spy adapter through a registry
 */
export function createSpyDocumentStore(adapter: SpyDocumentAdapter = createSpyDocumentAdapter()) {
  const createClient = vi.fn(() => adapter);
  const registry = createDocumentStoreRegistry();
  registry.register('spy', { createClient });

  const store = new DocumentStore(
    { framework: 'spy', connection: { host: 'localhost' } },
    { registry, logger: silentLogger }
  );

  return { store, adapter, createClient };
}

export function createMemoryDocumentStore(): DocumentStore {
  return new DocumentStore(
    { framework: 'memory', connection: { uri: 'memory://test' } },
    { logger: silentLogger }
  );
}
