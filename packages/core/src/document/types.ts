import type { DocumentStoreConfiguration } from '../config/index.js';
import type { AdapterFactory, AdapterRegistry } from '../registry/index.js';
import type { Document, DocumentChanges, DocumentFilter, Projection } from '../types.js';

/**
 * Find options after the store has applied defaults and validated them
 */
export interface ResolvedFindOptions {
  projection?: Projection;
  skip: number;
  /** 0 = unbounded */
  limit: number;
}

export interface ResolvedUpdateOptions {
  upsert: boolean;
}

/**
 * DocumentStoreAdapter - contract every document backend implements
 *
 * Adapters receive arguments that the `DocumentStore` facade has already
 * validated: collection names are non-empty, filters and documents are plain
 * objects, and update payloads are in operator form (`{ $set: {...} }`).
 *
 * Implementations:
 * - InMemoryDocumentStoreAdapter - for tests and development
 * - MongoDocumentStoreAdapter - `@polystore/storage-mongodb`
 */
export interface DocumentStoreAdapter {
  readonly framework: string;

  /**
   * Open the backend connection. Calling it while connected is a no-op.
   */
  connect(): Promise<void>;

  /**
   * Release the connection. Calling it while disconnected is a no-op.
   */
  close(): Promise<void>;

  isConnected(): boolean;

  /**
   * Round-trip to the backend, used by health checks
   */
  ping(): Promise<void>;

  /**
   * @returns Identifier of the new document
   */
  insertDocument(collection: string, document: Document): Promise<string>;

  findDocuments(collection: string, filter: DocumentFilter, options: ResolvedFindOptions): Promise<Document[]>;

  /**
   * Apply `changes` to every document matching `filter`
   *
   * @returns Matched documents plus upserted ones
   */
  updateDocuments(
    collection: string,
    filter: DocumentFilter,
    changes: DocumentChanges,
    options: ResolvedUpdateOptions
  ): Promise<number>;

  /**
   * @returns Number of documents removed
   */
  deleteDocuments(collection: string, filter: DocumentFilter): Promise<number>;

  /**
   * @returns Identifiers in input order
   */
  insertDocuments(collection: string, documents: Document[]): Promise<string[]>;

  /**
   * Apply each payload in turn to the documents matching `filter`
   *
   * @returns Sum of the per-payload counts
   */
  bulkUpdateDocuments(
    collection: string,
    filter: DocumentFilter,
    changes: DocumentChanges[],
    options: ResolvedUpdateOptions
  ): Promise<number>;

  /**
   * Delete the documents matching any of `filters`
   *
   * @returns Number of documents removed
   */
  bulkDeleteDocuments(collection: string, filters: DocumentFilter[]): Promise<number>;
}

export type DocumentStoreAdapterFactory = AdapterFactory<DocumentStoreConfiguration, DocumentStoreAdapter>;

export type DocumentStoreRegistry = AdapterRegistry<DocumentStoreConfiguration, DocumentStoreAdapter>;
