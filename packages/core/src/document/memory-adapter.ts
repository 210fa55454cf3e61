import { randomUUID } from 'crypto';
import { OperationalError } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { Document, DocumentChanges, DocumentFilter, Logger } from '../types.js';
import { applyChanges, equalityFields, matchesFilter, project } from './matching.js';
import type { DocumentStoreAdapter, ResolvedFindOptions, ResolvedUpdateOptions } from './types.js';

/**
 * InMemoryDocumentStoreAdapter - document store for testing and development
 *
 * Collections live in memory (lost on restart) and survive `close()` /
 * `connect()` cycles of the same instance. Documents are cloned on the way
 * in and out, so callers never share references with the store.
 *
 * Bulk operations apply their items in order and stop at the first failure;
 * items applied before it stay applied.
 *
 * @example
 * ```typescript
 * const adapter = new InMemoryDocumentStoreAdapter();
 * await adapter.connect();
 *
 * const id = await adapter.insertDocument('users', { name: 'Ada' });
 * const [user] = await adapter.findDocuments('users', { _id: id }, { skip: 0, limit: 0 });
 * ```
 */
export class InMemoryDocumentStoreAdapter implements DocumentStoreAdapter {
  readonly framework = 'memory';

  private collections: Map<string, Map<string, Document>> = new Map();
  private connected = false;
  private logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    this.connected = true;
    this.logger.debug('In-memory document store connected');
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    this.logger.debug('In-memory document store closed');
  }

  isConnected(): boolean {
    return this.connected;
  }

  async ping(): Promise<void> {
    this.requireConnection('ping');
  }

  async insertDocument(collection: string, document: Document): Promise<string> {
    this.requireConnection('insert', collection);
    return this.store(collection, document);
  }

  async findDocuments(collection: string, filter: DocumentFilter, options: ResolvedFindOptions): Promise<Document[]> {
    this.requireConnection('find', collection);
    const context = { operation: 'find', collection };

    const matches = this.entries(collection).filter((document) => matchesFilter(document, filter, context));
    const end = options.limit > 0 ? options.skip + options.limit : undefined;
    const page = matches.slice(options.skip, end);

    return page.map((document) =>
      options.projection ? project(document, options.projection) : structuredClone(document)
    );
  }

  async updateDocuments(
    collection: string,
    filter: DocumentFilter,
    changes: DocumentChanges,
    options: ResolvedUpdateOptions
  ): Promise<number> {
    this.requireConnection('update', collection);
    return this.applyUpdate(collection, filter, changes, options);
  }

  async deleteDocuments(collection: string, filter: DocumentFilter): Promise<number> {
    this.requireConnection('delete', collection);
    return this.remove(collection, filter);
  }

  async insertDocuments(collection: string, documents: Document[]): Promise<string[]> {
    this.requireConnection('bulkInsert', collection);

    const ids: string[] = [];
    for (const document of documents) {
      ids.push(this.store(collection, document));
    }
    return ids;
  }

  async bulkUpdateDocuments(
    collection: string,
    filter: DocumentFilter,
    changes: DocumentChanges[],
    options: ResolvedUpdateOptions
  ): Promise<number> {
    this.requireConnection('bulkUpdate', collection);

    let count = 0;
    for (const payload of changes) {
      count += this.applyUpdate(collection, filter, payload, options);
    }
    return count;
  }

  async bulkDeleteDocuments(collection: string, filters: DocumentFilter[]): Promise<number> {
    this.requireConnection('bulkDelete', collection);

    let count = 0;
    for (const filter of filters) {
      count += this.remove(collection, filter);
    }
    return count;
  }

  /**
   * Drop every collection (useful for testing)
   */
  clear(): void {
    this.collections.clear();
  }

  private requireConnection(operation: string, collection?: string): void {
    if (!this.connected) {
      throw new OperationalError('In-memory document store is not connected', { operation, collection });
    }
  }

  private documents(collection: string): Map<string, Document> {
    let documents = this.collections.get(collection);
    if (!documents) {
      documents = new Map();
      this.collections.set(collection, documents);
    }
    return documents;
  }

  private entries(collection: string): Document[] {
    return Array.from(this.collections.get(collection)?.values() ?? []);
  }

  private store(collection: string, document: Document): string {
    const documents = this.documents(collection);
    const id = document._id ?? randomUUID();

    if (documents.has(id)) {
      throw new OperationalError(`Duplicate _id '${id}'`, { operation: 'insert', collection });
    }

    documents.set(id, { ...structuredClone(document), _id: id });
    return id;
  }

  private applyUpdate(
    collection: string,
    filter: DocumentFilter,
    changes: DocumentChanges,
    options: ResolvedUpdateOptions
  ): number {
    const context = { operation: 'update', collection };
    const matches = this.entries(collection).filter((document) => matchesFilter(document, filter, context));

    if (matches.length === 0) {
      if (!options.upsert) return 0;

      const seed = equalityFields(filter);
      const seedId = typeof seed._id === 'string' ? seed._id : undefined;
      this.store(collection, applyChanges({ ...seed, _id: seedId }, changes, context));
      return 1;
    }

    // A payload that fails on any match writes nothing
    const documents = this.documents(collection);
    const updated = matches.map((document) => applyChanges(document, changes, context));
    for (const document of updated) {
      if (document._id !== undefined) {
        documents.set(document._id, document);
      }
    }
    return matches.length;
  }

  private remove(collection: string, filter: DocumentFilter): number {
    const documents = this.collections.get(collection);
    if (!documents) return 0;

    const context = { operation: 'delete', collection };
    let count = 0;
    for (const [id, document] of documents) {
      if (matchesFilter(document, filter, context)) {
        documents.delete(id);
        count++;
      }
    }
    return count;
  }
}
