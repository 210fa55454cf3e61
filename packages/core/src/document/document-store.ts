import { EventEmitter } from 'eventemitter3';
import {
  loadDocumentStoreConfigFromEnv,
  parseDocumentStoreConfig,
  type DocumentStoreConfigInput,
  type DocumentStoreConfiguration,
  type EnvLoadOptions,
} from '../config/index.js';
import { ValidationError, errorMessage, toStoreError, type ErrorContext, type StoreError } from '../errors.js';
import { createDefaultLogger } from '../logger.js';
import type {
  Document,
  DocumentChanges,
  DocumentFilter,
  FindOptions,
  HealthStatus,
  Logger,
  LogLevel,
  UpdateOptions,
} from '../types.js';
import { createDocumentStoreRegistry } from './factories.js';
import type { DocumentStoreAdapter, DocumentStoreAdapterFactory, DocumentStoreRegistry } from './types.js';
import {
  normalizeChanges,
  requireCollection,
  requireDocument,
  requireFilter,
  requireList,
  resolveFindOptions,
  resolveUpdateOptions,
} from './validation.js';

export interface DocumentStoreEvents {
  connected: [framework: string];
  closed: [framework: string];
  operationError: [error: StoreError];
}

export interface DocumentStoreOptions {
  /** Registry to resolve `framework` against (default: a fresh registry with `memory`) */
  registry?: DocumentStoreRegistry;
  logger?: Logger;
  logLevel?: LogLevel;
}

/**
 * DocumentStore - backend-agnostic facade over a document store adapter
 *
 * The adapter is resolved from the registry when the store is constructed
 * (so an unknown framework fails immediately) and created on first use.
 * Every operation validates its arguments before reaching the adapter and
 * connects lazily if needed.
 *
 * @example
 * ```typescript
 * const registry = createDocumentStoreRegistry();
 * registerMongoDocumentStore(registry);
 *
 * const store = new DocumentStore(
 *   { framework: 'mongodb', connection: { host: 'localhost', port: 27017, database: 'app' } },
 *   { registry }
 * );
 *
 * await store.withConnection(async (db) => {
 *   const id = await db.insert('users', { name: 'Ada' });
 *   await db.update('users', { _id: id }, { role: 'admin' });
 * });
 * ```
 */
export class DocumentStore extends EventEmitter<DocumentStoreEvents> {
  readonly config: DocumentStoreConfiguration;
  private logger: Logger;
  private factory: DocumentStoreAdapterFactory;
  private adapter?: DocumentStoreAdapter;
  private scopeDepth = 0;

  constructor(config: DocumentStoreConfiguration | DocumentStoreConfigInput, options: DocumentStoreOptions = {}) {
    super();
    this.config = parseDocumentStoreConfig(config);
    this.logger = options.logger || createDefaultLogger(options.logLevel || 'info');

    const registry = options.registry ?? createDocumentStoreRegistry();
    this.factory = registry.resolve(this.config.framework);

    this.logger.info('DocumentStore initialized', { framework: this.config.framework });
  }

  /**
   * Build a store from `DOCUMENT_STORE_*` environment variables
   */
  static fromEnv(options: DocumentStoreOptions & EnvLoadOptions = {}): DocumentStore {
    return new DocumentStore(loadDocumentStoreConfigFromEnv(options), options);
  }

  get framework(): string {
    return this.config.framework;
  }

  get isConnected(): boolean {
    return this.adapter?.isConnected() ?? false;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  async connect(): Promise<void> {
    try {
      await this.openAdapter();
    } catch (error) {
      throw this.fail(error, { operation: 'connect', framework: this.config.framework });
    }
  }

  async close(): Promise<void> {
    if (!this.adapter || !this.adapter.isConnected()) return;

    try {
      await this.adapter.close();
    } catch (error) {
      throw this.fail(error, { operation: 'close', framework: this.config.framework });
    }

    this.logger.info('Document store connection closed', { framework: this.config.framework });
    this.emit('closed', this.config.framework);
  }

  /**
   * Run `fn` with an open connection and close it afterwards, also when
   * `fn` throws. Nested calls share the outer connection; only the
   * outermost scope closes it. When `fn` throws, its error is the one
   * rethrown even if closing fails too.
   */
  async withConnection<T>(fn: (store: this) => Promise<T>): Promise<T> {
    const outermost = this.scopeDepth === 0;
    if (outermost) {
      await this.connect();
    }

    this.scopeDepth++;
    let result: T;
    try {
      result = await fn(this);
    } catch (error) {
      this.scopeDepth--;
      if (outermost) {
        await this.close().catch((closeError: unknown) => {
          this.logger.warn('Close after failed scope also failed', {
            framework: this.config.framework,
            error: errorMessage(closeError),
          });
        });
      }
      throw error;
    }

    this.scopeDepth--;
    if (outermost) {
      await this.close();
    }
    return result;
  }

  // ============================================================================
  // Operations
  // ============================================================================

  /**
   * Insert one document
   *
   * @returns Identifier assigned by the backend
   */
  async insert(collection: string, document: Document): Promise<string> {
    requireCollection(collection, 'insert');
    const context = { operation: 'insert', collection };
    requireDocument(document, context);

    const id = await this.run(context, (adapter) => adapter.insertDocument(collection, document));
    this.logger.debug('Document inserted', { collection, id });
    return id;
  }

  /**
   * Find documents matching `filter` (everything when omitted)
   *
   * `skip` and `limit` are applied before `projection`; `limit` 0 means no limit.
   */
  async find(collection: string, filter: DocumentFilter = {}, options: FindOptions = {}): Promise<Document[]> {
    requireCollection(collection, 'find');
    const context = { operation: 'find', collection };
    requireFilter(filter, context);
    const resolved = resolveFindOptions(options, context);

    const documents = await this.run(context, (adapter) => adapter.findDocuments(collection, filter, resolved));
    this.logger.debug('Documents found', { collection, count: documents.length });
    return documents;
  }

  /**
   * Update every document matching `filter`
   *
   * A payload without `$` operators is applied as `$set`.
   *
   * @returns Number of matched (or upserted) documents
   */
  async update(
    collection: string,
    filter: DocumentFilter,
    changes: DocumentChanges,
    options: UpdateOptions = {}
  ): Promise<number> {
    requireCollection(collection, 'update');
    const context = { operation: 'update', collection };
    requireFilter(filter, context);
    const normalized = normalizeChanges(changes, context);
    const resolved = resolveUpdateOptions(options);

    const count = await this.run(context, (adapter) =>
      adapter.updateDocuments(collection, filter, normalized, resolved)
    );
    this.logger.debug('Documents updated', { collection, count });
    return count;
  }

  /**
   * Delete every document matching `filter`
   *
   * @returns Number of deleted documents
   */
  async delete(collection: string, filter: DocumentFilter): Promise<number> {
    requireCollection(collection, 'delete');
    const context = { operation: 'delete', collection };
    requireFilter(filter, context);

    const count = await this.run(context, (adapter) => adapter.deleteDocuments(collection, filter));
    this.logger.debug('Documents deleted', { collection, count });
    return count;
  }

  /**
   * Insert several documents
   *
   * @returns Identifiers in input order
   */
  async bulkInsert(collection: string, documents: Document[]): Promise<string[]> {
    requireCollection(collection, 'bulkInsert');
    const context = { operation: 'bulkInsert', collection };
    requireList(documents, 'Documents', context);
    if (documents.length === 0) {
      throw new ValidationError('Documents list must not be empty', context);
    }
    for (const document of documents) {
      requireDocument(document, context);
    }

    const ids = await this.run(context, (adapter) => adapter.insertDocuments(collection, documents));
    this.logger.debug('Documents inserted', { collection, count: ids.length });
    return ids;
  }

  /**
   * Apply each payload in turn to the documents matching `filter`
   *
   * @returns Sum of matched (or upserted) counts
   */
  async bulkUpdate(
    collection: string,
    filter: DocumentFilter,
    changes: DocumentChanges[],
    options: UpdateOptions = {}
  ): Promise<number> {
    requireCollection(collection, 'bulkUpdate');
    const context = { operation: 'bulkUpdate', collection };
    requireFilter(filter, context);
    requireList(changes, 'Update payloads', context);
    if (changes.length === 0) {
      throw new ValidationError('Update payloads list must not be empty', context);
    }
    const normalized = changes.map((payload) => normalizeChanges(payload, context));
    const resolved = resolveUpdateOptions(options);

    const count = await this.run(context, (adapter) =>
      adapter.bulkUpdateDocuments(collection, filter, normalized, resolved)
    );
    this.logger.debug('Documents bulk updated', { collection, count });
    return count;
  }

  /**
   * Delete the documents matching a filter, or any of a list of filters
   *
   * @returns Number of deleted documents (0 for an empty list)
   */
  async bulkDelete(collection: string, filters: DocumentFilter | DocumentFilter[]): Promise<number> {
    requireCollection(collection, 'bulkDelete');
    const context = { operation: 'bulkDelete', collection };
    const list = Array.isArray(filters) ? filters : [filters];
    for (const filter of list) {
      requireFilter(filter, context);
    }
    if (list.length === 0) {
      return 0;
    }

    const count = await this.run(context, (adapter) => adapter.bulkDeleteDocuments(collection, list));
    this.logger.debug('Documents bulk deleted', { collection, count });
    return count;
  }

  /**
   * Check backend connectivity
   */
  async healthCheck(): Promise<HealthStatus> {
    const start = Date.now();

    try {
      const adapter = await this.openAdapter();
      await adapter.ping();
      return { status: 'ok', latency: Date.now() - start };
    } catch (error) {
      return { status: 'error', message: errorMessage(error), latency: Date.now() - start };
    }
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async openAdapter(): Promise<DocumentStoreAdapter> {
    if (!this.adapter) {
      this.adapter = this.factory.createClient(this.config, this.logger);
    }

    if (!this.adapter.isConnected()) {
      await this.adapter.connect();
      this.logger.info('Connected to document store', { framework: this.config.framework });
      this.emit('connected', this.config.framework);
    }

    return this.adapter;
  }

  private async run<T>(context: ErrorContext, action: (adapter: DocumentStoreAdapter) => Promise<T>): Promise<T> {
    try {
      const adapter = await this.openAdapter();
      return await action(adapter);
    } catch (error) {
      throw this.fail(error, context);
    }
  }

  private fail(error: unknown, context: ErrorContext): StoreError {
    const storeError = toStoreError(error, context);
    this.logger.error('Document store operation failed', {
      framework: this.config.framework,
      operation: context.operation,
      error: storeError.message,
    });
    this.emit('operationError', storeError);
    return storeError;
  }
}
