/**
 * MongoDB Document Store Adapter for Polystore
 *
 * Maps the document store primitives onto the official `mongodb` driver:
 * - Filters and update payloads are passed through in MongoDB syntax
 * - 24-character hex identifiers are stored as ObjectId and returned as strings
 * - Bulk updates and deletes run as one ordered `bulkWrite`
 */

import { MongoClient, MongoServerError, ObjectId } from 'mongodb';
import type { AnyBulkWriteOperation, Db, Document as MongoDocument, MongoClientOptions } from 'mongodb';
import {
  AccessError,
  NotFoundError,
  OperationalError,
  StoreError,
  errorMessage,
  isOperatorKey,
  isPlainObject,
  silentLogger,
} from '@polystore/core';
import type {
  Document,
  DocumentChanges,
  DocumentConnectionSettings,
  DocumentFilter,
  DocumentStoreAdapter,
  DocumentStoreAdapterFactory,
  DocumentStoreConfiguration,
  ErrorContext,
  Logger,
  ResolvedFindOptions,
  ResolvedUpdateOptions,
} from '@polystore/core';

const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/i;

/** Server error codes: Unauthorized, AuthenticationFailed */
const ACCESS_ERROR_CODES = new Set<number | string>([13, 18]);
/** Server error code: NamespaceNotFound */
const NOT_FOUND_ERROR_CODES = new Set<number | string>([26]);

// ============================================================================
// Identifier and filter conversion
// ============================================================================

function toObjectId(value: unknown): unknown {
  return typeof value === 'string' && OBJECT_ID_PATTERN.test(value) ? new ObjectId(value) : value;
}

function toMongoId(value: unknown): unknown {
  if (!isPlainObject(value) || !Object.keys(value).some(isOperatorKey)) {
    return toObjectId(value);
  }

  const converted: MongoDocument = {};
  for (const [operator, operand] of Object.entries(value)) {
    if (operator === '$eq' || operator === '$ne') {
      converted[operator] = toObjectId(operand);
    } else if ((operator === '$in' || operator === '$nin') && Array.isArray(operand)) {
      converted[operator] = operand.map(toObjectId);
    } else {
      converted[operator] = operand;
    }
  }
  return converted;
}

/**
 * Translate a filter into driver form, turning hex `_id` values into ObjectId
 * (also inside `$and` / `$or` / `$nor` clauses)
 */
export function toMongoFilter(filter: DocumentFilter): MongoDocument {
  const converted: MongoDocument = {};

  for (const [field, value] of Object.entries(filter)) {
    if (field === '_id') {
      converted[field] = toMongoId(value);
    } else if ((field === '$and' || field === '$or' || field === '$nor') && Array.isArray(value)) {
      converted[field] = value.map((clause) => (isPlainObject(clause) ? toMongoFilter(clause) : clause));
    } else {
      converted[field] = value;
    }
  }

  return converted;
}

function toMongoDocument(document: Document): MongoDocument {
  const { _id, ...fields } = document;
  return _id === undefined ? { ...fields } : { ...fields, _id: toObjectId(_id) };
}

function fromMongoDocument(document: MongoDocument): Document {
  const { _id, ...fields } = document;
  return _id === undefined || _id === null ? { ...fields } : { ...fields, _id: String(_id) };
}

function toMongoUpdate(changes: DocumentChanges): MongoDocument {
  return { ...changes };
}

function toMongoProjection(projection: string[] | undefined): MongoDocument | undefined {
  if (!projection) return undefined;
  return Object.fromEntries(projection.map((field) => [field, 1]));
}

// ============================================================================
// Errors and client options
// ============================================================================

/**
 * Map a driver error onto the store error taxonomy
 */
export function classifyMongoError(error: unknown, context: ErrorContext): StoreError {
  if (error instanceof StoreError) {
    return error;
  }

  const message = `${context.operation ?? 'operation'} failed: ${errorMessage(error)}`;

  if (error instanceof MongoServerError && error.code !== undefined) {
    if (ACCESS_ERROR_CODES.has(error.code)) {
      return new AccessError(message, context, error);
    }
    if (NOT_FOUND_ERROR_CODES.has(error.code)) {
      return new NotFoundError(message, context, error);
    }
  }

  return new OperationalError(message, context, error);
}

/**
 * Driver options derived from connection settings.
 *
 * `connectionTimeout` (seconds) bounds both server selection and the socket
 * connect. Recognised extras: `replicaSet`, `appName`, `maxPoolSize`,
 * `directConnection`.
 */
export function createMongoClientOptions(connection: DocumentConnectionSettings): MongoClientOptions {
  const options: MongoClientOptions = {};

  if (connection.connectionTimeout !== undefined) {
    const timeoutMs = Math.round(connection.connectionTimeout * 1000);
    options.serverSelectionTimeoutMS = timeoutMs;
    options.connectTimeoutMS = timeoutMs;
  }

  const { replicaSet, appName, maxPoolSize, directConnection } = connection.extras;
  if (typeof replicaSet === 'string') options.replicaSet = replicaSet;
  if (typeof appName === 'string') options.appName = appName;
  if (typeof maxPoolSize === 'number') options.maxPoolSize = maxPoolSize;
  if (typeof directConnection === 'boolean') options.directConnection = directConnection;

  return options;
}

// ============================================================================
// Adapter
// ============================================================================

/**
 * MongoDB Document Store Adapter
 *
 * @example
 * ```typescript
 * const config = parseDocumentStoreConfig({
 *   framework: 'mongodb',
 *   connection: { host: 'localhost', port: 27017, database: 'app' },
 * });
 * const adapter = new MongoDocumentStoreAdapter(config);
 *
 * await adapter.connect();
 * const id = await adapter.insertDocument('users', { name: 'Ada' });
 * ```
 */
export class MongoDocumentStoreAdapter implements DocumentStoreAdapter {
  readonly framework = 'mongodb';

  private client?: MongoClient;
  private db?: Db;
  private config: DocumentStoreConfiguration;
  private logger: Logger;

  constructor(config: DocumentStoreConfiguration, logger: Logger = silentLogger) {
    this.config = config;
    this.logger = logger;
  }

  async connect(): Promise<void> {
    if (this.client) return;

    const { connection } = this.config;
    const client = new MongoClient(this.config.connectionUri, createMongoClientOptions(connection));

    try {
      await client.connect();
    } catch (error) {
      throw classifyMongoError(error, { operation: 'connect', framework: this.framework });
    }

    this.client = client;
    this.db = client.db(connection.database);
    this.logger.debug('MongoDB connected', { host: connection.host, database: connection.database });
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) return;

    this.client = undefined;
    this.db = undefined;

    try {
      await client.close();
    } catch (error) {
      throw classifyMongoError(error, { operation: 'close', framework: this.framework });
    }
    this.logger.debug('MongoDB connection closed');
  }

  isConnected(): boolean {
    return this.client !== undefined;
  }

  async ping(): Promise<void> {
    await this.execute('ping', undefined, async (db) => {
      await db.command({ ping: 1 });
    });
  }

  async insertDocument(collection: string, document: Document): Promise<string> {
    return this.execute('insert', collection, async (db) => {
      const result = await db.collection(collection).insertOne(toMongoDocument(document));
      return String(result.insertedId);
    });
  }

  async findDocuments(collection: string, filter: DocumentFilter, options: ResolvedFindOptions): Promise<Document[]> {
    return this.execute('find', collection, async (db) => {
      const documents = await db
        .collection(collection)
        .find(toMongoFilter(filter), {
          projection: toMongoProjection(options.projection),
          skip: options.skip,
          limit: options.limit,
        })
        .toArray();
      return documents.map(fromMongoDocument);
    });
  }

  async updateDocuments(
    collection: string,
    filter: DocumentFilter,
    changes: DocumentChanges,
    options: ResolvedUpdateOptions
  ): Promise<number> {
    return this.execute('update', collection, async (db) => {
      const result = await db
        .collection(collection)
        .updateMany(toMongoFilter(filter), toMongoUpdate(changes), { upsert: options.upsert });
      return result.matchedCount + result.upsertedCount;
    });
  }

  async deleteDocuments(collection: string, filter: DocumentFilter): Promise<number> {
    return this.execute('delete', collection, async (db) => {
      const result = await db.collection(collection).deleteMany(toMongoFilter(filter));
      return result.deletedCount;
    });
  }

  async insertDocuments(collection: string, documents: Document[]): Promise<string[]> {
    return this.execute('bulkInsert', collection, async (db) => {
      const result = await db.collection(collection).insertMany(documents.map(toMongoDocument), { ordered: true });
      return documents.map((_document, index) => String(result.insertedIds[index]));
    });
  }

  async bulkUpdateDocuments(
    collection: string,
    filter: DocumentFilter,
    changes: DocumentChanges[],
    options: ResolvedUpdateOptions
  ): Promise<number> {
    const mongoFilter = toMongoFilter(filter);
    const operations: AnyBulkWriteOperation[] = changes.map((payload) => ({
      updateMany: { filter: mongoFilter, update: toMongoUpdate(payload), upsert: options.upsert },
    }));

    return this.execute('bulkUpdate', collection, async (db) => {
      const result = await db.collection(collection).bulkWrite(operations, { ordered: true });
      return result.matchedCount + result.upsertedCount;
    });
  }

  async bulkDeleteDocuments(collection: string, filters: DocumentFilter[]): Promise<number> {
    const operations: AnyBulkWriteOperation[] = filters.map((filter) => ({
      deleteMany: { filter: toMongoFilter(filter) },
    }));

    return this.execute('bulkDelete', collection, async (db) => {
      const result = await db.collection(collection).bulkWrite(operations, { ordered: true });
      return result.deletedCount;
    });
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async execute<T>(operation: string, collection: string | undefined, action: (db: Db) => Promise<T>): Promise<T> {
    const context: ErrorContext = { operation, collection };

    if (!this.db) {
      throw new OperationalError('MongoDB client is not connected', context);
    }

    try {
      return await action(this.db);
    } catch (error) {
      throw classifyMongoError(error, context);
    }
  }
}

/**
 * Factory registered under `mongodb`; the client is created on `connect()`
 */
export const mongoDocumentStoreFactory: DocumentStoreAdapterFactory = {
  createClient: (config, logger) => new MongoDocumentStoreAdapter(config, logger),
  metadata: {
    packageName: '@polystore/storage-mongodb',
    description: 'MongoDB document store using the official driver',
  },
};
