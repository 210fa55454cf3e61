import { EventEmitter } from 'eventemitter3';
import {
  loadBlobStoreConfigFromEnv,
  parseBlobStoreConfig,
  type BlobStoreConfigInput,
  type BlobStoreConfiguration,
  type EnvLoadOptions,
} from '../config/index.js';
import { ValidationError, errorMessage, toStoreError, type ErrorContext, type StoreError } from '../errors.js';
import { createDefaultLogger } from '../logger.js';
import type { HealthStatus, Logger, LogLevel } from '../types.js';
import { createBlobStoreRegistry } from './factories.js';
import { requireParentDirectory, requireReadableFile } from './local-files.js';
import { MAX_PRESIGNED_EXPIRY } from './memory-adapter.js';
import type {
  BlobStoreAdapter,
  BlobStoreAdapterFactory,
  BlobStoreRegistry,
  Bucket,
  ObjectContent,
  ObjectData,
  ObjectMetadata,
  ObjectWriteResult,
  PutObjectOptions,
} from './types.js';

export interface BlobStoreEvents {
  closed: [framework: string];
  operationError: [error: StoreError];
}

export interface BlobStoreOptions {
  /** Registry to resolve `framework` against (default: a fresh registry with `memory`) */
  registry?: BlobStoreRegistry;
  logger?: Logger;
  logLevel?: LogLevel;
}

interface ObjectContext extends ErrorContext {
  operation: string;
  bucket: string;
  key: string;
}

/**
 * BlobStore - backend-agnostic facade over a blob store adapter
 *
 * Every bucket argument is optional and defaults to the configured
 * `rootBucket`. Local paths are checked before the backend is contacted.
 * The `*File` and `*Object` method pairs are aliases.
 *
 * @example
 * ```typescript
 * const registry = createBlobStoreRegistry();
 * registerS3BlobStore(registry);
 *
 * const blobs = new BlobStore(
 *   {
 *     framework: 'minio',
 *     rootBucket: 'assets',
 *     connection: { endpoint: 'localhost:9000', accessKey: 'minio', secretKey: 'minio-secret' },
 *   },
 *   { registry }
 * );
 *
 * await blobs.uploadFile('./report.pdf', 'reports/2024.pdf');
 * const url = await blobs.getPresignedUrl('reports/2024.pdf', undefined, 3600);
 * ```
 */
export class BlobStore extends EventEmitter<BlobStoreEvents> {
  readonly config: BlobStoreConfiguration;
  private logger: Logger;
  private factory: BlobStoreAdapterFactory;
  private adapter?: BlobStoreAdapter;

  constructor(config: BlobStoreConfiguration | BlobStoreConfigInput, options: BlobStoreOptions = {}) {
    super();
    this.config = parseBlobStoreConfig(config);
    this.logger = options.logger || createDefaultLogger(options.logLevel || 'info');

    const registry = options.registry ?? createBlobStoreRegistry();
    this.factory = registry.resolve(this.config.framework);

    this.logger.info('BlobStore initialized', {
      framework: this.config.framework,
      rootBucket: this.config.rootBucket,
    });
  }

  /**
   * Build a store from `BLOB_STORE_*` environment variables
   */
  static fromEnv(options: BlobStoreOptions & EnvLoadOptions = {}): BlobStore {
    return new BlobStore(loadBlobStoreConfigFromEnv(options), options);
  }

  get framework(): string {
    return this.config.framework;
  }

  get rootBucket(): string {
    return this.config.rootBucket;
  }

  // ============================================================================
  // Listing
  // ============================================================================

  async *listBuckets(): AsyncGenerator<Bucket> {
    yield* this.iterate({ operation: 'listBuckets' }, (adapter) => adapter.listBuckets());
  }

  /**
   * Lazily list objects under `prefix`; each iteration queries the backend again.
   * The bucket comes first: list a prefix of the root bucket with
   * `listObjects(undefined, 'reports/')`.
   */
  async *listObjects(bucket?: string, prefix = ''): AsyncGenerator<ObjectMetadata> {
    const resolved = this.resolveBucket(bucket, 'listObjects');
    yield* this.iterate({ operation: 'listObjects', bucket: resolved }, (adapter) =>
      adapter.listObjects(resolved, prefix)
    );
  }

  /** Same as `listObjects`, with the same `(bucket, prefix)` order */
  listFiles(bucket?: string, prefix = ''): AsyncGenerator<ObjectMetadata> {
    return this.listObjects(bucket, prefix);
  }

  // ============================================================================
  // Upload
  // ============================================================================

  /**
   * Upload a local file
   *
   * @throws LocalFileError if `filePath` is missing or unreadable
   */
  async uploadFile(filePath: string, key: string, bucket?: string): Promise<ObjectWriteResult> {
    return this.upload('uploadFile', filePath, key, bucket);
  }

  async uploadObject(filePath: string, key: string, bucket?: string): Promise<ObjectWriteResult> {
    return this.upload('uploadObject', filePath, key, bucket);
  }

  /**
   * Store in-memory data or a stream under `key`
   */
  async putObject(
    data: ObjectData,
    key: string,
    bucket?: string,
    options: PutObjectOptions = {}
  ): Promise<ObjectWriteResult> {
    const context = this.objectContext('putObject', key, bucket);
    if (data === undefined || data === null) {
      throw new ValidationError('Object data is required', context);
    }

    const result = await this.run(context, (adapter) =>
      adapter.putObject(data, context.key, context.bucket, options)
    );
    this.logger.debug('Object stored', { bucket: context.bucket, key: context.key });
    return result;
  }

  // ============================================================================
  // Download
  // ============================================================================

  /**
   * Download an object to a local path
   *
   * @throws LocalFileError if the destination directory does not exist
   */
  async downloadFile(key: string, filePath: string, bucket?: string): Promise<void> {
    return this.download('downloadFile', key, filePath, bucket);
  }

  /**
   * Download an object; `filePath` defaults to the key
   */
  async downloadObject(key: string, filePath?: string, bucket?: string): Promise<void> {
    return this.download('downloadObject', key, filePath ?? key, bucket);
  }

  async getFile(key: string, bucket?: string): Promise<ObjectContent> {
    return this.fetch('getFile', key, bucket);
  }

  async getObject(key: string, bucket?: string): Promise<ObjectContent> {
    return this.fetch('getObject', key, bucket);
  }

  // ============================================================================
  // Delete / copy
  // ============================================================================

  /**
   * Delete one object. Arguments are `(key, bucket, version)`: the key comes
   * first, an omitted bucket means the root bucket. Deleting a missing object
   * is not an error.
   */
  async deleteFile(key: string, bucket?: string, version?: string): Promise<void> {
    return this.remove('deleteFile', key, bucket, version);
  }

  /** Same as `deleteFile`, with the same `(key, bucket, version)` order */
  async deleteObject(key: string, bucket?: string, version?: string): Promise<void> {
    return this.remove('deleteObject', key, bucket, version);
  }

  /**
   * Server-side copy; both buckets default to the root bucket
   */
  async copyObject(srcKey: string, dstKey: string, srcBucket?: string, dstBucket?: string): Promise<ObjectWriteResult> {
    const context = this.objectContext('copyObject', srcKey, srcBucket);
    const destination = this.objectContext('copyObject', dstKey, dstBucket);

    const result = await this.run(context, (adapter) =>
      adapter.copyObject(context.key, destination.key, context.bucket, destination.bucket)
    );
    this.logger.debug('Object copied', {
      from: `${context.bucket}/${context.key}`,
      to: `${destination.bucket}/${destination.key}`,
    });
    return result;
  }

  // ============================================================================
  // Presigned URLs
  // ============================================================================

  /**
   * Time-limited URL to download one object
   *
   * @param expiry - Seconds; the backend default applies when omitted
   */
  async getPresignedUrl(key: string, bucket?: string, expiry?: number): Promise<string> {
    const context = this.objectContext('getPresignedUrl', key, bucket);
    this.requireExpiry(expiry, context);
    return this.run(context, (adapter) => adapter.presignedGetUrl(context.key, context.bucket, expiry));
  }

  /**
   * Time-limited URL to upload one object
   */
  async getPresignedUploadUrl(key: string, bucket?: string, expiry?: number): Promise<string> {
    const context = this.objectContext('getPresignedUploadUrl', key, bucket);
    this.requireExpiry(expiry, context);
    return this.run(context, (adapter) => adapter.presignedPutUrl(context.key, context.bucket, expiry));
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Release the backend client. The next operation creates a new one.
   */
  async close(): Promise<void> {
    if (!this.adapter) return;

    try {
      await this.adapter.close();
    } catch (error) {
      throw this.fail(error, { operation: 'close', framework: this.config.framework });
    }

    this.logger.info('Blob store client closed', { framework: this.config.framework });
    this.emit('closed', this.config.framework);
  }

  /**
   * Check that the root bucket is reachable
   */
  async healthCheck(): Promise<HealthStatus> {
    const start = Date.now();

    try {
      await this.getAdapter().ping(this.config.rootBucket);
      return { status: 'ok', latency: Date.now() - start };
    } catch (error) {
      return { status: 'error', message: errorMessage(error), latency: Date.now() - start };
    }
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async upload(operation: string, filePath: string, key: string, bucket?: string): Promise<ObjectWriteResult> {
    const context = this.objectContext(operation, key, bucket);
    this.requirePath(filePath, context);
    await requireReadableFile(filePath, context);

    const result = await this.run(context, (adapter) => adapter.uploadObject(filePath, context.key, context.bucket));
    this.logger.debug('File uploaded', { bucket: context.bucket, key: context.key, filePath });
    return result;
  }

  private async download(operation: string, key: string, filePath: string, bucket?: string): Promise<void> {
    const context = this.objectContext(operation, key, bucket);
    this.requirePath(filePath, context);
    await requireParentDirectory(filePath, context);

    await this.run(context, (adapter) => adapter.downloadObject(context.key, filePath, context.bucket));
    this.logger.debug('Object downloaded', { bucket: context.bucket, key: context.key, filePath });
  }

  private async fetch(operation: string, key: string, bucket?: string): Promise<ObjectContent> {
    const context = this.objectContext(operation, key, bucket);
    return this.run(context, (adapter) => adapter.getObject(context.key, context.bucket));
  }

  private async remove(operation: string, key: string, bucket?: string, version?: string): Promise<void> {
    const context = this.objectContext(operation, key, bucket);
    if (version !== undefined && (typeof version !== 'string' || version === '')) {
      throw new ValidationError('Version must be a non-empty string', context);
    }

    await this.run(context, (adapter) => adapter.deleteObject(context.key, context.bucket, version));
    this.logger.debug('Object deleted', { bucket: context.bucket, key: context.key, version });
  }

  private resolveBucket(bucket: string | undefined, operation: string): string {
    if (bucket === undefined) {
      return this.config.rootBucket;
    }
    if (typeof bucket !== 'string' || bucket === '') {
      throw new ValidationError('Bucket name must be a non-empty string', { operation });
    }
    return bucket;
  }

  private objectContext(operation: string, key: string, bucket?: string): ObjectContext {
    const resolved = this.resolveBucket(bucket, operation);
    if (typeof key !== 'string' || key === '') {
      throw new ValidationError('Object key must be a non-empty string', { operation, bucket: resolved });
    }
    return { operation, bucket: resolved, key };
  }

  private requirePath(filePath: string, context: ErrorContext): void {
    if (typeof filePath !== 'string' || filePath === '') {
      throw new ValidationError('File path must be a non-empty string', context);
    }
  }

  private requireExpiry(expiry: number | undefined, context: ErrorContext): void {
    if (expiry !== undefined && (!Number.isInteger(expiry) || expiry <= 0)) {
      throw new ValidationError('Expiry must be a positive whole number of seconds', context);
    }
    if (expiry !== undefined && expiry > MAX_PRESIGNED_EXPIRY) {
      throw new ValidationError(`Expiry must not exceed ${MAX_PRESIGNED_EXPIRY} seconds`, context);
    }
  }

  private getAdapter(): BlobStoreAdapter {
    if (!this.adapter) {
      this.adapter = this.factory.createClient(this.config, this.logger);
    }
    return this.adapter;
  }

  private async run<T>(context: ErrorContext, action: (adapter: BlobStoreAdapter) => Promise<T>): Promise<T> {
    try {
      return await action(this.getAdapter());
    } catch (error) {
      throw this.fail(error, context);
    }
  }

  private async *iterate<T>(
    context: ErrorContext,
    source: (adapter: BlobStoreAdapter) => AsyncIterable<T>
  ): AsyncGenerator<T> {
    try {
      for await (const item of source(this.getAdapter())) {
        yield item;
      }
    } catch (error) {
      throw this.fail(error, context);
    }
  }

  private fail(error: unknown, context: ErrorContext): StoreError {
    const storeError = toStoreError(error, context);
    this.logger.error('Blob store operation failed', {
      framework: this.config.framework,
      operation: context.operation,
      error: storeError.message,
    });
    this.emit('operationError', storeError);
    return storeError;
  }
}
