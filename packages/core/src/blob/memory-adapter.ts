import { createHash, createHmac, randomUUID, timingSafeEqual } from 'crypto';
import { readFile, writeFile } from 'fs/promises';
import { Readable } from 'stream';
import { AccessError, NotFoundError, ValidationError, type ErrorContext } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../types.js';
import { toBuffer } from './content.js';
import type {
  BlobStoreAdapter,
  Bucket,
  ObjectContent,
  ObjectData,
  ObjectMetadata,
  ObjectWriteResult,
  PutObjectOptions,
} from './types.js';

export type PresignedMethod = 'GET' | 'PUT';

/** Seconds, matching the S3 presigner default */
export const DEFAULT_PRESIGNED_EXPIRY = 900;

/** Seconds; SigV4 presigned URLs are valid for at most seven days */
export const MAX_PRESIGNED_EXPIRY = 604800;

interface StoredObject {
  data: Buffer;
  lastModified: Date;
  etag: string;
  versionId: string;
  contentType?: string;
}

interface StoredBucket {
  createdAt: Date;
  objects: Map<string, StoredObject>;
}

export interface InMemoryBlobStoreOptions {
  /** HMAC key for presigned URLs; never appears in a URL */
  secret: string;
  /** Buckets that exist from the start */
  buckets?: string[];
  logger?: Logger;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

const PRESIGNED_SCHEME = 'memory://';

interface PresignedLocation {
  bucket: string;
  key: string;
  query: URLSearchParams;
}

function encodeKey(key: string): string {
  return key.split('/').map(encodeURIComponent).join('/');
}

/**
 * Split `memory://<bucket>/<key>?<query>` by hand. WHATWG URL parsing would
 * resolve `.` and `..` segments and change the key that was signed.
 */
function parsePresignedUrl(url: string): PresignedLocation | undefined {
  if (!url.startsWith(PRESIGNED_SCHEME)) return undefined;

  const rest = url.slice(PRESIGNED_SCHEME.length);
  const queryStart = rest.indexOf('?');
  const location = queryStart < 0 ? rest : rest.slice(0, queryStart);
  const slash = location.indexOf('/');
  if (queryStart < 0 || slash <= 0) return undefined;

  try {
    return {
      bucket: decodeURIComponent(location.slice(0, slash)),
      key: decodeURIComponent(location.slice(slash + 1)),
      query: new URLSearchParams(rest.slice(queryStart + 1)),
    };
  } catch {
    return undefined;
  }
}

/**
 * InMemoryBlobStoreAdapter - blob store for testing and development
 *
 * Presigned URLs have the form
 * `memory://bucket/key?X-Method=GET&X-Expires=<epoch seconds>&X-Signature=<hmac>`
 * and are redeemed with `fetchPresigned`, which only honours the bucket, key
 * and method the URL was signed for.
 *
 * @example
 * ```typescript
 * const adapter = new InMemoryBlobStoreAdapter({ secret: 'test-secret', buckets: ['assets'] });
 *
 * await adapter.putObject('hello', 'greeting.txt', 'assets');
 * const url = await adapter.presignedGetUrl('greeting.txt', 'assets', 60);
 * const body = await adapter.fetchPresigned(url, 'GET');
 * ```
 */
export class InMemoryBlobStoreAdapter implements BlobStoreAdapter {
  readonly framework = 'memory';

  private buckets: Map<string, StoredBucket> = new Map();
  private secret: string;
  private logger: Logger;
  private now: () => number;

  constructor(options: InMemoryBlobStoreOptions) {
    this.secret = options.secret;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;

    for (const name of options.buckets ?? []) {
      this.createBucket(name);
    }
  }

  /**
   * Create a bucket if it does not exist yet
   */
  createBucket(name: string): void {
    if (!this.buckets.has(name)) {
      this.buckets.set(name, { createdAt: new Date(this.now()), objects: new Map() });
    }
  }

  async *listBuckets(): AsyncGenerator<Bucket> {
    const names = Array.from(this.buckets.keys()).sort();
    for (const name of names) {
      const bucket = this.buckets.get(name);
      if (bucket) {
        yield { name, createdAt: bucket.createdAt };
      }
    }
  }

  async uploadObject(filePath: string, key: string, bucket: string): Promise<ObjectWriteResult> {
    const data = await readFile(filePath);
    return this.store(data, key, bucket, { operation: 'uploadObject', bucket, key });
  }

  async putObject(
    data: ObjectData,
    key: string,
    bucket: string,
    options: PutObjectOptions = {}
  ): Promise<ObjectWriteResult> {
    const payload = await toBuffer(data);
    return this.store(payload, key, bucket, { operation: 'putObject', bucket, key }, options.contentType);
  }

  async downloadObject(key: string, filePath: string, bucket: string): Promise<void> {
    const stored = this.requireObject(key, bucket, 'downloadObject');
    await writeFile(filePath, stored.data);
  }

  async getObject(key: string, bucket: string): Promise<ObjectContent> {
    const stored = this.requireObject(key, bucket, 'getObject');
    return {
      body: Readable.from([Buffer.from(stored.data)]),
      lastModified: stored.lastModified,
      size: stored.data.length,
      contentType: stored.contentType,
    };
  }

  async *listObjects(bucket: string, prefix: string): AsyncGenerator<ObjectMetadata> {
    const { objects } = this.requireBucket(bucket, 'listObjects');
    const keys = Array.from(objects.keys())
      .filter((key) => key.startsWith(prefix))
      .sort();

    for (const key of keys) {
      const stored = objects.get(key);
      if (stored) {
        yield { key, lastModified: stored.lastModified, size: stored.data.length, etag: stored.etag };
      }
    }
  }

  async deleteObject(key: string, bucket: string, version?: string): Promise<void> {
    const { objects } = this.requireBucket(bucket, 'deleteObject', key);
    const stored = objects.get(key);

    if (stored && (version === undefined || version === stored.versionId)) {
      objects.delete(key);
    }
  }

  async copyObject(srcKey: string, dstKey: string, srcBucket: string, dstBucket: string): Promise<ObjectWriteResult> {
    const source = this.requireObject(srcKey, srcBucket, 'copyObject');
    return this.store(
      Buffer.from(source.data),
      dstKey,
      dstBucket,
      { operation: 'copyObject', bucket: dstBucket, key: dstKey },
      source.contentType
    );
  }

  async presignedGetUrl(key: string, bucket: string, expiry?: number): Promise<string> {
    return this.presign('GET', key, bucket, expiry ?? DEFAULT_PRESIGNED_EXPIRY);
  }

  async presignedPutUrl(key: string, bucket: string, expiry?: number): Promise<string> {
    return this.presign('PUT', key, bucket, expiry ?? DEFAULT_PRESIGNED_EXPIRY);
  }

  /**
   * Redeem a presigned URL.
   *
   * GET returns the object's bytes; PUT stores `body` and returns an empty buffer.
   *
   * @throws AccessError if the URL was altered, has expired, or was signed for another method
   */
  async fetchPresigned(url: string, method: PresignedMethod, body?: ObjectData): Promise<Buffer> {
    const { bucket, key } = this.verify(url, method);

    if (method === 'GET') {
      return Buffer.from(this.requireObject(key, bucket, 'fetchPresigned').data);
    }

    if (body === undefined) {
      throw new ValidationError('PUT requires a body', { operation: 'fetchPresigned', bucket, key });
    }
    await this.putObject(body, key, bucket);
    return Buffer.alloc(0);
  }

  async ping(bucket: string): Promise<void> {
    this.requireBucket(bucket, 'ping');
  }

  async close(): Promise<void> {
    this.logger.debug('In-memory blob store closed');
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private requireBucket(bucket: string, operation: string, key?: string): StoredBucket {
    const stored = this.buckets.get(bucket);
    if (!stored) {
      throw new NotFoundError('Bucket not found', { operation, bucket, key });
    }
    return stored;
  }

  private requireObject(key: string, bucket: string, operation: string): StoredObject {
    const stored = this.requireBucket(bucket, operation, key).objects.get(key);
    if (!stored) {
      throw new NotFoundError('Object not found', { operation, bucket, key });
    }
    return stored;
  }

  private store(
    data: Buffer,
    key: string,
    bucket: string,
    context: ErrorContext,
    contentType?: string
  ): ObjectWriteResult {
    const { objects } = this.requireBucket(bucket, context.operation ?? 'putObject', key);
    const stored: StoredObject = {
      data,
      lastModified: new Date(this.now()),
      etag: `"${createHash('md5').update(data).digest('hex')}"`,
      versionId: randomUUID(),
      contentType,
    };
    objects.set(key, stored);

    this.logger.debug('Object stored', { bucket, key, size: data.length });
    return { bucket, key, etag: stored.etag, versionId: stored.versionId };
  }

  private sign(method: PresignedMethod, bucket: string, key: string, expires: number): string {
    return createHmac('sha256', this.secret).update(`${method}\n${bucket}\n${key}\n${expires}`).digest('hex');
  }

  private presign(method: PresignedMethod, key: string, bucket: string, expiry: number): string {
    const expires = Math.floor(this.now() / 1000) + expiry;
    const params = new URLSearchParams({
      'X-Method': method,
      'X-Expires': String(expires),
      'X-Signature': this.sign(method, bucket, key, expires),
    });
    return `${PRESIGNED_SCHEME}${encodeURIComponent(bucket)}/${encodeKey(key)}?${params.toString()}`;
  }

  private verify(url: string, method: PresignedMethod): { bucket: string; key: string } {
    const context: ErrorContext = { operation: 'fetchPresigned' };

    const parsed = parsePresignedUrl(url);
    if (!parsed) {
      throw new AccessError('Malformed presigned URL', context);
    }

    const { bucket, key, query } = parsed;
    const scoped: ErrorContext = { ...context, bucket, key };

    const signedMethod = query.get('X-Method');
    const expires = Number(query.get('X-Expires'));
    const signature = query.get('X-Signature') ?? '';

    if (!Number.isInteger(expires) || signature === '') {
      throw new AccessError('Malformed presigned URL', scoped);
    }
    if (signedMethod !== method) {
      throw new AccessError(`Presigned URL does not permit ${method}`, scoped);
    }

    const expected = Buffer.from(this.sign(method, bucket, key, expires), 'utf-8');
    const actual = Buffer.from(signature, 'utf-8');
    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
      throw new AccessError('Presigned URL signature does not match', scoped);
    }

    if (expires * 1000 < this.now()) {
      throw new AccessError('Presigned URL has expired', scoped);
    }

    return { bucket, key };
  }
}
