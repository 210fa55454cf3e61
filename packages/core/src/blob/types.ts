import type { Readable } from 'stream';
import type { BlobStoreConfiguration } from '../config/index.js';
import type { AdapterFactory, AdapterRegistry } from '../registry/index.js';

export interface Bucket {
  name: string;
  createdAt: Date;
}

export interface ObjectMetadata {
  key: string;
  lastModified: Date;
  /** Bytes */
  size: number;
  etag?: string;
}

/**
 * An object's payload and attributes.
 *
 * The caller owns `body` and must consume or release it
 * (see `readObjectContent` / `releaseObjectContent`).
 */
export interface ObjectContent {
  body: Readable;
  lastModified: Date;
  size?: number;
  contentType?: string;
}

export interface ObjectWriteResult {
  bucket: string;
  key: string;
  etag?: string;
  versionId?: string;
}

/**
 * Payload accepted by `putObject`
 */
export type ObjectData = Uint8Array | string | Readable;

export interface PutObjectOptions {
  contentType?: string;
}

/**
 * BlobStoreAdapter - contract every blob backend implements
 *
 * The `BlobStore` facade resolves default buckets, validates keys and checks
 * local paths before calling these primitives.
 *
 * Implementations:
 * - InMemoryBlobStoreAdapter - for tests and development
 * - S3BlobStoreAdapter - `@polystore/storage-s3` (AWS S3 and MinIO)
 */
export interface BlobStoreAdapter {
  readonly framework: string;

  /**
   * Lazily list buckets; every iteration queries the backend again
   */
  listBuckets(): AsyncIterable<Bucket>;

  uploadObject(filePath: string, key: string, bucket: string): Promise<ObjectWriteResult>;

  putObject(data: ObjectData, key: string, bucket: string, options?: PutObjectOptions): Promise<ObjectWriteResult>;

  downloadObject(key: string, filePath: string, bucket: string): Promise<void>;

  getObject(key: string, bucket: string): Promise<ObjectContent>;

  /**
   * Lazily list objects whose key starts with `prefix`
   */
  listObjects(bucket: string, prefix: string): AsyncIterable<ObjectMetadata>;

  deleteObject(key: string, bucket: string, version?: string): Promise<void>;

  copyObject(srcKey: string, dstKey: string, srcBucket: string, dstBucket: string): Promise<ObjectWriteResult>;

  /**
   * URL granting GET on exactly one object
   *
   * @param expiry - Seconds; the backend default applies when omitted
   */
  presignedGetUrl(key: string, bucket: string, expiry?: number): Promise<string>;

  /**
   * URL granting PUT on exactly one object
   */
  presignedPutUrl(key: string, bucket: string, expiry?: number): Promise<string>;

  /**
   * Round-trip to the backend, used by health checks
   */
  ping(bucket: string): Promise<void>;

  close(): Promise<void>;
}

export type BlobStoreAdapterFactory = AdapterFactory<BlobStoreConfiguration, BlobStoreAdapter>;

export type BlobStoreRegistry = AdapterRegistry<BlobStoreConfiguration, BlobStoreAdapter>;
