/**
 * @polystore/storage-s3
 *
 * AWS S3 and MinIO blob store adapter for Polystore
 *
 * @example
 * ```typescript
 * import { BlobStore, createBlobStoreRegistry } from '@polystore/core';
 * import { registerS3BlobStore } from '@polystore/storage-s3';
 *
 * const registry = createBlobStoreRegistry();
 * registerS3BlobStore(registry);
 *
 * const blobs = BlobStore.fromEnv({ registry });
 * ```
 */

import type { BlobStoreRegistry, RegisterOptions } from '@polystore/core';
import { s3BlobStoreFactory } from './adapter.js';

export { S3BlobStoreAdapter, classifyS3Error, createS3ClientConfig, s3BlobStoreFactory } from './adapter.js';
export type { S3BlobStoreAdapterOptions } from './adapter.js';

/**
 * Register the `minio` and `s3` frameworks on a blob store registry
 */
export function registerS3BlobStore(registry: BlobStoreRegistry, options: RegisterOptions = {}): void {
  registry.register('minio', s3BlobStoreFactory, options);
  registry.register('s3', s3BlobStoreFactory, options);
}
