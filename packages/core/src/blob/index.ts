export { BlobStore } from './blob-store.js';
export type { BlobStoreEvents, BlobStoreOptions } from './blob-store.js';
export { InMemoryBlobStoreAdapter, DEFAULT_PRESIGNED_EXPIRY, MAX_PRESIGNED_EXPIRY } from './memory-adapter.js';
export type { InMemoryBlobStoreOptions, PresignedMethod } from './memory-adapter.js';
export { createBlobStoreRegistry, memoryBlobStoreFactory } from './factories.js';
export { readObjectContent, releaseObjectContent, toBuffer } from './content.js';
export { requireParentDirectory, requireReadableFile } from './local-files.js';
export type {
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
