/**
 * Polystore - Blob Store Example
 *
 * Uploads a local file, lists it, reads it back and prints a presigned URL.
 * Uses BLOB_STORE_* variables when BLOB_STORE_FRAMEWORK is set, otherwise an
 * in-memory store.
 *
 * Usage:
 *   npx tsx blob-store.ts
 *   BLOB_STORE_FRAMEWORK=minio BLOB_STORE_ROOT_BUCKET=demo \
 *     BLOB_STORE_CONNECTION__ENDPOINT=localhost:9000 \
 *     BLOB_STORE_CONNECTION__ACCESS_KEY=minioadmin \
 *     BLOB_STORE_CONNECTION__SECRET_KEY=minioadmin npx tsx blob-store.ts
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { BlobStore, createBlobStoreRegistry, readObjectContent } from '@polystore/core';
import { registerS3BlobStore } from '@polystore/storage-s3';

const registry = createBlobStoreRegistry();
registerS3BlobStore(registry);

function createStore(): BlobStore {
  if (process.env.BLOB_STORE_FRAMEWORK) {
    return BlobStore.fromEnv({ registry });
  }
  return new BlobStore(
    {
      framework: 'memory',
      rootBucket: 'demo',
      connection: { endpoint: 'localhost', accessKey: 'example-access', secretKey: 'example-secret' },
    },
    { registry }
  );
}

async function main() {
  const blobs = createStore();
  const workDir = await mkdtemp(join(tmpdir(), 'polystore-example-'));

  try {
    const source = join(workDir, 'notes.txt');
    await writeFile(source, 'Polystore blob example\n');

    const written = await blobs.uploadFile(source, 'examples/notes.txt');
    console.log(`Uploaded ${written.bucket}/${written.key} (etag ${written.etag ?? 'n/a'})`);

    for await (const object of blobs.listObjects(undefined, 'examples/')) {
      console.log(`- ${object.key} ${object.size} bytes, modified ${object.lastModified.toISOString()}`);
    }

    const content = await blobs.getObject('examples/notes.txt');
    console.log('Content:', (await readObjectContent(content)).toString('utf-8').trim());

    const url = await blobs.getPresignedUrl('examples/notes.txt', undefined, 300);
    console.log(`Presigned URL (5 minutes): ${url}`);

    await blobs.deleteObject('examples/notes.txt');
    console.log('Deleted examples/notes.txt');
  } finally {
    await blobs.close();
    await rm(workDir, { recursive: true, force: true });
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
