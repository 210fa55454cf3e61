/**
 * Unit tests for S3BlobStoreAdapter
 *
 * A real S3Client is used with `send` stubbed, so commands are built exactly
 * as they would be sent and presigned URLs are signed offline.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { buffer } from 'stream/consumers';
import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import {
  AccessError,
  BlobStore,
  NotFoundError,
  OperationalError,
  createBlobStoreRegistry,
  parseBlobStoreConfig,
  readObjectContent,
  silentLogger,
} from '@polystore/core';
import {
  S3BlobStoreAdapter,
  classifyS3Error,
  createS3ClientConfig,
  registerS3BlobStore,
} from '../index.js';

const minioConfig = parseBlobStoreConfig({
  framework: 'minio',
  rootBucket: 'assets',
  connection: { endpoint: 'localhost:9000', accessKey: 'test-access', secretKey: 'test-secret' },
});

const MODIFIED = new Date('2024-03-01T12:00:00Z');

function spyOnSend(client: S3Client) {
  return vi.spyOn(client, 'send');
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('createS3ClientConfig', () => {
  it('should address MinIO path-style over the derived endpoint', () => {
    expect(createS3ClientConfig(minioConfig)).toEqual({
      region: 'us-east-1',
      endpoint: 'http://localhost:9000',
      forcePathStyle: true,
      credentials: { accessKeyId: 'test-access', secretAccessKey: 'test-secret' },
    });
  });

  it('should pass a session token for S3 and keep virtual-hosted addressing', () => {
    const config = parseBlobStoreConfig({
      framework: 's3',
      rootBucket: 'assets',
      connection: {
        endpoint: 's3.eu-west-1.amazonaws.com',
        secure: true,
        region: 'eu-west-1',
        accessKey: 'test-access',
        secretKey: 'test-secret',
        sessionToken: 'test-session',
      },
    });

    expect(createS3ClientConfig(config)).toEqual({
      region: 'eu-west-1',
      endpoint: 'https://s3.eu-west-1.amazonaws.com',
      forcePathStyle: false,
      credentials: { accessKeyId: 'test-access', secretAccessKey: 'test-secret', sessionToken: 'test-session' },
    });
  });
});

describe('S3BlobStoreAdapter', () => {
  let client: S3Client;
  let send: ReturnType<typeof spyOnSend>;
  let adapter: S3BlobStoreAdapter;

  beforeEach(() => {
    client = new S3Client(createS3ClientConfig(minioConfig));
    send = spyOnSend(client);
    adapter = new S3BlobStoreAdapter(minioConfig, { client, logger: silentLogger });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('listing', () => {
    it('should list named buckets', async () => {
      send.mockImplementation(async () => ({
        Buckets: [{ Name: 'assets', CreationDate: MODIFIED }, { CreationDate: MODIFIED }],
      }));

      const buckets = await collect(adapter.listBuckets());

      expect(buckets).toEqual([{ name: 'assets', createdAt: MODIFIED }]);
      expect(send.mock.calls[0][0]).toBeInstanceOf(ListBucketsCommand);
    });

    it('should follow continuation tokens and only request when iterated', async () => {
      send
        .mockImplementationOnce(async () => ({
          Contents: [{ Key: 'reports/a.txt', Size: 1, LastModified: MODIFIED, ETag: '"a"' }],
          IsTruncated: true,
          NextContinuationToken: 'page-2',
        }))
        .mockImplementationOnce(async () => ({
          Contents: [{ Key: 'reports/b.txt', Size: 2 }],
          IsTruncated: false,
        }));

      const listing = adapter.listObjects('assets', 'reports/');
      expect(send).not.toHaveBeenCalled();

      const objects = await collect(listing);

      expect(objects).toEqual([
        { key: 'reports/a.txt', lastModified: MODIFIED, size: 1, etag: '"a"' },
        { key: 'reports/b.txt', lastModified: new Date(0), size: 2, etag: undefined },
      ]);
      expect(send.mock.calls[0][0]).toBeInstanceOf(ListObjectsV2Command);
      expect(send.mock.calls[1][0].input).toEqual({
        Bucket: 'assets',
        Prefix: 'reports/',
        ContinuationToken: 'page-2',
      });
    });
  });

  describe('writes', () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'polystore-s3-'));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('should put in-memory data with its length and content type', async () => {
      send.mockImplementation(async () => ({ ETag: '"etag-1"', VersionId: 'v1' }));

      const result = await adapter.putObject('hello', 'greeting.txt', 'assets', { contentType: 'text/plain' });
      const command = send.mock.calls[0][0];

      expect(result).toEqual({ bucket: 'assets', key: 'greeting.txt', etag: '"etag-1"', versionId: 'v1' });
      expect(command).toBeInstanceOf(PutObjectCommand);
      expect(command.input).toEqual({
        Bucket: 'assets',
        Key: 'greeting.txt',
        Body: Buffer.from('hello'),
        ContentLength: 5,
        ContentType: 'text/plain',
      });
    });

    it('should stream a local file with its size', async () => {
      const source = path.join(tmpDir, 'upload.txt');
      await fs.writeFile(source, 'file contents');
      let uploaded = '';
      send.mockImplementation(async (command: unknown) => {
        if (command instanceof PutObjectCommand && command.input.Body instanceof Readable) {
          uploaded = (await buffer(command.input.Body)).toString('utf-8');
        }
        return { ETag: '"etag-2"' };
      });

      const result = await adapter.uploadObject(source, 'docs/upload.txt', 'assets');

      expect(uploaded).toBe('file contents');
      expect(send.mock.calls[0][0].input).toMatchObject({ Bucket: 'assets', Key: 'docs/upload.txt', ContentLength: 13 });
      expect(result.etag).toBe('"etag-2"');
    });

    it('should download the body into a file', async () => {
      const destination = path.join(tmpDir, 'download.txt');
      send.mockImplementation(async () => ({ Body: Readable.from([Buffer.from('downloaded')]) }));

      await adapter.downloadObject('docs/a.txt', destination, 'assets');

      expect(await fs.readFile(destination, 'utf-8')).toBe('downloaded');
    });

    it('should delete a specific version', async () => {
      send.mockImplementation(async () => ({}));

      await adapter.deleteObject('docs/a.txt', 'assets', 'v7');

      expect(send.mock.calls[0][0]).toBeInstanceOf(DeleteObjectCommand);
      expect(send.mock.calls[0][0].input).toEqual({ Bucket: 'assets', Key: 'docs/a.txt', VersionId: 'v7' });
    });

    it('should copy with an encoded copy source', async () => {
      send.mockImplementation(async () => ({ CopyObjectResult: { ETag: '"copied"' }, VersionId: 'v2' }));

      const result = await adapter.copyObject('dir/a b.txt', 'dir/b.txt', 'assets', 'archive');

      expect(send.mock.calls[0][0]).toBeInstanceOf(CopyObjectCommand);
      expect(send.mock.calls[0][0].input).toEqual({
        Bucket: 'archive',
        Key: 'dir/b.txt',
        CopySource: 'assets/dir/a%20b.txt',
      });
      expect(result).toEqual({ bucket: 'archive', key: 'dir/b.txt', etag: '"copied"', versionId: 'v2' });
    });
  });

  describe('reads', () => {
    it('should return the body stream and attributes', async () => {
      send.mockImplementation(async () => ({
        Body: Readable.from([Buffer.from('payload')]),
        LastModified: MODIFIED,
        ContentLength: 7,
        ContentType: 'text/plain',
      }));

      const content = await adapter.getObject('docs/a.txt', 'assets');

      expect(send.mock.calls[0][0]).toBeInstanceOf(GetObjectCommand);
      expect(content.lastModified).toEqual(MODIFIED);
      expect(content.size).toBe(7);
      expect(content.contentType).toBe('text/plain');
      expect((await readObjectContent(content)).toString('utf-8')).toBe('payload');
    });

    it('should reject a response without a stream body', async () => {
      send.mockImplementation(async () => ({}));

      await expect(adapter.getObject('docs/a.txt', 'assets')).rejects.toThrow(
        'Object body is not a readable stream (operation: getObject, bucket: assets, key: docs/a.txt)'
      );
    });

    it('should report a missing key as NotFoundError', async () => {
      send.mockImplementation(async () => {
        throw new NoSuchKey({ message: 'The specified key does not exist.', $metadata: { httpStatusCode: 404 } });
      });

      await expect(adapter.getObject('missing.txt', 'assets')).rejects.toThrow(
        'getObject failed: The specified key does not exist. (operation: getObject, bucket: assets, key: missing.txt)'
      );
    });
  });

  describe('presigned URLs', () => {
    it('should sign a path-style GET URL for 900 seconds by default', async () => {
      const url = await adapter.presignedGetUrl('reports/a.txt', 'assets');

      expect(url.startsWith('http://localhost:9000/assets/reports/a.txt?')).toBe(true);
      expect(url).toContain('X-Amz-Expires=900');
      expect(url).toContain('X-Amz-Signature=');
      expect(url).not.toContain('test-secret');
      expect(send).not.toHaveBeenCalled();
    });

    it('should honour an explicit expiry for uploads', async () => {
      const url = await adapter.presignedPutUrl('incoming/b.txt', 'assets', 60);

      expect(url.startsWith('http://localhost:9000/assets/incoming/b.txt?')).toBe(true);
      expect(url).toContain('X-Amz-Expires=60');
      expect(url).toContain('x-id=PutObject');
    });
  });

  describe('lifecycle', () => {
    it('should ping with HeadBucket', async () => {
      send.mockImplementation(async () => ({}));

      await adapter.ping('assets');

      expect(send.mock.calls[0][0]).toBeInstanceOf(HeadBucketCommand);
      expect(send.mock.calls[0][0].input).toEqual({ Bucket: 'assets' });
    });

    it('should destroy the client once on close', async () => {
      const destroy = vi.spyOn(client, 'destroy');

      await adapter.close();
      await adapter.close();

      expect(destroy).toHaveBeenCalledTimes(1);
    });
  });
});

describe('classifyS3Error', () => {
  const context = { operation: 'getObject', bucket: 'assets', key: 'a.txt' };

  it('should map access failures to AccessError', () => {
    const error = new S3ServiceException({
      name: 'AccessDenied',
      $fault: 'client',
      $metadata: { httpStatusCode: 403 },
      message: 'Access Denied',
    });

    expect(classifyS3Error(error, context)).toBeInstanceOf(AccessError);
  });

  it('should map an unnamed 404 to NotFoundError', () => {
    const error = new S3ServiceException({
      name: 'UnknownError',
      $fault: 'client',
      $metadata: { httpStatusCode: 404 },
      message: 'Not Found',
    });

    expect(classifyS3Error(error, context)).toBeInstanceOf(NotFoundError);
  });

  it('should treat network failures as operational', () => {
    const error = classifyS3Error(new Error('connect ECONNREFUSED'), context);

    expect(error).toBeInstanceOf(OperationalError);
    expect(error.message).toBe('getObject failed: connect ECONNREFUSED (operation: getObject, bucket: assets, key: a.txt)');
  });
});

describe('registerS3BlobStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register minio and s3', () => {
    const registry = createBlobStoreRegistry();

    registerS3BlobStore(registry);

    expect(registry.listFrameworks()).toEqual(['memory', 'minio', 's3']);
  });

  it('should let a BlobStore check its root bucket through S3', async () => {
    const send = vi.spyOn(S3Client.prototype, 'send').mockImplementation(async () => ({}));
    const registry = createBlobStoreRegistry();
    registerS3BlobStore(registry);
    const blobs = new BlobStore(minioConfig, { registry, logger: silentLogger });

    const health = await blobs.healthCheck();

    expect(health.status).toBe('ok');
    expect(send.mock.calls[0][0].input).toEqual({ Bucket: 'assets' });
  });
});
