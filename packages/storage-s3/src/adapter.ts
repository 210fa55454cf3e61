/**
 * S3 Blob Store Adapter for Polystore
 *
 * Serves both AWS S3 and MinIO through `@aws-sdk/client-s3`. MinIO (or any
 * endpoint with `forcePathStyle`) is addressed path-style; presigned URLs are
 * signed locally with `@aws-sdk/s3-request-presigner`.
 */

import { createReadStream, createWriteStream } from 'fs';
import { stat } from 'fs/promises';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { S3ClientConfig } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import {
  AccessError,
  NotFoundError,
  OperationalError,
  StoreError,
  errorMessage,
  silentLogger,
  toBuffer,
} from '@polystore/core';
import type {
  BlobStoreAdapter,
  BlobStoreAdapterFactory,
  BlobStoreConfiguration,
  Bucket,
  ErrorContext,
  Logger,
  ObjectContent,
  ObjectData,
  ObjectMetadata,
  ObjectWriteResult,
  PutObjectOptions,
} from '@polystore/core';

const NOT_FOUND_ERRORS = new Set(['NoSuchKey', 'NoSuchBucket', 'NotFound', 'NoSuchVersion']);
const ACCESS_ERRORS = new Set(['AccessDenied', 'InvalidAccessKeyId', 'SignatureDoesNotMatch', 'Forbidden']);

/**
 * Map an SDK error onto the store error taxonomy
 */
export function classifyS3Error(error: unknown, context: ErrorContext): StoreError {
  if (error instanceof StoreError) {
    return error;
  }

  const message = `${context.operation ?? 'operation'} failed: ${errorMessage(error)}`;
  const name = error instanceof Error ? error.name : '';
  const status = error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;

  if (NOT_FOUND_ERRORS.has(name) || status === 404) {
    return new NotFoundError(message, context, error);
  }
  if (ACCESS_ERRORS.has(name) || status === 403) {
    return new AccessError(message, context, error);
  }
  return new OperationalError(message, context, error);
}

/**
 * S3 client settings derived from blob store configuration.
 *
 * Extras: `sessionToken` (temporary credentials) and `forcePathStyle`
 * (always on for MinIO).
 */
export function createS3ClientConfig(config: BlobStoreConfiguration): S3ClientConfig {
  const { connection } = config;
  const { sessionToken, forcePathStyle } = connection.extras;

  return {
    region: connection.region,
    endpoint: config.connectionUri,
    forcePathStyle: config.framework === 'minio' || forcePathStyle === true,
    credentials: {
      accessKeyId: connection.accessKey,
      secretAccessKey: connection.secretKey,
      ...(typeof sessionToken === 'string' ? { sessionToken } : {}),
    },
  };
}

function copySource(bucket: string, key: string): string {
  return `${bucket}/${key.split('/').map(encodeURIComponent).join('/')}`;
}

export interface S3BlobStoreAdapterOptions {
  logger?: Logger;
  /** Pre-built client; by default one is created from the configuration on first use */
  client?: S3Client;
}

/**
 * S3 Blob Store Adapter
 *
 * @example
 * ```typescript
 * const config = parseBlobStoreConfig({
 *   framework: 'minio',
 *   rootBucket: 'assets',
 *   connection: { endpoint: 'localhost:9000', accessKey: 'minio', secretKey: 'minio-secret' },
 * });
 * const adapter = new S3BlobStoreAdapter(config);
 *
 * await adapter.putObject('hello', 'greeting.txt', 'assets');
 * ```
 */
export class S3BlobStoreAdapter implements BlobStoreAdapter {
  readonly framework: string;

  private config: BlobStoreConfiguration;
  private logger: Logger;
  private s3?: S3Client;

  constructor(config: BlobStoreConfiguration, options: S3BlobStoreAdapterOptions = {}) {
    this.config = config;
    this.framework = config.framework;
    this.logger = options.logger ?? silentLogger;
    this.s3 = options.client;
  }

  // ============================================================================
  // Listing
  // ============================================================================

  async *listBuckets(): AsyncGenerator<Bucket> {
    const response = await this.execute({ operation: 'listBuckets' }, (client) =>
      client.send(new ListBucketsCommand({}))
    );

    for (const bucket of response.Buckets ?? []) {
      if (bucket.Name) {
        yield { name: bucket.Name, createdAt: bucket.CreationDate ?? new Date(0) };
      }
    }
  }

  async *listObjects(bucket: string, prefix: string): AsyncGenerator<ObjectMetadata> {
    const context: ErrorContext = { operation: 'listObjects', bucket };
    let continuationToken: string | undefined;

    do {
      const page = await this.execute(context, (client) =>
        client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix || undefined,
            ContinuationToken: continuationToken,
          })
        )
      );

      for (const item of page.Contents ?? []) {
        if (!item.Key) continue;
        yield {
          key: item.Key,
          lastModified: item.LastModified ?? new Date(0),
          size: item.Size ?? 0,
          etag: item.ETag,
        };
      }

      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
  }

  // ============================================================================
  // Objects
  // ============================================================================

  async uploadObject(filePath: string, key: string, bucket: string): Promise<ObjectWriteResult> {
    const context: ErrorContext = { operation: 'uploadObject', bucket, key };

    const response = await this.execute(context, async (client) => {
      const { size } = await stat(filePath);
      return client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: createReadStream(filePath),
          ContentLength: size,
        })
      );
    });

    this.logger.debug('S3 object uploaded', { bucket, key, filePath });
    return { bucket, key, etag: response.ETag, versionId: response.VersionId };
  }

  async putObject(
    data: ObjectData,
    key: string,
    bucket: string,
    options: PutObjectOptions = {}
  ): Promise<ObjectWriteResult> {
    const context: ErrorContext = { operation: 'putObject', bucket, key };

    const response = await this.execute(context, async (client) => {
      const body = await toBuffer(data);
      return client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentLength: body.length,
          ContentType: options.contentType,
        })
      );
    });

    return { bucket, key, etag: response.ETag, versionId: response.VersionId };
  }

  async downloadObject(key: string, filePath: string, bucket: string): Promise<void> {
    const context: ErrorContext = { operation: 'downloadObject', bucket, key };

    await this.execute(context, async (client) => {
      const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      await pipeline(this.requireBody(response.Body, context), createWriteStream(filePath));
    });
  }

  async getObject(key: string, bucket: string): Promise<ObjectContent> {
    const context: ErrorContext = { operation: 'getObject', bucket, key };

    const response = await this.execute(context, (client) =>
      client.send(new GetObjectCommand({ Bucket: bucket, Key: key }))
    );

    return {
      body: this.requireBody(response.Body, context),
      lastModified: response.LastModified ?? new Date(0),
      size: response.ContentLength,
      contentType: response.ContentType,
    };
  }

  async deleteObject(key: string, bucket: string, version?: string): Promise<void> {
    await this.execute({ operation: 'deleteObject', bucket, key }, (client) =>
      client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key, VersionId: version }))
    );
  }

  async copyObject(srcKey: string, dstKey: string, srcBucket: string, dstBucket: string): Promise<ObjectWriteResult> {
    const response = await this.execute({ operation: 'copyObject', bucket: srcBucket, key: srcKey }, (client) =>
      client.send(
        new CopyObjectCommand({
          Bucket: dstBucket,
          Key: dstKey,
          CopySource: copySource(srcBucket, srcKey),
        })
      )
    );

    return {
      bucket: dstBucket,
      key: dstKey,
      etag: response.CopyObjectResult?.ETag,
      versionId: response.VersionId,
    };
  }

  // ============================================================================
  // Presigned URLs
  // ============================================================================

  async presignedGetUrl(key: string, bucket: string, expiry?: number): Promise<string> {
    return this.execute({ operation: 'presignedGetUrl', bucket, key }, (client) =>
      getSignedUrl(client, new GetObjectCommand({ Bucket: bucket, Key: key }), expiry ? { expiresIn: expiry } : {})
    );
  }

  async presignedPutUrl(key: string, bucket: string, expiry?: number): Promise<string> {
    return this.execute({ operation: 'presignedPutUrl', bucket, key }, (client) =>
      getSignedUrl(client, new PutObjectCommand({ Bucket: bucket, Key: key }), expiry ? { expiresIn: expiry } : {})
    );
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  async ping(bucket: string): Promise<void> {
    await this.execute({ operation: 'ping', bucket }, (client) =>
      client.send(new HeadBucketCommand({ Bucket: bucket }))
    );
  }

  async close(): Promise<void> {
    if (!this.s3) return;

    this.s3.destroy();
    this.s3 = undefined;
    this.logger.debug('S3 client released', { framework: this.framework });
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private getClient(): S3Client {
    if (!this.s3) {
      this.s3 = new S3Client(createS3ClientConfig(this.config));
      this.logger.debug('S3 client created', { framework: this.framework, endpoint: this.config.connectionUri });
    }
    return this.s3;
  }

  private requireBody(body: unknown, context: ErrorContext): Readable {
    if (!(body instanceof Readable)) {
      throw new OperationalError('Object body is not a readable stream', context);
    }
    return body;
  }

  private async execute<T>(context: ErrorContext, action: (client: S3Client) => Promise<T>): Promise<T> {
    try {
      return await action(this.getClient());
    } catch (error) {
      throw classifyS3Error(error, context);
    }
  }
}

/**
 * Factory registered under `minio` and `s3`; the client is created on first use
 */
export const s3BlobStoreFactory: BlobStoreAdapterFactory = {
  createClient: (config, logger) => new S3BlobStoreAdapter(config, { logger }),
  metadata: {
    packageName: '@polystore/storage-s3',
    description: 'AWS S3 and MinIO blob store using the AWS SDK v3',
  },
};
