import { z } from 'zod';
import { booleanish, portNumber, timeoutSeconds } from './shared.js';

/**
 * Zod schemas for store configuration.
 *
 * Objects are `passthrough` so that unknown keys survive validation and end
 * up in `options` / `extras` on the configuration classes.
 */

// ============================================================================
// Document store
// ============================================================================

export const DocumentConnectionSchema = z
  .object({
    uri: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: portNumber.optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    database: z.string().optional(),
    authSource: z.string().optional(),
    ssl: booleanish.default(false),
    connectionTimeout: timeoutSeconds.optional(),
  })
  .passthrough()
  .refine((connection) => connection.uri !== undefined || connection.host !== undefined, {
    message: "Either 'uri' or 'host' must be provided",
  });

export const DocumentStoreConfigSchema = z
  .object({
    framework: z.string().min(1, 'framework must be a non-empty string').default('mongodb'),
    connection: DocumentConnectionSchema,
  })
  .passthrough();

// ============================================================================
// Blob store
// ============================================================================

export const BLOB_FRAMEWORKS = ['minio', 's3', 'memory'] as const;

export type BlobFramework = (typeof BLOB_FRAMEWORKS)[number];

export const BlobConnectionSchema = z
  .object({
    uri: z.string().min(1).optional(),
    endpoint: z.string().min(1).optional(),
    accessKey: z.string().min(1, 'accessKey is required'),
    secretKey: z.string().min(1, 'secretKey is required'),
    secure: booleanish.default(false),
    region: z.string().min(1).default('us-east-1'),
  })
  .passthrough()
  .refine((connection) => connection.uri !== undefined || connection.endpoint !== undefined, {
    message: "Either 'uri' or 'endpoint' must be provided",
  });

export const BlobStoreConfigSchema = z
  .object({
    framework: z.enum(BLOB_FRAMEWORKS).default('minio'),
    rootBucket: z.string().min(1, 'rootBucket must be a non-empty string'),
    connection: BlobConnectionSchema,
  })
  .passthrough();

export type DocumentStoreConfigInput = z.input<typeof DocumentStoreConfigSchema>;
export type ParsedDocumentStoreConfig = z.output<typeof DocumentStoreConfigSchema>;
export type ParsedDocumentConnection = z.output<typeof DocumentConnectionSchema>;

export type BlobStoreConfigInput = z.input<typeof BlobStoreConfigSchema>;
export type ParsedBlobStoreConfig = z.output<typeof BlobStoreConfigSchema>;
export type ParsedBlobConnection = z.output<typeof BlobConnectionSchema>;
