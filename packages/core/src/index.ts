/**
 * Polystore
 *
 * Backend-agnostic document and blob storage with pluggable adapters
 */

export { AdapterRegistry } from './registry/index.js';
export { createDefaultLogger, silentLogger } from './logger.js';

export type {
  LogLevel,
  Logger,
  Document,
  DocumentFilter,
  DocumentChanges,
  Projection,
  FindOptions,
  UpdateOptions,
  HealthStatus,
} from './types.js';

export type { AdapterFactory, AdapterMetadata, RegisterOptions } from './registry/index.js';

// Errors
export * from './errors.js';

// Configuration
export * from './config/index.js';

// Document store
export * from './document/index.js';

// Blob store
export * from './blob/index.js';
