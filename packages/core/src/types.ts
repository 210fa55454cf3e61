/**
 * Core types for the Polystore library
 */

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

// ============================================================================
// Document Types
// ============================================================================

/**
 * A schema-less document. `_id` is assigned by the backend on insert.
 */
export interface Document {
  _id?: string;
  [field: string]: unknown;
}

/**
 * Filter expression matched against documents.
 * Plain keys match by equality; `$`-prefixed values are backend operators.
 */
export type DocumentFilter = Record<string, unknown>;

/**
 * Update payload. Either operator-style (`{ $set: {...}, $inc: {...} }`)
 * or a plain field map, which is applied as `$set`.
 */
export type DocumentChanges = Record<string, unknown>;

/**
 * Field names to keep in find results (`_id` is always kept)
 */
export type Projection = string[];

export interface FindOptions {
  projection?: Projection;
  /** Documents to skip before returning results (default: 0) */
  skip?: number;
  /** Maximum documents to return, 0 = unbounded (default: 0) */
  limit?: number;
}

export interface UpdateOptions {
  /** Create a document seeded from the filter and payload when nothing matches */
  upsert?: boolean;
}

// ============================================================================
// Health
// ============================================================================

export interface HealthStatus {
  status: 'ok' | 'error';
  message?: string;
  latency: number;
}
