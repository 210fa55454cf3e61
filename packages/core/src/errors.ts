/**
 * Error taxonomy shared by every store and adapter.
 *
 * Each error carries the inputs of the operation that failed (collection,
 * bucket, key) both on `context` and at the end of its message.
 */

export interface ErrorContext {
  operation?: string;
  framework?: string;
  collection?: string;
  bucket?: string;
  key?: string;
}

export type StoreErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'LOCAL_FILE_ERROR'
  | 'NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'OPERATIONAL_ERROR'
  | 'UNSUPPORTED_FRAMEWORK';

/**
 * Render context as ` (operation: insert, collection: users)`
 */
export function formatErrorContext(context: ErrorContext): string {
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([name, value]) => `${name}: ${value === '' ? '""' : String(value)}`);

  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

/**
 * Base class for all store errors
 */
export class StoreError extends Error {
  public readonly code: StoreErrorCode;
  public readonly context: ErrorContext;
  public override readonly cause?: unknown;

  constructor(code: StoreErrorCode, message: string, context: ErrorContext = {}, cause?: unknown) {
    super(`${message}${formatErrorContext(context)}`);
    this.name = 'StoreError';
    this.code = code;
    this.context = context;
    this.cause = cause;
  }
}

/**
 * Invalid or incomplete settings, raised before any backend call
 */
export class ConfigurationError extends StoreError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super('CONFIGURATION_ERROR', message, {}, cause);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  /**
   * Get formatted issue details
   */
  getDetails(): string {
    if (this.issues.length === 0) return this.message;
    return this.issues.join('\n');
  }
}

/**
 * Missing or malformed call arguments
 */
export class ValidationError extends StoreError {
  constructor(message: string, context: ErrorContext = {}) {
    super('VALIDATION_ERROR', message, context);
    this.name = 'ValidationError';
  }
}

/**
 * Local file for upload/download is absent or inaccessible
 */
export class LocalFileError extends StoreError {
  public readonly filePath: string;

  constructor(filePath: string, message: string, context: ErrorContext = {}, cause?: unknown) {
    super('LOCAL_FILE_ERROR', `${message}: ${filePath}`, context, cause);
    this.name = 'LocalFileError';
    this.filePath = filePath;
  }
}

/**
 * Target collection, document, bucket or object does not exist
 */
export class NotFoundError extends StoreError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super('NOT_FOUND', message, context, cause);
    this.name = 'NotFoundError';
  }
}

/**
 * Authorization or credential failure
 */
export class AccessError extends StoreError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super('ACCESS_DENIED', message, context, cause);
    this.name = 'AccessError';
  }
}

/**
 * Connectivity, timeout or otherwise unclassified backend failure
 */
export class OperationalError extends StoreError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super('OPERATIONAL_ERROR', message, context, cause);
    this.name = 'OperationalError';
  }
}

/**
 * No adapter registered for the requested framework
 */
export class UnsupportedFrameworkError extends StoreError {
  public readonly framework: string;
  public readonly available: string[];

  constructor(framework: string, available: string[] = []) {
    const hint = available.length > 0 ? `. Registered: ${available.join(', ')}` : '';
    super('UNSUPPORTED_FRAMEWORK', `Unsupported framework '${framework}'${hint}`);
    this.name = 'UnsupportedFrameworkError';
    this.framework = framework;
    this.available = available;
  }
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Pass store errors through unchanged; wrap anything else as OperationalError
 * with the operation context attached.
 */
export function toStoreError(error: unknown, context: ErrorContext): StoreError {
  if (error instanceof StoreError) {
    return error;
  }
  const operation = context.operation ?? 'operation';
  return new OperationalError(`${operation} failed: ${errorMessage(error)}`, context, error);
}
