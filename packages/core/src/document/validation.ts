import { ValidationError, type ErrorContext } from '../errors.js';
import type { Document, DocumentChanges, DocumentFilter, FindOptions, UpdateOptions } from '../types.js';
import type { ResolvedFindOptions, ResolvedUpdateOptions } from './types.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

export function isOperatorKey(key: string): boolean {
  return key.startsWith('$');
}

export function requireCollection(collection: unknown, operation: string): asserts collection is string {
  if (typeof collection !== 'string' || collection.trim() === '') {
    throw new ValidationError('Collection name must be a non-empty string', {
      operation,
      collection: typeof collection === 'string' ? collection : undefined,
    });
  }
}

export function requireDocument(document: unknown, context: ErrorContext): asserts document is Document {
  if (!isPlainObject(document)) {
    throw new ValidationError('Document must be a plain object', context);
  }
  if (document._id !== undefined && typeof document._id !== 'string') {
    throw new ValidationError('Document _id must be a string when provided', context);
  }
}

export function requireFilter(filter: unknown, context: ErrorContext): asserts filter is DocumentFilter {
  if (!isPlainObject(filter)) {
    throw new ValidationError('Filter must be a plain object', context);
  }
}

export function requireList(value: unknown, label: string, context: ErrorContext): asserts value is unknown[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${label} must be an array`, context);
  }
}

/**
 * Bring an update payload into operator form.
 *
 * A payload without `$` keys becomes `{ $set: payload }`; a payload that
 * mixes operators with plain fields is rejected.
 */
export function normalizeChanges(changes: unknown, context: ErrorContext): DocumentChanges {
  if (!isPlainObject(changes)) {
    throw new ValidationError('Update payload must be a plain object', context);
  }

  const keys = Object.keys(changes);
  if (keys.length === 0) {
    throw new ValidationError('Update payload must not be empty', context);
  }

  const operatorKeys = keys.filter(isOperatorKey);
  if (operatorKeys.length === 0) {
    return { $set: { ...changes } };
  }

  if (operatorKeys.length !== keys.length) {
    throw new ValidationError("Update payload cannot mix '$' operators with plain fields", context);
  }

  for (const key of operatorKeys) {
    if (!isPlainObject(changes[key])) {
      throw new ValidationError(`Operator '${key}' requires an object of fields`, context);
    }
  }

  return changes;
}

function requireCount(value: number | undefined, label: string, context: ErrorContext): number {
  if (value === undefined) return 0;
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${label} must be a non-negative integer`, context);
  }
  return value;
}

export function resolveFindOptions(options: FindOptions, context: ErrorContext): ResolvedFindOptions {
  const { projection } = options;
  if (
    projection !== undefined &&
    (!Array.isArray(projection) || projection.some((field) => typeof field !== 'string' || field === ''))
  ) {
    throw new ValidationError('Projection must be an array of field names', context);
  }

  return {
    projection,
    skip: requireCount(options.skip, 'skip', context),
    limit: requireCount(options.limit, 'limit', context),
  };
}

export function resolveUpdateOptions(options: UpdateOptions): ResolvedUpdateOptions {
  return { upsert: options.upsert === true };
}
