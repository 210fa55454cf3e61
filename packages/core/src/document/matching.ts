import { isDeepStrictEqual } from 'util';
import { ValidationError, type ErrorContext } from '../errors.js';
import type { Document, DocumentChanges, DocumentFilter, Projection } from '../types.js';
import { isOperatorKey, isPlainObject } from './validation.js';

/**
 * Filter matching and update operators for the in-memory document store.
 *
 * Covers the subset of query language the in-memory adapter understands:
 * equality (including array membership), dotted paths, `$and` / `$or` /
 * `$nor`, comparison operators, `$in` / `$nin`, `$exists`; and the update
 * operators `$set`, `$unset`, `$inc`, `$push`.
 */

// ============================================================================
// Paths
// ============================================================================

export function getPath(document: Record<string, unknown>, path: string): unknown {
  let current: unknown = document;
  for (const segment of path.split('.')) {
    if (!isPlainObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function hasPath(document: Record<string, unknown>, path: string): boolean {
  const segments = path.split('.');
  const last = segments.pop();
  if (last === undefined) return false;

  let current: unknown = document;
  for (const segment of segments) {
    if (!isPlainObject(current)) return false;
    current = current[segment];
  }
  return isPlainObject(current) && Object.prototype.hasOwnProperty.call(current, last);
}

export function setPath(document: Record<string, unknown>, path: string, value: unknown): void {
  const segments = path.split('.');
  const last = segments.pop();
  if (last === undefined) return;

  let current = document;
  for (const segment of segments) {
    const next = current[segment];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const child: Record<string, unknown> = {};
      current[segment] = child;
      current = child;
    }
  }
  current[last] = value;
}

function unsetPath(document: Record<string, unknown>, path: string): void {
  const segments = path.split('.');
  const last = segments.pop();
  if (last === undefined) return;

  let current: unknown = document;
  for (const segment of segments) {
    if (!isPlainObject(current)) return;
    current = current[segment];
  }
  if (isPlainObject(current)) {
    delete current[last];
  }
}

// ============================================================================
// Filters
// ============================================================================

type Comparable = number | string | Date;

function isComparable(value: unknown): value is Comparable {
  return typeof value === 'number' || typeof value === 'string' || value instanceof Date;
}

/**
 * Order two values of the same kind; undefined when they cannot be ordered
 */
function compare(actual: unknown, expected: unknown): number | undefined {
  if (!isComparable(actual) || !isComparable(expected)) return undefined;

  if (actual instanceof Date && expected instanceof Date) {
    return actual.getTime() - expected.getTime();
  }
  if (typeof actual === 'number' && typeof expected === 'number') {
    return actual - expected;
  }
  if (typeof actual === 'string' && typeof expected === 'string') {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  return undefined;
}

function equals(actual: unknown, expected: unknown): boolean {
  if (isDeepStrictEqual(actual, expected)) return true;
  return Array.isArray(actual) && actual.some((item) => isDeepStrictEqual(item, expected));
}

function isOperatorObject(value: unknown): value is Record<string, unknown> {
  if (!isPlainObject(value)) return false;
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every(isOperatorKey);
}

function matchesOperator(
  actual: unknown,
  present: boolean,
  operator: string,
  operand: unknown,
  context: ErrorContext
): boolean {
  switch (operator) {
    case '$eq':
      return equals(actual, operand);
    case '$ne':
      return !equals(actual, operand);
    case '$gt': {
      const order = compare(actual, operand);
      return order !== undefined && order > 0;
    }
    case '$gte': {
      const order = compare(actual, operand);
      return order !== undefined && order >= 0;
    }
    case '$lt': {
      const order = compare(actual, operand);
      return order !== undefined && order < 0;
    }
    case '$lte': {
      const order = compare(actual, operand);
      return order !== undefined && order <= 0;
    }
    case '$in':
      if (!Array.isArray(operand)) {
        throw new ValidationError("Operator '$in' requires an array", context);
      }
      return operand.some((candidate) => equals(actual, candidate));
    case '$nin':
      if (!Array.isArray(operand)) {
        throw new ValidationError("Operator '$nin' requires an array", context);
      }
      return !operand.some((candidate) => equals(actual, candidate));
    case '$exists':
      return present === Boolean(operand);
    default:
      throw new ValidationError(`Unsupported filter operator '${operator}'`, context);
  }
}

function matchesLogical(
  document: Record<string, unknown>,
  operator: string,
  operand: unknown,
  context: ErrorContext
): boolean {
  if (!Array.isArray(operand) || !operand.every(isPlainObject)) {
    throw new ValidationError(`Operator '${operator}' requires an array of filters`, context);
  }

  switch (operator) {
    case '$and':
      return operand.every((clause) => matchesFilter(document, clause, context));
    case '$or':
      return operand.some((clause) => matchesFilter(document, clause, context));
    case '$nor':
      return !operand.some((clause) => matchesFilter(document, clause, context));
    default:
      throw new ValidationError(`Unsupported filter operator '${operator}'`, context);
  }
}

/**
 * Whether `document` satisfies every clause of `filter`
 */
export function matchesFilter(
  document: Record<string, unknown>,
  filter: DocumentFilter,
  context: ErrorContext = {}
): boolean {
  return Object.entries(filter).every(([key, condition]) => {
    if (isOperatorKey(key)) {
      return matchesLogical(document, key, condition, context);
    }

    const actual = getPath(document, key);
    if (!isOperatorObject(condition)) {
      return equals(actual, condition);
    }

    const present = hasPath(document, key);
    return Object.entries(condition).every(([operator, operand]) =>
      matchesOperator(actual, present, operator, operand, context)
    );
  });
}

/**
 * Fields a filter pins by equality, used to seed upserted documents
 */
export function equalityFields(filter: DocumentFilter): Record<string, unknown> {
  const seed: Record<string, unknown> = {};
  for (const [key, condition] of Object.entries(filter)) {
    if (isOperatorKey(key)) continue;
    if (!isOperatorObject(condition)) {
      setPath(seed, key, structuredClone(condition));
    } else if ('$eq' in condition) {
      setPath(seed, key, structuredClone(condition.$eq));
    }
  }
  return seed;
}

// ============================================================================
// Updates
// ============================================================================

/**
 * Apply operator-form changes to a copy of `document`
 */
export function applyChanges(document: Document, changes: DocumentChanges, context: ErrorContext = {}): Document {
  const updated: Document = structuredClone(document);

  for (const [operator, fields] of Object.entries(changes)) {
    if (!isPlainObject(fields)) {
      throw new ValidationError(`Operator '${operator}' requires an object of fields`, context);
    }

    for (const [path, value] of Object.entries(fields)) {
      if (path === '_id' || path.startsWith('_id.')) {
        throw new ValidationError("Field '_id' is immutable", context);
      }

      switch (operator) {
        case '$set':
          setPath(updated, path, structuredClone(value));
          break;
        case '$unset':
          unsetPath(updated, path);
          break;
        case '$inc': {
          const current = getPath(updated, path) ?? 0;
          if (typeof value !== 'number' || typeof current !== 'number') {
            throw new ValidationError(`Cannot apply '$inc' to non-numeric field '${path}'`, context);
          }
          setPath(updated, path, current + value);
          break;
        }
        case '$push': {
          const current = getPath(updated, path) ?? [];
          if (!Array.isArray(current)) {
            throw new ValidationError(`Cannot apply '$push' to non-array field '${path}'`, context);
          }
          setPath(updated, path, [...current, structuredClone(value)]);
          break;
        }
        default:
          throw new ValidationError(`Unsupported update operator '${operator}'`, context);
      }
    }
  }

  return updated;
}

/**
 * Keep the projected fields plus `_id`
 */
export function project(document: Document, projection: Projection): Document {
  const projected: Document = {};
  if (document._id !== undefined) {
    projected._id = document._id;
  }
  for (const path of projection) {
    if (hasPath(document, path)) {
      setPath(projected, path, structuredClone(getPath(document, path)));
    }
  }
  return projected;
}
