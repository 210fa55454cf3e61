import { readFileSync } from 'fs';
import dotenv from 'dotenv';
import { ConfigurationError, errorMessage } from '../errors.js';
import { parseBlobStoreConfig, type BlobStoreConfiguration } from './blob-config.js';
import { parseDocumentStoreConfig, type DocumentStoreConfiguration } from './document-config.js';

export type EnvSource = Record<string, string | undefined>;

export interface EnvSection {
  [key: string]: string | EnvSection;
}

export interface EnvLoadOptions {
  /** Variable prefix without the trailing underscore */
  prefix?: string;
  /** Variables to read (default: process.env) */
  env?: EnvSource;
  /** Optional .env file; variables in `env` take precedence over it */
  envFile?: string;
}

export const DEFAULT_DOCUMENT_ENV_PREFIX = 'DOCUMENT_STORE';
export const DEFAULT_BLOB_ENV_PREFIX = 'BLOB_STORE';

function toCamelCase(segment: string): string {
  return segment.toLowerCase().replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

function setPath(target: EnvSection, path: string[], value: string): void {
  let node = target;
  for (const segment of path.slice(0, -1)) {
    const existing = node[segment];
    if (typeof existing === 'object') {
      node = existing;
    } else {
      const child: EnvSection = {};
      node[segment] = child;
      node = child;
    }
  }
  node[path[path.length - 1]] = value;
}

/**
 * Collect `PREFIX_*` variables into a nested object.
 *
 * `__` separates nesting levels and each segment is camel-cased, so
 * `DOCUMENT_STORE_CONNECTION__AUTH_SOURCE=admin` becomes
 * `{ connection: { authSource: 'admin' } }`. Values stay strings; the
 * schemas coerce them.
 */
export function readEnvSection(prefix: string, env: EnvSource): EnvSection {
  const marker = `${prefix.toUpperCase()}_`;
  const section: EnvSection = {};

  for (const [name, value] of Object.entries(env)) {
    if (value === undefined || !name.toUpperCase().startsWith(marker)) continue;

    const path = name
      .slice(marker.length)
      .split('__')
      .filter((segment) => segment.length > 0)
      .map(toCamelCase);
    if (path.length === 0) continue;

    setPath(section, path, value);
  }

  return section;
}

/**
 * Merge an optional .env file under the given variables
 */
export function resolveEnv(options: EnvLoadOptions = {}): EnvSource {
  const env = options.env ?? process.env;
  if (!options.envFile) {
    return env;
  }

  let fileEnv: Record<string, string>;
  try {
    fileEnv = dotenv.parse(readFileSync(options.envFile));
  } catch (error) {
    throw new ConfigurationError(`Failed to read env file ${options.envFile}: ${errorMessage(error)}`, [], error);
  }

  return { ...fileEnv, ...env };
}

/**
 * Build a document store configuration from `DOCUMENT_STORE_*` variables
 *
 * @example
 * ```typescript
 * // DOCUMENT_STORE_FRAMEWORK=mongodb
 * // DOCUMENT_STORE_CONNECTION__HOST=localhost
 * // DOCUMENT_STORE_CONNECTION__PORT=27017
 * const config = loadDocumentStoreConfigFromEnv();
 * ```
 */
export function loadDocumentStoreConfigFromEnv(options: EnvLoadOptions = {}): DocumentStoreConfiguration {
  const env = resolveEnv(options);
  return parseDocumentStoreConfig(readEnvSection(options.prefix ?? DEFAULT_DOCUMENT_ENV_PREFIX, env));
}

/**
 * Build a blob store configuration from `BLOB_STORE_*` variables
 */
export function loadBlobStoreConfigFromEnv(options: EnvLoadOptions = {}): BlobStoreConfiguration {
  const env = resolveEnv(options);
  return parseBlobStoreConfig(readEnvSection(options.prefix ?? DEFAULT_BLOB_ENV_PREFIX, env));
}
