import { ConfigurationError } from '../errors.js';
import {
  DocumentStoreConfigSchema,
  type ParsedDocumentConnection,
  type ParsedDocumentStoreConfig,
} from './schema.js';
import { formatIssues, freezeRecord } from './shared.js';
import { buildConnectionUri, uriSchemeFor, type UriScheme } from './uri.js';

/**
 * Validated, immutable connection settings for a document store
 */
export class DocumentConnectionSettings {
  readonly uri?: string;
  readonly host?: string;
  readonly port?: number;
  readonly username?: string;
  readonly password?: string;
  readonly database?: string;
  readonly authSource?: string;
  readonly ssl: boolean;
  /** Seconds */
  readonly connectionTimeout?: number;
  /** Connection keys the schema does not know, passed to the adapter as-is */
  readonly extras: Readonly<Record<string, unknown>>;

  private readonly scheme: UriScheme;

  constructor(parsed: ParsedDocumentConnection, scheme: UriScheme) {
    const { uri, host, port, username, password, database, authSource, ssl, connectionTimeout, ...extras } =
      parsed;
    this.uri = uri;
    this.host = host;
    this.port = port;
    this.username = username;
    this.password = password;
    this.database = database;
    this.authSource = authSource;
    this.ssl = ssl;
    this.connectionTimeout = connectionTimeout;
    this.extras = freezeRecord(extras);
    this.scheme = scheme;
    Object.freeze(this);
  }

  /**
   * Canonical URI, derived on every read
   */
  get connectionUri(): string {
    return buildConnectionUri(this, this.scheme);
  }
}

/**
 * Validated, immutable document store configuration
 */
export class DocumentStoreConfiguration {
  readonly framework: string;
  readonly connection: DocumentConnectionSettings;
  /** Top-level keys the schema does not know */
  readonly options: Readonly<Record<string, unknown>>;

  constructor(parsed: ParsedDocumentStoreConfig) {
    const { framework, connection, ...options } = parsed;
    this.framework = framework;
    this.connection = new DocumentConnectionSettings(connection, uriSchemeFor(framework));
    this.options = freezeRecord(options);
    Object.freeze(this);
  }

  get connectionUri(): string {
    return this.connection.connectionUri;
  }
}

export type DocumentConfigValidation =
  | { success: true; config: DocumentStoreConfiguration }
  | { success: false; error: ConfigurationError };

/**
 * Validate a raw document store configuration without throwing
 *
 * @param raw - Plain object (e.g. parsed JSON) or an existing configuration
 */
export function validateDocumentStoreConfig(raw: unknown): DocumentConfigValidation {
  if (raw instanceof DocumentStoreConfiguration) {
    return { success: true, config: raw };
  }

  const result = DocumentStoreConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    return {
      success: false,
      error: new ConfigurationError(
        `Invalid document store configuration: ${issues.join('; ')}`,
        issues,
        result.error
      ),
    };
  }

  return { success: true, config: new DocumentStoreConfiguration(result.data) };
}

/**
 * Validate a raw document store configuration
 *
 * @throws ConfigurationError listing every schema issue
 *
 * @example
 * ```typescript
 * const config = parseDocumentStoreConfig({
 *   framework: 'mongodb',
 *   connection: { host: 'localhost', port: 27017, database: 'mydb' },
 * });
 * config.connectionUri; // 'mongodb://localhost:27017/mydb'
 * ```
 */
export function parseDocumentStoreConfig(raw: unknown): DocumentStoreConfiguration {
  const result = validateDocumentStoreConfig(raw);
  if (!result.success) {
    throw result.error;
  }
  return result.config;
}
