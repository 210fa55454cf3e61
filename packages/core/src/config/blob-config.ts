import { ConfigurationError } from '../errors.js';
import {
  BlobStoreConfigSchema,
  type BlobFramework,
  type ParsedBlobConnection,
  type ParsedBlobStoreConfig,
} from './schema.js';
import { formatIssues, freezeRecord } from './shared.js';
import { buildEndpointUri } from './uri.js';

export class BlobConnectionSettings {
  readonly uri?: string;
  /** `host[:port]` */
  readonly endpoint?: string;
  readonly accessKey: string;
  readonly secretKey: string;
  readonly secure: boolean;
  readonly region: string;
  readonly extras: Readonly<Record<string, unknown>>;

  constructor(parsed: ParsedBlobConnection) {
    const { uri, endpoint, accessKey, secretKey, secure, region, ...extras } = parsed;
    this.uri = uri;
    this.endpoint = endpoint;
    this.accessKey = accessKey;
    this.secretKey = secretKey;
    this.secure = secure;
    this.region = region;
    this.extras = freezeRecord(extras);
    Object.freeze(this);
  }

  get connectionUri(): string {
    return buildEndpointUri(this);
  }
}

/**
 * Validated, immutable blob store configuration.
 * `rootBucket` is the default bucket for every facade call that omits one.
 */
export class BlobStoreConfiguration {
  readonly framework: BlobFramework;
  readonly rootBucket: string;
  readonly connection: BlobConnectionSettings;
  readonly options: Readonly<Record<string, unknown>>;

  constructor(parsed: ParsedBlobStoreConfig) {
    const { framework, rootBucket, connection, ...options } = parsed;
    this.framework = framework;
    this.rootBucket = rootBucket;
    this.connection = new BlobConnectionSettings(connection);
    this.options = freezeRecord(options);
    Object.freeze(this);
  }

  get connectionUri(): string {
    return this.connection.connectionUri;
  }
}

export type BlobConfigValidation =
  | { success: true; config: BlobStoreConfiguration }
  | { success: false; error: ConfigurationError };

export function validateBlobStoreConfig(raw: unknown): BlobConfigValidation {
  if (raw instanceof BlobStoreConfiguration) {
    return { success: true, config: raw };
  }

  const result = BlobStoreConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    return {
      success: false,
      error: new ConfigurationError(`Invalid blob store configuration: ${issues.join('; ')}`, issues, result.error),
    };
  }

  return { success: true, config: new BlobStoreConfiguration(result.data) };
}

/**
 * @throws ConfigurationError listing every schema issue
 */
export function parseBlobStoreConfig(raw: unknown): BlobStoreConfiguration {
  const result = validateBlobStoreConfig(raw);
  if (!result.success) {
    throw result.error;
  }
  return result.config;
}
