export {
  BLOB_FRAMEWORKS,
  BlobConnectionSchema,
  BlobStoreConfigSchema,
  DocumentConnectionSchema,
  DocumentStoreConfigSchema,
} from './schema.js';
export type {
  BlobFramework,
  BlobStoreConfigInput,
  DocumentStoreConfigInput,
  ParsedBlobConnection,
  ParsedBlobStoreConfig,
  ParsedDocumentConnection,
  ParsedDocumentStoreConfig,
} from './schema.js';

export {
  DocumentConnectionSettings,
  DocumentStoreConfiguration,
  parseDocumentStoreConfig,
  validateDocumentStoreConfig,
} from './document-config.js';
export type { DocumentConfigValidation } from './document-config.js';

export {
  BlobConnectionSettings,
  BlobStoreConfiguration,
  parseBlobStoreConfig,
  validateBlobStoreConfig,
} from './blob-config.js';
export type { BlobConfigValidation } from './blob-config.js';

export { MONGODB_SCHEME, buildConnectionUri, buildEndpointUri, uriSchemeFor } from './uri.js';
export type { ConnectionUriParts, EndpointUriParts, UriScheme } from './uri.js';

export {
  DEFAULT_BLOB_ENV_PREFIX,
  DEFAULT_DOCUMENT_ENV_PREFIX,
  loadBlobStoreConfigFromEnv,
  loadDocumentStoreConfigFromEnv,
  readEnvSection,
  resolveEnv,
} from './env.js';
export type { EnvLoadOptions, EnvSection, EnvSource } from './env.js';
