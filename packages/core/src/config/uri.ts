import { ConfigurationError } from '../errors.js';

/**
 * URI scheme tokens for a framework: one for plain connections, one for TLS
 */
export interface UriScheme {
  plain: string;
  tls: string;
}

export const MONGODB_SCHEME: UriScheme = { plain: 'mongodb', tls: 'mongodb+srv' };

const URI_SCHEMES = new Map<string, UriScheme>([
  ['mongodb', MONGODB_SCHEME],
  ['couchdb', { plain: 'http', tls: 'https' }],
  ['memory', { plain: 'memory', tls: 'memory' }],
]);

/**
 * Scheme used when deriving a URI for the framework (falls back to mongodb)
 */
export function uriSchemeFor(framework: string): UriScheme {
  return URI_SCHEMES.get(framework) ?? MONGODB_SCHEME;
}

export interface ConnectionUriParts {
  uri?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  database?: string;
  authSource?: string;
  ssl?: boolean;
}

/**
 * Canonical connection URI for a document store.
 *
 * A raw `uri` is returned verbatim and nothing else is merged into it.
 * Otherwise the URI is assembled as
 * `scheme://[user[:password]@]host[:port][/database][?authSource=...]`.
 *
 * @throws ConfigurationError if neither `uri` nor `host` is set
 *
 * @example
 * ```typescript
 * buildConnectionUri({ host: 'localhost', port: 27017, database: 'mydb' });
 * // 'mongodb://localhost:27017/mydb'
 * ```
 */
export function buildConnectionUri(parts: ConnectionUriParts, scheme: UriScheme = MONGODB_SCHEME): string {
  if (parts.uri) {
    return parts.uri;
  }
  if (!parts.host) {
    throw new ConfigurationError('Host is required to build URI');
  }

  const protocol = parts.ssl ? scheme.tls : scheme.plain;

  let auth = '';
  if (parts.username) {
    auth = encodeURIComponent(parts.username);
    if (parts.password) {
      auth += `:${encodeURIComponent(parts.password)}`;
    }
    auth += '@';
  }

  const port = parts.port !== undefined ? `:${parts.port}` : '';
  const database = parts.database ? `/${encodeURIComponent(parts.database)}` : '';

  const params = new URLSearchParams();
  if (parts.authSource) {
    params.set('authSource', parts.authSource);
  }
  const query = params.toString();

  return `${protocol}://${auth}${parts.host}${port}${database}${query ? `?${query}` : ''}`;
}

export interface EndpointUriParts {
  uri?: string;
  endpoint?: string;
  secure?: boolean;
}

/**
 * Canonical endpoint URI for a blob store: raw `uri`, else `http(s)://endpoint`
 *
 * @throws ConfigurationError if neither `uri` nor `endpoint` is set
 */
export function buildEndpointUri(parts: EndpointUriParts): string {
  if (parts.uri) {
    return parts.uri;
  }
  if (!parts.endpoint) {
    throw new ConfigurationError('Endpoint is required to build URI');
  }
  return `${parts.secure ? 'https' : 'http'}://${parts.endpoint}`;
}
