import { UnsupportedFrameworkError } from '../errors.js';
import type { Logger } from '../types.js';

/**
 * Descriptive metadata an adapter factory may advertise
 */
export interface AdapterMetadata {
  /** Package that provides the adapter */
  packageName?: string;
  description?: string;
}

/**
 * Builds adapters for one framework.
 *
 * `createClient` must not perform I/O; connecting is the adapter's
 * `connect()` call (or its first operation).
 */
export interface AdapterFactory<TConfig, TAdapter> {
  createClient(config: TConfig, logger: Logger): TAdapter;
  metadata?: AdapterMetadata;
}

export interface RegisterOptions {
  /** Replace an existing registration instead of throwing */
  override?: boolean;
}

/**
 * Adapter Registry - maps framework identifiers to adapter factories
 *
 * Registries are plain instances passed to the stores that use them, so
 * independent stores (and tests) never share registrations.
 *
 * @example
 * ```typescript
 * const registry = createDocumentStoreRegistry();
 * registerMongoDocumentStore(registry);
 *
 * const store = new DocumentStore(config, { registry });
 * ```
 */
export class AdapterRegistry<TConfig, TAdapter> {
  private factories: Map<string, AdapterFactory<TConfig, TAdapter>> = new Map();

  /**
   * Register a factory
   *
   * @param framework - Identifier used as `framework` in configuration
   * @param factory - Factory building adapters for that framework
   * @throws Error if the framework is already registered and `override` is not set
   */
  register(framework: string, factory: AdapterFactory<TConfig, TAdapter>, options: RegisterOptions = {}): void {
    if (!framework) {
      throw new Error('Framework identifier must be a non-empty string');
    }

    if (this.factories.has(framework) && !options.override) {
      throw new Error(`Framework '${framework}' is already registered`);
    }

    this.factories.set(framework, factory);
  }

  /**
   * Look up the factory for a framework. Nothing is constructed.
   *
   * @throws UnsupportedFrameworkError if nothing is registered under `framework`
   */
  resolve(framework: string): AdapterFactory<TConfig, TAdapter> {
    const factory = this.factories.get(framework);

    if (!factory) {
      throw new UnsupportedFrameworkError(framework, this.listFrameworks());
    }

    return factory;
  }

  has(framework: string): boolean {
    return this.factories.has(framework);
  }

  /**
   * @returns true if the framework was registered
   */
  unregister(framework: string): boolean {
    return this.factories.delete(framework);
  }

  /**
   * Registered identifiers in registration order
   */
  listFrameworks(): string[] {
    return Array.from(this.factories.keys());
  }

  clear(): void {
    this.factories.clear();
  }

  get size(): number {
    return this.factories.size;
  }
}
