export { AdapterRegistry } from './registry.js';
export type { AdapterFactory, AdapterMetadata, RegisterOptions } from './registry.js';
