export { ModelCatalog, type ModelCatalogEntry } from './model-catalog.js';
export { FileRegistryStore, InMemoryRegistryStore, parseRegistryState, type RegistryStore } from './registry-store.js';
export {
  VersionRegistry,
  type RegistryInitResult,
  type VersionRegistryEvents,
  type VersionRegistryOptions,
} from './version-registry.js';
