export * from '@domain/types/index.js';
export type * from '@domain/ports/index.js';
export * from '@shared/lib/index.js';
export {
  KeyValueStore,
  openStore,
  DEFAULT_FLUSH_DELAY_MS,
  type KeyValueStoreOptions,
  type OpenedStore,
} from '@infra/storage/key-value-store.js';
export { ChangeStream } from '@infra/storage/change-stream.js';
export { ErrorSlot } from '@infra/storage/error-slot.js';
export { toJsonValue, setEncodable, isToJSON, type ToEncodable } from '@infra/storage/value-adapter.js';
export { StoreRegistry, type StoreRegistryOptions } from '@infra/registries/store-registry.js';
export { NodeFileStore, createNodeFileStore } from '@infra/persistence/node-file-store.js';
export { MemoryFileStore } from '@infra/persistence/memory-file-store.js';
export { resolveStorePath, resolveHomeDir, defaultStoreDir } from '@infra/persistence/store-paths.js';
export { loadConfig, type ResolvedConfig, type LoadConfigOptions } from '@infra/config/config-loader.js';
