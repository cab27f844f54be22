export type { IFileStore, FileStoreFactory } from './file-store.js';
export type {
  IKeyValueStore,
  ChangeListener,
  ErrorListener,
  StoreResult,
  Unsubscribe,
} from './key-value-store.js';
