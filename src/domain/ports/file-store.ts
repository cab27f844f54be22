/**
 * Port interface for the byte-level backing file of one store.
 *
 * Implementations are bound to a single path. They throw on I/O failure;
 * the store wraps whatever they throw in an IOError.
 *
 * For unit tests that don't need real I/O, use MemoryFileStore from
 * `@infra/persistence/memory-file-store.js`.
 */
export interface IFileStore {
  readonly path: string;
  exists(): Promise<boolean>;
  /** Whole file content, or null when the file does not exist. */
  readAll(): Promise<Uint8Array | null>;
  /** Replace the whole file content, creating the file and its directory if needed. */
  writeAll(bytes: Uint8Array): Promise<void>;
}

export type FileStoreFactory = (path: string) => IFileStore;
