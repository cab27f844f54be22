import type { FileStoreFactory } from '@domain/ports/file-store.js';
import type { StoreResult } from '@domain/ports/key-value-store.js';
import { StoreNameSchema } from '@domain/types/config.js';
import type { StoreData } from '@domain/types/json.js';
import { createNodeFileStore } from '@infra/persistence/node-file-store.js';
import { defaultStoreDir, resolveHomeDir, resolveStorePath } from '@infra/persistence/store-paths.js';
import { KeyValueStore, openStore } from '@infra/storage/key-value-store.js';
import { ValidationError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export interface StoreRegistryOptions {
  /** Directory for stores opened without an explicit one. Defaults to `<home>/stores`. */
  directory?: string;
  flushDelayMs?: number;
  indent?: number;
  /** Builds the backing file capability for a resolved path. Defaults to NodeFileStore. */
  fileStoreFactory?: FileStoreFactory;
}

/**
 * Store Registry: one live KeyValueStore per name.
 *
 * The first `get` for a name opens the store and starts its init; every later
 * `get` returns that same instance and ignores its directory and initial data.
 * Entries are never evicted: a disposed store stays cached and is handed back
 * as-is.
 */
export class StoreRegistry {
  private readonly stores = new Map<string, KeyValueStore>();
  private readonly directory: string;
  private readonly fileStoreFactory: FileStoreFactory;

  constructor(private readonly options: StoreRegistryOptions = {}) {
    this.directory = options.directory ?? defaultStoreDir(resolveHomeDir());
    this.fileStoreFactory = options.fileStoreFactory ?? createNodeFileStore;
  }

  /**
   * Return the store for `name`, opening it on first request.
   * The returned store may still be loading; await `store.ready` before use.
   * @throws ValidationError if the name cannot be used as a file name
   */
  get(name: string, directory?: string, initialData?: StoreData): KeyValueStore {
    const cached = this.stores.get(name);
    if (cached) {
      if (directory !== undefined && resolveStorePath(name, directory) !== cached.path) {
        logger.warn(`Store "${name}" is already open; ignoring directory`, {
          requested: directory,
          path: cached.path,
        });
      }
      return cached;
    }

    const parsed = StoreNameSchema.safeParse(name);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid store name "${name}": ${parsed.error.issues.map((i) => i.message).join('; ')}`,
        parsed.error.issues,
      );
    }

    const path = resolveStorePath(name, directory ?? this.directory);
    const { store } = openStore(
      {
        name,
        fileStore: this.fileStoreFactory(path),
        flushDelayMs: this.options.flushDelayMs,
        indent: this.options.indent,
      },
      initialData,
    );

    this.stores.set(name, store);
    logger.debug('Opened store', { store: name, path });
    return store;
  }

  has(name: string): boolean {
    return this.stores.has(name);
  }

  names(): string[] {
    return [...this.stores.keys()];
  }

  get size(): number {
    return this.stores.size;
  }

  /** Flush every store that is still live. Disposed stores are skipped. */
  flushAll(): Promise<StoreResult[]> {
    const live = [...this.stores.values()].filter((store) => !store.disposed);
    return Promise.all(live.map((store) => store.flush()));
  }
}
