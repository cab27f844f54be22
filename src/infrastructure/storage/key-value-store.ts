import type { IFileStore } from '@domain/ports/file-store.js';
import type {
  ChangeListener,
  ErrorListener,
  IKeyValueStore,
  StoreResult,
  Unsubscribe,
} from '@domain/ports/key-value-store.js';
import {
  StoreDataSchema,
  cloneJsonValue,
  type JsonValue,
  type StoreData,
} from '@domain/types/json.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import {
  IOError,
  LoadError,
  StoreDisposedError,
  StoreError,
  describeError,
} from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { err, ok, tryCatch, tryCatchSync, type Result } from '@shared/lib/result.js';
import { ChangeStream } from './change-stream.js';
import { ErrorSlot } from './error-slot.js';

export const DEFAULT_FLUSH_DELAY_MS = 50;

export interface KeyValueStoreOptions {
  name: string;
  fileStore: IFileStore;
  /** Quiet period after the last mutation before the map is written. */
  flushDelayMs?: number;
  /** Indentation of the backing file; 0 writes compact JSON. */
  indent?: number;
}

type FlushWaiter = (result: StoreResult) => void;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function settle(waiters: FlushWaiter[], result: StoreResult): void {
  for (const resolve of waiters) {
    resolve(result);
  }
}

/**
 * Named key-value store mirrored to one JSON file.
 *
 * Reads are served from the in-memory map. Mutations apply and publish
 * synchronously, then arm a single debounce timer; when it fires the whole
 * map is written once. The promise a mutation returns settles with the result
 * of the write whose snapshot first includes it, so awaiting it is optional.
 *
 * Values are copied on the way in and on the way out: callers never share
 * nested objects with the map or with published snapshots.
 *
 * Disk-touching operations resolve to a Result and never reject. Failures are
 * also put in the error slot, where they stay until a newer failure replaces
 * them.
 */
export class KeyValueStore implements IKeyValueStore {
  readonly name: string;
  readonly ready: Promise<StoreResult<boolean>>;

  private readonly fileStore: IFileStore;
  private readonly flushDelayMs: number;
  private readonly indent: number;
  private readonly changes: ChangeStream<StoreData>;
  private readonly errors: ErrorSlot;

  private entries = new Map<string, JsonValue>();
  private isInitialized = false;
  private isPendingFlush = false;
  private isDisposed = false;

  private initPromise: Promise<StoreResult<boolean>> | null = null;
  private settleReady: (result: StoreResult<boolean>) => void = () => {};
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private flushWaiters: FlushWaiter[] = [];
  /** Tail of the write queue. Every disk write chains onto it, init included. */
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(options: KeyValueStoreOptions) {
    this.name = options.name;
    this.fileStore = options.fileStore;
    this.flushDelayMs = options.flushDelayMs ?? DEFAULT_FLUSH_DELAY_MS;
    this.indent = options.indent ?? 2;
    this.changes = new ChangeStream(`store "${options.name}"`);
    this.errors = new ErrorSlot(options.name);
    this.ready = new Promise((resolve) => {
      this.settleReady = resolve;
    });
  }

  get path(): string {
    return this.fileStore.path;
  }

  get initialized(): boolean {
    return this.isInitialized;
  }

  get pendingFlush(): boolean {
    return this.isPendingFlush;
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  get lastError(): StoreError | null {
    return this.errors.value;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Load the backing file, or seed it with `initialData` when it is absent or
   * empty. Runs once; later calls return the same result.
   *
   * A failed load still leaves the store initialized (empty, or holding the
   * seed) so callers are never blocked by a bad file.
   */
  init(initialData: StoreData = {}): Promise<StoreResult<boolean>> {
    if (this.initPromise) {
      return this.initPromise;
    }

    const loading = this.load(initialData).then((result) => {
      this.isInitialized = true;
      if (result.ok) {
        this.publish();
      }
      this.settleReady(result);
      return result;
    });

    this.initPromise = loading;
    this.writeChain = loading;
    return loading;
  }

  getItem(key: string): JsonValue | null {
    const value = this.entries.get(key);
    if (value !== undefined) {
      return cloneJsonValue(value);
    }
    if (this.entries.has(key)) {
      this.reportError(new StoreError(`Store "${this.name}" holds no JSON value for key "${key}"`));
    }
    return null;
  }

  setItem(key: string, value: JsonValue): Promise<StoreResult> {
    if (this.isDisposed) return this.disposedResult();
    this.entries.set(key, cloneJsonValue(value));
    return this.afterMutation();
  }

  /** Removing an absent key changes nothing: no publish, no flush. */
  remove(key: string): Promise<StoreResult> {
    if (this.isDisposed) return this.disposedResult();
    if (!this.entries.delete(key)) {
      return Promise.resolve(ok(undefined));
    }
    return this.afterMutation();
  }

  clear(): Promise<StoreResult> {
    if (this.isDisposed) return this.disposedResult();
    this.entries.clear();
    return this.afterMutation();
  }

  /**
   * Write the current map now, whether or not anything is pending.
   * Mutations not yet claimed by an earlier write settle with this write's result.
   */
  async flush(): Promise<StoreResult> {
    if (this.isDisposed) return err(new StoreDisposedError(this.name));

    this.cancelTimer();
    return this.enqueueWrite();
  }

  /**
   * Cancel the debounce timer without writing and close both notification
   * channels. Unflushed changes remain only in memory.
   */
  dispose(): void {
    if (this.isDisposed) return;

    this.isDisposed = true;
    this.cancelTimer();
    settle(this.takeWaiters(), err(new StoreDisposedError(this.name)));
    this.changes.close();
    this.errors.close();
    logger.debug('Disposed store', { store: this.name, pendingFlush: this.isPendingFlush });
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  snapshot(): StoreData {
    return Object.fromEntries(
      [...this.entries].map(([key, value]) => [key, cloneJsonValue(value)] as const),
    );
  }

  subscribe(listener: ChangeListener): Unsubscribe {
    return this.changes.subscribe(listener);
  }

  onError(listener: ErrorListener): Unsubscribe {
    return this.errors.watch(listener);
  }

  reportError(error: StoreError): void {
    logger.warn(error.message, { store: this.name, error: error.name });
    this.errors.set(error);
  }

  private async load(initialData: StoreData): Promise<StoreResult<boolean>> {
    const path = this.path;

    const read = await tryCatch(
      async () => ((await this.fileStore.exists()) ? this.fileStore.readAll() : null),
      (error) => new IOError(`Failed to read store file: ${path}`, path, error),
    );
    if (!read.ok) {
      this.entries = new Map();
      return this.fail(read.error);
    }

    const text = read.value === null ? '' : decoder.decode(read.value);
    if (text.trim() === '') {
      return this.seed(initialData);
    }

    const parsed = tryCatchSync(
      () => JsonStore.parse(text, path, StoreDataSchema),
      (error) => error instanceof LoadError
        ? error
        : new LoadError(`Failed to load store file: ${path}`, path, error),
    );
    if (!parsed.ok) {
      this.entries = new Map();
      return this.fail(parsed.error);
    }

    this.entries = new Map(Object.entries(parsed.value));
    logger.debug('Loaded store', { store: this.name, path, keys: this.entries.size });
    return ok(true);
  }

  private async seed(initialData: StoreData): Promise<StoreResult<boolean>> {
    this.entries = new Map(
      Object.entries(initialData).map(([key, value]) => [key, cloneJsonValue(value)] as const),
    );
    logger.info(`Seeding store "${this.name}"`, { path: this.path, keys: this.entries.size });

    const written = await this.persist();
    return written.ok ? ok(true) : written;
  }

  private afterMutation(): Promise<StoreResult> {
    this.isPendingFlush = true;
    this.publish();
    return this.scheduleFlush();
  }

  private scheduleFlush(): Promise<StoreResult> {
    const settled = new Promise<StoreResult>((resolve) => {
      this.flushWaiters.push(resolve);
    });

    this.cancelTimer();
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      void this.runScheduledFlush();
    }, this.flushDelayMs);

    return settled;
  }

  /** A write that started after this timer was armed has already claimed its waiters. */
  private async runScheduledFlush(): Promise<void> {
    if (this.isPendingFlush) {
      await this.enqueueWrite();
    }
  }

  /** Queue a write behind any write (or init) still in progress. */
  private enqueueWrite(): Promise<StoreResult> {
    const write = this.writeChain.then(
      () => this.persist(),
      () => this.persist(),
    );
    this.writeChain = write;
    return write;
  }

  /**
   * Serialize the map as it is right now and hand it to the file store.
   * Every mutation waiting at this point is in the snapshot, so its promise
   * settles with this write's result.
   */
  private async persist(): Promise<StoreResult> {
    const waiters = this.takeWaiters();
    const result = await this.write();
    settle(waiters, result);
    return result;
  }

  private async write(): Promise<StoreResult> {
    const path = this.path;
    this.isPendingFlush = false;

    const encoded = tryCatchSync(
      () => encoder.encode(JsonStore.stringify(Object.fromEntries(this.entries), this.indent)),
      (error) => new StoreError(`Store "${this.name}" holds a value with no JSON form`, error),
    );
    if (!encoded.ok) {
      this.isPendingFlush = true;
      return this.fail(encoded.error);
    }

    const written = await tryCatch(
      () => this.fileStore.writeAll(encoded.value),
      (error) => new IOError(`Failed to write store file: ${path}`, path, error),
    );
    if (!written.ok) {
      this.isPendingFlush = true;
      return this.fail(written.error);
    }

    logger.debug('Flushed store', { store: this.name, path, bytes: encoded.value.byteLength });
    return ok(undefined);
  }

  private publish(): void {
    this.changes.publish(this.snapshot());
  }

  private fail<E extends StoreError>(error: E): Result<never, E> {
    logger.warn(error.message, {
      store: this.name,
      error: error.name,
      cause: error.cause === undefined ? undefined : describeError(error.cause),
    });
    this.errors.set(error);
    return err(error);
  }

  private disposedResult(): Promise<StoreResult> {
    return Promise.resolve(err(new StoreDisposedError(this.name)));
  }

  private takeWaiters(): FlushWaiter[] {
    const waiters = this.flushWaiters;
    this.flushWaiters = [];
    return waiters;
  }

  private cancelTimer(): void {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }
}

export interface OpenedStore {
  store: KeyValueStore;
  /** Init completion signal. Await it before the first read or write. */
  ready: Promise<StoreResult<boolean>>;
}

/**
 * Construct a store and start loading it. Until `ready` settles the store
 * serves an empty map, and anything written in that window is replaced by
 * the loaded content.
 */
export function openStore(options: KeyValueStoreOptions, initialData?: StoreData): OpenedStore {
  const store = new KeyValueStore(options);
  const ready = store.init(initialData);
  return { store, ready };
}
