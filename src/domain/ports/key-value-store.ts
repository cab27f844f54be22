import type { JsonValue, StoreData } from '@domain/types/json.js';
import type { StoreError } from '@shared/lib/errors.js';
import type { Result } from '@shared/lib/result.js';

export type Unsubscribe = () => void;

export type ChangeListener = (snapshot: StoreData) => void;

export type ErrorListener = (error: StoreError) => void;

export type StoreResult<T = void> = Result<T, StoreError>;

/**
 * Port interface for a named, file-backed key-value store.
 * Consumers outside infrastructure (the value adapter, the CLI) depend on this
 * rather than on the concrete KeyValueStore class.
 */
export interface IKeyValueStore {
  readonly name: string;
  readonly path: string;
  readonly initialized: boolean;
  readonly pendingFlush: boolean;
  readonly disposed: boolean;
  /** Most recent failure. Sticky: success never clears it. */
  readonly lastError: StoreError | null;
  readonly size: number;

  /** Settles with the result of init once loading or seeding completes. */
  readonly ready: Promise<StoreResult<boolean>>;

  init(initialData?: StoreData): Promise<StoreResult<boolean>>;
  getItem(key: string): JsonValue | null;
  /** Applies immediately; resolves once the debounced flush covering this change settles. */
  setItem(key: string, value: JsonValue): Promise<StoreResult>;
  remove(key: string): Promise<StoreResult>;
  clear(): Promise<StoreResult>;
  flush(): Promise<StoreResult>;
  dispose(): void;

  keys(): string[];
  snapshot(): StoreData;
  subscribe(listener: ChangeListener): Unsubscribe;
  onError(listener: ErrorListener): Unsubscribe;
  /** Put an error raised outside the store (e.g. by the value adapter) into its error slot. */
  reportError(error: StoreError): void;
}
