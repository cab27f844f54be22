import type { StoreError } from '@shared/lib/errors.js';
import type { ErrorListener, Unsubscribe } from '@domain/ports/key-value-store.js';
import { ChangeStream } from './change-stream.js';

/**
 * Single-value holder for the most recent store failure.
 * Each new error replaces the previous one; nothing ever resets it to null.
 */
export class ErrorSlot {
  private current: StoreError | null = null;
  private readonly stream: ChangeStream<StoreError>;

  constructor(storeName: string) {
    this.stream = new ChangeStream(`error slot of "${storeName}"`);
  }

  get value(): StoreError | null {
    return this.current;
  }

  set(error: StoreError): void {
    this.current = error;
    this.stream.publish(error);
  }

  watch(listener: ErrorListener): Unsubscribe {
    return this.stream.subscribe(listener);
  }

  /** Stop notifying watchers. The last value stays readable. */
  close(): void {
    this.stream.close();
  }
}
