import { EventEmitter } from 'node:events';
import { logger } from '@shared/lib/logger.js';
import { describeError } from '@shared/lib/errors.js';
import type { Unsubscribe } from '@domain/ports/key-value-store.js';

const EVENT = 'value';

/**
 * Hot publish point. Subscribers see every value published after they
 * subscribe, in publish order; there is no replay.
 *
 * A throwing listener is logged and skipped so one bad observer cannot
 * break a mutation or starve the others.
 */
export class ChangeStream<T> {
  private readonly emitter = new EventEmitter();
  private closed = false;

  constructor(private readonly label: string) {
    this.emitter.setMaxListeners(0);
  }

  subscribe(listener: (value: T) => void): Unsubscribe {
    if (this.closed) {
      return () => {};
    }

    const handler = (value: T): void => {
      try {
        listener(value);
      } catch (error) {
        logger.error(`Listener on ${this.label} threw`, { error: describeError(error) });
      }
    };

    this.emitter.on(EVENT, handler);
    return () => {
      this.emitter.off(EVENT, handler);
    };
  }

  publish(value: T): void {
    if (this.closed) return;
    this.emitter.emit(EVENT, value);
  }

  get listenerCount(): number {
    return this.emitter.listenerCount(EVENT);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Drop every subscriber. Later publishes and subscribes are no-ops. */
  close(): void {
    this.closed = true;
    this.emitter.removeAllListeners(EVENT);
  }
}
