export class LocalKvError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LocalKvError';
  }
}

export class ValidationError extends LocalKvError {
  constructor(
    message: string,
    public readonly issues: unknown[],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Base class for every failure a store reports through its results and error slot. */
export class StoreError extends LocalKvError {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

/** Backing file holds invalid JSON, or JSON whose root is not an object. */
export class LoadError extends StoreError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = 'LoadError';
  }
}

export class IOError extends StoreError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = 'IOError';
  }
}

export class SerializationError extends StoreError {
  constructor(
    public readonly key: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Value for "${key}" cannot be stored as JSON: ${reason}`, cause);
    this.name = 'SerializationError';
  }
}

export class StoreDisposedError extends StoreError {
  constructor(storeName: string) {
    super(`Store "${storeName}" has been disposed. Flush before disposing to keep pending changes.`);
    this.name = 'StoreDisposedError';
  }
}

/** Render an unknown thrown value for log data and error messages. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
