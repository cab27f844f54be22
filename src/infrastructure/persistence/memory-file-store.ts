import type { IFileStore } from '@domain/ports/file-store.js';

/**
 * In-memory implementation of IFileStore for use in unit tests.
 *
 * Holds the file content as bytes (null = no file). Counts writes and can be
 * told to fail reads or writes, so tests can drive the store's error paths.
 *
 * Example:
 * ```ts
 * const file = new MemoryFileStore('/stores/settings.json', '{"theme":"dark"}');
 * const { store, ready } = openStore({ name: 'settings', fileStore: file });
 * await ready;
 * ```
 */
export class MemoryFileStore implements IFileStore {
  private content: Uint8Array | null;
  private writeCount = 0;

  /** When set, every readAll/exists call throws it. */
  readError: Error | null = null;
  /** When set, every writeAll call throws it and leaves the content untouched. */
  writeError: Error | null = null;
  /** When set, writeAll waits for it before writing or failing. */
  writeGate: Promise<void> | null = null;

  constructor(
    readonly path: string,
    initialText?: string,
  ) {
    this.content = initialText === undefined ? null : new TextEncoder().encode(initialText);
  }

  async exists(): Promise<boolean> {
    if (this.readError) throw this.readError;
    return this.content !== null;
  }

  async readAll(): Promise<Uint8Array | null> {
    if (this.readError) throw this.readError;
    return this.content === null ? null : this.content.slice();
  }

  async writeAll(bytes: Uint8Array): Promise<void> {
    if (this.writeGate) await this.writeGate;
    if (this.writeError) throw this.writeError;
    this.content = bytes.slice();
    this.writeCount++;
  }

  /** Number of successful writes so far. */
  get writes(): number {
    return this.writeCount;
  }

  /** Current content decoded as UTF-8, or null when there is no file. */
  text(): string | null {
    return this.content === null ? null : new TextDecoder().decode(this.content);
  }
}
