import { access, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { IFileStore } from '@domain/ports/file-store.js';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * IFileStore over the local filesystem.
 *
 * Writes go to a sibling temp file that is then renamed over the target, so a
 * crash mid-write leaves either the old or the new content, never a torn file.
 */
export class NodeFileStore implements IFileStore {
  constructor(readonly path: string) {}

  async exists(): Promise<boolean> {
    try {
      await access(this.path);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async readAll(): Promise<Uint8Array | null> {
    try {
      return await readFile(this.path);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async writeAll(bytes: Uint8Array): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tempPath = `${this.path}.${process.pid}.tmp`;
    await writeFile(tempPath, bytes);
    await rename(tempPath, this.path);
  }
}

export const createNodeFileStore = (path: string): IFileStore => new NodeFileStore(path);
