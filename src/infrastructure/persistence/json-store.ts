import { readFileSync, existsSync } from 'node:fs';
import type { z } from 'zod/v4';
import { IOError, LoadError } from '@shared/lib/errors.js';

/**
 * Typed JSON text handling shared by the store codec and the config loader.
 * Parses and validates JSON against Zod schemas, and renders it back in the
 * on-disk layout (indented, trailing newline).
 */
export const JsonStore = {
  /**
   * Parse JSON text read from `path` and validate it against schema.
   * @throws LoadError if the text is not JSON or fails validation
   */
  parse<T>(raw: string, path: string, schema: z.ZodType<T>): T {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new LoadError(`Invalid JSON in file: ${path}`, path, err);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new LoadError(
        `Validation failed for ${path}: ${JSON.stringify(result.error.issues, null, 2)}`,
        path,
        result.error,
      );
    }

    return result.data;
  },

  /** Render data the way store files are written. `indent` 0 gives compact JSON. */
  stringify(data: unknown, indent = 2): string {
    return JSON.stringify(data, null, indent > 0 ? indent : undefined) + '\n';
  },

  /**
   * Read a JSON file synchronously and validate against schema.
   * @throws IOError if the file is missing or unreadable
   * @throws LoadError if the content is invalid
   */
  read<T>(path: string, schema: z.ZodType<T>): T {
    if (!existsSync(path)) {
      throw new IOError(`File not found: ${path}`, path);
    }

    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new IOError(`Failed to read file: ${path}`, path, err);
    }

    return JsonStore.parse(raw, path, schema);
  },

  /** Check if a file exists */
  exists(path: string): boolean {
    return existsSync(path);
  },
};
