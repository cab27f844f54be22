import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { LOCALKV_DIRS, LOCALKV_ENV, STORE_FILE_EXTENSION } from '@shared/constants/paths.js';

/**
 * Root directory for localkv state: `LOCALKV_HOME`, or `~/.localkv`.
 */
export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[LOCALKV_ENV.home];
  return fromEnv ? resolve(fromEnv) : join(homedir(), LOCALKV_DIRS.root);
}

/** Default directory for store files under a given home. */
export function defaultStoreDir(home: string): string {
  return join(home, LOCALKV_DIRS.stores);
}

/**
 * Backing file of a store: `<directory>/<name>.json`.
 * The name is used verbatim as the file stem.
 */
export function resolveStorePath(name: string, directory: string): string {
  return join(resolve(directory), `${name}${STORE_FILE_EXTENSION}`);
}
