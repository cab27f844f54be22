import { join, resolve } from 'node:path';
import { z } from 'zod/v4';
import {
  LocalKvConfigSchema,
  type LocalKvConfig,
  type LocalKvConfigInput,
} from '@domain/types/config.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import { defaultStoreDir, resolveHomeDir } from '@infra/persistence/store-paths.js';
import { LOCALKV_DIRS, LOCALKV_ENV } from '@shared/constants/paths.js';
import { ValidationError } from '@shared/lib/errors.js';

const ConfigFileSchema = z.record(z.string(), z.unknown());

export interface ResolvedConfig extends LocalKvConfig {
  home: string;
  /** Always set once resolved: explicit, from env or file, or `<home>/stores`. */
  directory: string;
}

export interface LoadConfigOptions {
  home?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: LocalKvConfigInput;
}

function parseNumber(raw: string): number | string {
  const value = Number(raw);
  return raw.trim() !== '' && Number.isFinite(value) ? value : raw;
}

function parseBoolean(raw: string): boolean | string {
  if (raw === '1' || raw.toLowerCase() === 'true') return true;
  if (raw === '0' || raw.toLowerCase() === 'false') return false;
  return raw;
}

/**
 * Map LOCALKV_* variables to config fields. Values that don't parse are
 * passed through unchanged so schema validation reports them.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const fromEnv: Record<string, unknown> = {};
  const directory = env[LOCALKV_ENV.directory];
  const flushDelayMs = env[LOCALKV_ENV.flushDelayMs];
  const indent = env[LOCALKV_ENV.indent];
  const logLevel = env[LOCALKV_ENV.logLevel];
  const logJson = env[LOCALKV_ENV.logJson];

  if (directory) fromEnv['directory'] = directory;
  if (flushDelayMs) fromEnv['flushDelayMs'] = parseNumber(flushDelayMs);
  if (indent) fromEnv['indent'] = parseNumber(indent);
  if (logLevel) fromEnv['logLevel'] = logLevel;
  if (logJson) fromEnv['logJson'] = parseBoolean(logJson);
  return fromEnv;
}

/**
 * Resolve configuration. Precedence, lowest first: schema defaults,
 * `<home>/config.json`, LOCALKV_* environment variables, explicit overrides.
 * @throws ValidationError if the merged configuration is invalid
 * @throws LoadError if config.json exists but is not a JSON object
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const env = options.env ?? process.env;
  const home = options.home ? resolve(options.home) : resolveHomeDir(env);
  const configPath = join(home, LOCALKV_DIRS.config);

  const fromFile = JsonStore.exists(configPath) ? JsonStore.read(configPath, ConfigFileSchema) : {};
  const merged = { ...fromFile, ...configFromEnv(env), ...options.overrides };

  const result = LocalKvConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ValidationError(
      `Invalid localkv configuration: ${result.error.issues.map((i) => `${i.path.map(String).join('.')}: ${i.message}`).join('; ')}`,
      result.error.issues,
    );
  }

  return {
    ...result.data,
    home,
    directory: result.data.directory ?? defaultStoreDir(home),
  };
}
