import { Command } from 'commander';
import { JsonValueSchema, type JsonValue } from '@domain/types/json.js';
import { loadConfig, type ResolvedConfig } from '@infra/config/config-loader.js';
import { StoreRegistry } from '@infra/registries/store-registry.js';
import type { KeyValueStore } from '@infra/storage/key-value-store.js';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { unwrap } from '@shared/lib/result.js';

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  home?: string;
  dir?: string;
}

export interface CommandContext {
  globalOpts: GlobalOptions;
  config: ResolvedConfig;
  registry: StoreRegistry;
  cmd: Command;
}

type CommandHandler = (ctx: CommandContext, ...args: string[]) => void | Promise<void>;

/**
 * Extract global CLI options from a Commander command.
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals();
  return {
    json: !!opts['json'],
    verbose: !!opts['verbose'],
    home: typeof opts['home'] === 'string' ? opts['home'] : undefined,
    dir: typeof opts['dir'] === 'string' ? opts['dir'] : undefined,
  };
}

/**
 * Wrap a CLI command handler with standard boilerplate:
 * resolves config, builds the store registry, flushes every opened store
 * once the handler returns, catches errors.
 *
 * Commander's .action() callback receives (...positionalArgs, localOpts, cmd).
 * The wrapper strips the last two, passes cmd via context, and forwards positional args.
 */
export function withCommandContext(handler: CommandHandler): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const cmd = args[args.length - 1];
    if (!(cmd instanceof Command)) {
      throw new TypeError('withCommandContext: expected the Commander command as last argument');
    }
    const positionalArgs = args.slice(0, -2).filter((a): a is string => typeof a === 'string');
    const globalOpts = getGlobalOptions(cmd);

    try {
      const config = loadConfig({
        home: globalOpts.home,
        overrides: globalOpts.dir ? { directory: globalOpts.dir } : undefined,
      });
      setLoggerOptions({
        level: globalOpts.verbose ? 'debug' : config.logLevel,
        json: config.logJson,
      });

      const registry = new StoreRegistry({
        directory: config.directory,
        flushDelayMs: config.flushDelayMs,
        indent: config.indent,
      });

      await handler({ globalOpts, config, registry, cmd }, ...positionalArgs);

      for (const result of await registry.flushAll()) {
        unwrap(result);
      }
    } catch (error) {
      handleCommandError(error, globalOpts.verbose);
    }
  };
}

/**
 * Get a store from the context's registry and wait for it to load.
 * Load failures are thrown so a CLI command never overwrites a file it could not read.
 */
export async function openReadyStore(ctx: CommandContext, name: string): Promise<KeyValueStore> {
  const store = ctx.registry.get(name);
  unwrap(await store.ready);
  return store;
}

/**
 * Interpret a CLI argument as JSON when it parses as JSON, otherwise as a plain string.
 * `42` → 42, `true` → true, `{"a":1}` → object, `hello` → "hello".
 */
export function parseCliValue(raw: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }
  const result = JsonValueSchema.safeParse(parsed);
  return result.success ? result.data : raw;
}

/**
 * Centralized error handler for CLI commands.
 * Prints the error message, and optionally the stack trace if verbose is enabled.
 */
export function handleCommandError(error: unknown, verbose: boolean): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
