import type { Command } from 'commander';
import { openReadyStore, parseCliValue, withCommandContext } from '@cli/utils.js';
import {
  formatEntryTable,
  formatJson,
  formatKeys,
  formatValue,
} from '@cli/formatters/store-formatter.js';
import { unwrap } from '@shared/lib/result.js';

/**
 * Register the store commands: get, set, remove, clear, dump, keys.
 */
export function registerStoreCommands(parent: Command): void {
  // localkv get <store> <key>
  parent
    .command('get <store> <key>')
    .description('Print the value stored under a key')
    .action(withCommandContext(async (ctx, storeName, key) => {
      const store = await openReadyStore(ctx, storeName);
      const value = store.getItem(key);

      if (value === null && !store.keys().includes(key)) {
        console.error(`Key not found: "${key}" in store "${storeName}"`);
        process.exitCode = 1;
        return;
      }

      console.log(ctx.globalOpts.json ? formatJson(value) : formatValue(value));
    }));

  // localkv set <store> <key> <value>
  parent
    .command('set <store> <key> <value>')
    .description('Store a value under a key (parsed as JSON when possible, else a string)')
    .action(withCommandContext(async (ctx, storeName, key, raw) => {
      const store = await openReadyStore(ctx, storeName);
      const value = parseCliValue(raw);
      unwrap(await store.setItem(key, value));

      if (ctx.globalOpts.json) {
        console.log(formatJson({ store: storeName, key, value }));
      } else {
        console.log(`Set "${key}" in store "${storeName}"`);
      }
    }));

  // localkv remove <store> <key>
  parent
    .command('remove <store> <key>')
    .alias('rm')
    .description('Delete a key (no error if it is absent)')
    .action(withCommandContext(async (ctx, storeName, key) => {
      const store = await openReadyStore(ctx, storeName);
      const existed = store.keys().includes(key);
      unwrap(await store.remove(key));

      if (ctx.globalOpts.json) {
        console.log(formatJson({ store: storeName, key, removed: existed }));
      } else {
        console.log(existed ? `Removed "${key}" from store "${storeName}"` : `Key "${key}" was not set`);
      }
    }));

  // localkv clear <store>
  parent
    .command('clear <store>')
    .description('Delete every key in a store')
    .action(withCommandContext(async (ctx, storeName) => {
      const store = await openReadyStore(ctx, storeName);
      const count = store.size;
      unwrap(await store.clear());
      console.log(ctx.globalOpts.json
        ? formatJson({ store: storeName, cleared: count })
        : `Cleared ${count} ${count === 1 ? 'entry' : 'entries'} from store "${storeName}"`);
    }));

  // localkv dump <store>
  parent
    .command('dump <store>')
    .description('Print every entry of a store')
    .action(withCommandContext(async (ctx, storeName) => {
      const store = await openReadyStore(ctx, storeName);
      const data = store.snapshot();
      console.log(ctx.globalOpts.json ? formatJson(data) : formatEntryTable(data));
    }));

  // localkv keys <store>
  parent
    .command('keys <store>')
    .description('List the keys of a store in insertion order')
    .action(withCommandContext(async (ctx, storeName) => {
      const store = await openReadyStore(ctx, storeName);
      const keys = store.keys();
      console.log(ctx.globalOpts.json ? formatJson(keys) : formatKeys(keys));
    }));
}
