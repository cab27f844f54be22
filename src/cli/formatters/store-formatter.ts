import type { JsonValue, StoreData } from '@domain/types/json.js';

const MAX_VALUE_WIDTH = 60;

function truncate(text: string): string {
  return text.length > MAX_VALUE_WIDTH ? text.slice(0, MAX_VALUE_WIDTH - 3) + '...' : text;
}

/**
 * Format store entries as an aligned two-column table, in insertion order.
 */
export function formatEntryTable(data: StoreData): string {
  const entries = Object.entries(data);
  if (entries.length === 0) {
    return 'No entries.';
  }

  const keyWidth = Math.max(3, ...entries.map(([key]) => key.length));
  const header = `${'Key'.padEnd(keyWidth)}  Value`;
  const separator = '-'.repeat(header.length);
  const rows = entries.map(([key, value]) => `${key.padEnd(keyWidth)}  ${truncate(JSON.stringify(value))}`);

  return [header, separator, ...rows].join('\n');
}

/**
 * Format a single value for `get`. Strings print bare so they pipe cleanly.
 */
export function formatValue(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value, null, 2);
}

export function formatKeys(keys: string[]): string {
  return keys.length === 0 ? 'No keys.' : keys.join('\n');
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}
