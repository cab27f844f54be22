import type { IKeyValueStore, StoreResult } from '@domain/ports/key-value-store.js';
import { JsonValueSchema, type JsonValue, type ToJSON } from '@domain/types/json.js';
import { SerializationError, describeError } from '@shared/lib/errors.js';
import { err, ok, type Result } from '@shared/lib/result.js';

export type ToEncodable<T> = (value: T) => unknown;

export function isToJSON(value: unknown): value is ToJSON {
  return typeof value === 'object'
    && value !== null
    && 'toJSON' in value
    && typeof value.toJSON === 'function';
}

/**
 * Convert a caller value into the JsonValue the store accepts.
 *
 * `toEncodable` wins when given; otherwise a ToJSON value contributes its
 * `toJSON()` output; otherwise the value is taken as-is. The candidate is then
 * normalized through JSON text, so the stored value equals what a reload of
 * the file yields: nested `toJSON` (e.g. Date) applied, `undefined` members
 * dropped.
 */
export function toJsonValue<T>(
  key: string,
  value: T,
  toEncodable?: ToEncodable<T>,
): Result<JsonValue, SerializationError> {
  let candidate: unknown;
  try {
    candidate = toEncodable ? toEncodable(value) : isToJSON(value) ? value.toJSON() : value;
  } catch (error) {
    return err(new SerializationError(key, `conversion threw: ${describeError(error)}`, error));
  }

  let text: string | undefined;
  try {
    text = JSON.stringify(candidate);
  } catch (error) {
    return err(new SerializationError(key, describeError(error), error));
  }

  if (text === undefined) {
    return err(new SerializationError(key, `${typeof candidate} has no JSON representation`));
  }

  return ok(JsonValueSchema.parse(JSON.parse(text)));
}

/**
 * Adapt `value` and store it under `key`.
 * A conversion failure leaves the map untouched and goes to the store's error
 * slot as well as to the returned result.
 */
export function setEncodable<T>(
  store: IKeyValueStore,
  key: string,
  value: T,
  toEncodable?: ToEncodable<T>,
): Promise<StoreResult> {
  const converted = toJsonValue(key, value, toEncodable);
  if (!converted.ok) {
    store.reportError(converted.error);
    return Promise.resolve(converted);
  }
  return store.setItem(key, converted.value);
}
