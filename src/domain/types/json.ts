import { z } from 'zod/v4';

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Serialized form of a whole store: the root JSON object of its backing file. */
export type StoreData = { [key: string]: JsonValue };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isPlainObject(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/*
 * Both schemas validate in place and hand back the input object. Rebuilding
 * it by assignment would turn an own "__proto__" key into a prototype change.
 */
export const JsonValueSchema = z.custom<JsonValue>(isJsonValue, 'Expected a JSON value');

/** Top-level keys are store keys. */
export const StoreDataSchema = z.custom<StoreData>(
  (value) => isPlainObject(value) && Object.values(value).every(isJsonValue),
  'Expected a JSON object of JSON values',
);

/** Deep copy that keeps every own key, "__proto__" included. */
export function cloneJsonValue(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(cloneJsonValue);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, cloneJsonValue(item)] as const),
    );
  }
  return value;
}

/**
 * Capability for caller types that know their own JSON form.
 * Only the value adapter consults it; the store itself takes JsonValue.
 */
export interface ToJSON {
  toJSON(): unknown;
}

export type Encodable = JsonValue | ToJSON;
