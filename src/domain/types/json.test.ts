import { describe, it, expect } from 'vitest';
import { JsonValueSchema, StoreDataSchema, cloneJsonValue } from './json.js';

describe('JsonValueSchema', () => {
  it('accepts primitives', () => {
    for (const value of ['text', 0, -1.5, true, false, null]) {
      expect(JsonValueSchema.parse(value)).toBe(value);
    }
  });

  it('accepts nested arrays and objects', () => {
    const value = { list: [1, 'two', { three: [null] }], flag: true };
    expect(JsonValueSchema.parse(value)).toEqual(value);
  });

  it('rejects undefined', () => {
    expect(JsonValueSchema.safeParse(undefined).success).toBe(false);
  });

  it('rejects functions nested inside objects', () => {
    expect(JsonValueSchema.safeParse({ run: () => 1 }).success).toBe(false);
  });

  it('rejects bigint', () => {
    expect(JsonValueSchema.safeParse(10n).success).toBe(false);
  });
});

describe('StoreDataSchema', () => {
  it('accepts an object of JSON values', () => {
    const data = { theme: 'dark', size: 12, recent: ['a', 'b'] };
    expect(StoreDataSchema.parse(data)).toEqual(data);
  });

  it('accepts an empty object', () => {
    expect(StoreDataSchema.parse({})).toEqual({});
  });

  it('rejects a top-level array', () => {
    expect(StoreDataSchema.safeParse([1, 2]).success).toBe(false);
  });

  it('rejects a top-level primitive', () => {
    expect(StoreDataSchema.safeParse('dark').success).toBe(false);
  });

  it('keeps an own "__proto__" key', () => {
    const data = StoreDataSchema.parse(JSON.parse('{"__proto__":{"x":1},"y":2}'));
    expect(Object.keys(data)).toEqual(['__proto__', 'y']);
    expect(Object.getPrototypeOf(data)).toBe(Object.prototype);
  });

  it('rejects class instances', () => {
    expect(StoreDataSchema.safeParse(new Date(0)).success).toBe(false);
  });
});

describe('cloneJsonValue', () => {
  it('copies nested objects and arrays', () => {
    const original = { list: [{ n: 1 }] };
    const copy = cloneJsonValue(original);

    expect(copy).toEqual(original);
    expect(copy).not.toBe(original);
    if (copy !== null && typeof copy === 'object' && !Array.isArray(copy)) {
      expect(copy['list']).not.toBe(original.list);
    }
  });

  it('keeps an own "__proto__" key', () => {
    const copy = cloneJsonValue(JSON.parse('{"__proto__":{"x":1}}'));
    expect(JSON.stringify(copy)).toBe('{"__proto__":{"x":1}}');
  });
});
