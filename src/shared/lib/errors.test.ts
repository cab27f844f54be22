import { describe, it, expect } from 'vitest';
import {
  LocalKvError,
  ValidationError,
  StoreError,
  LoadError,
  IOError,
  SerializationError,
  StoreDisposedError,
  describeError,
} from './errors.js';

describe('LocalKvError', () => {
  it('has name "LocalKvError"', () => {
    const err = new LocalKvError('base error');
    expect(err.name).toBe('LocalKvError');
    expect(err.message).toBe('base error');
    expect(err).toBeInstanceOf(Error);
  });
});

describe('ValidationError', () => {
  it('includes message and issues array', () => {
    const issues = [{ path: 'indent', message: 'too big' }];
    const err = new ValidationError('Validation failed', issues);
    expect(err.name).toBe('ValidationError');
    expect(err.issues).toEqual(issues);
    expect(err).toBeInstanceOf(LocalKvError);
    expect(err).not.toBeInstanceOf(StoreError);
  });
});

describe('LoadError', () => {
  it('carries the path and cause', () => {
    const cause = new SyntaxError('Unexpected token');
    const err = new LoadError('Invalid JSON in file: /s/a.json', '/s/a.json', cause);
    expect(err.name).toBe('LoadError');
    expect(err.path).toBe('/s/a.json');
    expect(err.cause).toBe(cause);
    expect(err).toBeInstanceOf(StoreError);
  });
});

describe('IOError', () => {
  it('carries the path and is a StoreError', () => {
    const err = new IOError('Failed to write store file: /s/a.json', '/s/a.json');
    expect(err.name).toBe('IOError');
    expect(err.path).toBe('/s/a.json');
    expect(err.cause).toBeUndefined();
    expect(err).toBeInstanceOf(StoreError);
  });
});

describe('SerializationError', () => {
  it('formats message with the key and reason', () => {
    const err = new SerializationError('user', 'cycle detected');
    expect(err.name).toBe('SerializationError');
    expect(err.key).toBe('user');
    expect(err.message).toBe('Value for "user" cannot be stored as JSON: cycle detected');
    expect(err).toBeInstanceOf(StoreError);
  });
});

describe('StoreDisposedError', () => {
  it('names the store and suggests flushing first', () => {
    const err = new StoreDisposedError('prefs');
    expect(err.name).toBe('StoreDisposedError');
    expect(err.message).toContain('"prefs"');
    expect(err.message).toContain('Flush before disposing');
    expect(err).toBeInstanceOf(StoreError);
  });
});

describe('describeError', () => {
  it('uses the message of Error instances', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
