import { err, ok, tryCatch, tryCatchSync, unwrap } from './result.js';

class TestError extends Error {
  constructor(readonly original: unknown) {
    super(`wrapped: ${String(original)}`);
  }
}

describe('ok / err', () => {
  it('builds tagged results', () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    const error = new Error('nope');
    expect(err(error)).toEqual({ ok: false, error });
  });
});

describe('tryCatchSync', () => {
  it('captures a return value', () => {
    expect(tryCatchSync(() => 'value', (e) => new TestError(e))).toEqual({ ok: true, value: 'value' });
  });

  it('maps a thrown value', () => {
    const result = tryCatchSync(() => {
      throw 'raw';
    }, (e) => new TestError(e));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.original).toBe('raw');
      expect(result.error.message).toBe('wrapped: raw');
    }
  });
});

describe('tryCatch', () => {
  it('resolves a fulfilled promise to ok', async () => {
    expect(await tryCatch(async () => 3, (e) => new TestError(e))).toEqual({ ok: true, value: 3 });
  });

  it('resolves a rejected promise to err without rejecting', async () => {
    const result = await tryCatch(() => Promise.reject(new Error('late')), (e) => new TestError(e));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('wrapped: Error: late');
    }
  });
});

describe('unwrap', () => {
  it('returns the value of ok', () => {
    expect(unwrap(ok('x'))).toBe('x');
  });

  it('throws the error of err', () => {
    const error = new Error('unwrapped');
    expect(() => unwrap(err(error))).toThrow(error);
  });
});
