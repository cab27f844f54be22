import type { MockInstance } from 'vitest';
import { IOError, LoadError } from '@shared/lib/errors.js';
import { ChangeStream } from './change-stream.js';
import { ErrorSlot } from './error-slot.js';

describe('ChangeStream', () => {
  let stderrSpy: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stderrSpy.mockRestore();
  });

  it('delivers values to every subscriber in publish order', () => {
    const stream = new ChangeStream<number>('test stream');
    const first: number[] = [];
    const second: number[] = [];
    stream.subscribe((v) => first.push(v));
    stream.subscribe((v) => second.push(v));

    stream.publish(1);
    stream.publish(2);
    stream.publish(3);

    expect(first).toEqual([1, 2, 3]);
    expect(second).toEqual([1, 2, 3]);
  });

  it('does not replay values published before subscribing', () => {
    const stream = new ChangeStream<string>('test stream');
    stream.publish('before');
    const listener = vi.fn();

    stream.subscribe(listener);
    stream.publish('after');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('after');
  });

  it('unsubscribe removes only that listener', () => {
    const stream = new ChangeStream<number>('test stream');
    const kept = vi.fn();
    const dropped = vi.fn();
    stream.subscribe(kept);
    const unsubscribe = stream.subscribe(dropped);

    unsubscribe();
    stream.publish(7);

    expect(kept).toHaveBeenCalledWith(7);
    expect(dropped).not.toHaveBeenCalled();
    expect(stream.listenerCount).toBe(1);
  });

  it('logs a throwing listener and keeps notifying the rest', () => {
    const stream = new ChangeStream<number>('test stream');
    const after = vi.fn();
    stream.subscribe(() => {
      throw new Error('boom');
    });
    stream.subscribe(after);

    expect(() => stream.publish(1)).not.toThrow();

    expect(after).toHaveBeenCalledWith(1);
    expect(stderrSpy).toHaveBeenCalledWith(expect.stringContaining('Listener on test stream threw'));
    expect(stderrSpy).toHaveBeenCalledWith(expect.stringContaining('"error":"boom"'));
  });

  it('ignores publishes and subscribes after close', () => {
    const stream = new ChangeStream<number>('test stream');
    const before = vi.fn();
    stream.subscribe(before);

    stream.close();
    const after = vi.fn();
    stream.subscribe(after);
    stream.publish(1);

    expect(stream.isClosed).toBe(true);
    expect(stream.listenerCount).toBe(0);
    expect(before).not.toHaveBeenCalled();
    expect(after).not.toHaveBeenCalled();
  });

  it('does not warn about listener counts past the EventEmitter default', () => {
    const warningSpy = vi.spyOn(process, 'emitWarning').mockImplementation(() => {});
    const stream = new ChangeStream<number>('test stream');

    for (let i = 0; i < 20; i++) {
      stream.subscribe(() => {});
    }

    expect(warningSpy).not.toHaveBeenCalled();
    warningSpy.mockRestore();
  });
});

describe('ErrorSlot', () => {
  it('starts empty', () => {
    expect(new ErrorSlot('prefs').value).toBeNull();
  });

  it('holds only the most recent error and notifies watchers', () => {
    const slot = new ErrorSlot('prefs');
    const watcher = vi.fn();
    slot.watch(watcher);
    const first = new LoadError('bad file', '/stores/prefs.json');
    const second = new IOError('disk full', '/stores/prefs.json');

    slot.set(first);
    slot.set(second);

    expect(slot.value).toBe(second);
    expect(watcher.mock.calls.map((call) => call[0])).toEqual([first, second]);
  });

  it('keeps its value after close but stops notifying', () => {
    const slot = new ErrorSlot('prefs');
    const watcher = vi.fn();
    slot.watch(watcher);

    slot.close();
    const error = new IOError('disk full', '/stores/prefs.json');
    slot.set(error);

    expect(slot.value).toBe(error);
    expect(watcher).not.toHaveBeenCalled();
  });
});
