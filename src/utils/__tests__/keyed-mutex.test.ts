import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../keyed-mutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs tasks sharing a key one after another in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('branch-a', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive('branch-a', async () => {
      events.push('second:start');
      return 2;
    });

    await new Promise(resolve => setImmediate(resolve));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('lets different keys proceed independently', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const blocked = mutex.runExclusive('a', async () => {
      await gate.promise;
      events.push('a');
    });
    await mutex.runExclusive('b', async () => {
      events.push('b');
    });

    expect(events).toEqual(['b']);
    gate.resolve();
    await blocked;
    expect(events).toEqual(['b', 'a']);
  });

  it('releases the key when a task rejects', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.runExclusive('k', async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('k', async () => 'ran');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ran');
    expect(mutex.isLocked('k')).toBe(false);
  });

  it('reports a key as locked while a task holds it', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const held = mutex.runExclusive('k', () => gate.promise);
    expect(mutex.isLocked('k')).toBe(true);

    gate.resolve();
    await held;
    expect(mutex.isLocked('k')).toBe(false);
  });
});
