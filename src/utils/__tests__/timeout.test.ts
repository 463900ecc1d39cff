import { describe, it, expect, vi, afterEach } from 'vitest';
import { raceWithTimeout } from '../timeout.js';
import { TimeoutError } from '../errors.js';

describe('raceWithTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the operation result when it settles first', async () => {
    await expect(raceWithTimeout('quick', Promise.resolve(42), 1000)).resolves.toBe(42);
  });

  it('propagates the operation rejection', async () => {
    await expect(raceWithTimeout('failing', Promise.reject(new Error('nope')), 1000)).rejects.toThrow('nope');
  });

  it('rejects with TimeoutError when the timer elapses first', async () => {
    vi.useFakeTimers();
    const never = new Promise<string>(() => undefined);

    const raced = raceWithTimeout('git log', never, 250);
    const assertion = expect(raced).rejects.toThrow(new TimeoutError('git log', 250));
    await vi.advanceTimersByTimeAsync(250);
    await assertion;
  });

  it('clears its timer once the race settles', async () => {
    vi.useFakeTimers();
    await raceWithTimeout('quick', Promise.resolve('done'), 5000);
    expect(vi.getTimerCount()).toBe(0);
  });
});
