// src/utils/keyed-mutex.ts

/**
 * In-process mutual exclusion keyed by string.
 *
 * Callers holding different keys run concurrently; callers sharing a key run
 * one after another in arrival order. A rejected task releases the key for
 * the next waiter and its error propagates only to its own caller.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any caller currently holds or waits for `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
