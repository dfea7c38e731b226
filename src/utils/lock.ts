// src/utils/lock.ts
// Keyed async mutex: callers with the same key run one at a time

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `work` once every earlier holder of `key` has finished
   */
  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      // Drop the entry once nobody is queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with a holder or waiters
   */
  get size(): number {
    return this.tails.size;
  }
}
