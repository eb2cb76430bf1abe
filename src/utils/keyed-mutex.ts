/**
 * Keyed Mutex
 *
 * Serializes async critical sections per key while letting different keys
 * run concurrently. Waiters for a key run in arrival order.
 */

export class KeyedMutex {
  // Tail of the waiter chain for each key
  private readonly tails: Map<string, Promise<void>> = new Map();

  /**
   * Run `task` once every earlier task for `key` has settled.
   * The task's result or error is passed through unchanged.
   */
  public async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
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

  /**
   * Number of keys with a holder or waiters
   */
  public get size(): number {
    return this.tails.size;
  }
}
