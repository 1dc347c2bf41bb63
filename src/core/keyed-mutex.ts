/**
 * Keyed Mutex
 *
 * Serializes async critical sections per key (model name). Sections for
 * different keys run independently; sections for the same key run in FIFO
 * order, one at a time.
 */

/**
 * Per-key FIFO async lock.
 *
 * @example
 * ```typescript
 * const locks = new KeyedMutex();
 * await locks.runExclusive('heart', async () => {
 *   await registry.setActive('heart', 'v2');
 * });
 * ```
 */
export class KeyedMutex {
  // Tail of the promise chain per key; removed once the chain drains
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `key` has settled.
   */
  public async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
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
   * Run `task` while holding every listed key. Keys are acquired in sorted
   * order so two multi-key sections cannot deadlock each other.
   */
  public async runExclusiveMany<T>(keys: readonly string[], task: () => Promise<T> | T): Promise<T> {
    const sorted = [...new Set(keys)].sort();

    const acquire = async (index: number): Promise<T> => {
      if (index >= sorted.length) {
        return task();
      }
      return this.runExclusive(sorted[index], () => acquire(index + 1));
    };

    return acquire(0);
  }

  /**
   * Whether any section for `key` is running or queued.
   */
  public isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
