const settled = (): void => undefined;

/**
 * Serializes async work per key. Work for the same key runs one at a time in
 * arrival order; work for different keys never waits on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.runAll([key], fn);
  }

  /**
   * Hold every key in `keys` for the duration of `fn`. All keys are claimed in
   * the same tick, so two overlapping key sets cannot deadlock.
   */
  runAll<T>(keys: readonly string[], fn: () => Promise<T>): Promise<T> {
    const unique = [...new Set(keys)];
    const previous = Promise.all(unique.map((key) => this.tails.get(key) ?? Promise.resolve()));

    const result = previous.then(() => fn());
    const tail = result.then(settled, settled);

    for (const key of unique) {
      this.tails.set(key, tail);
    }

    void tail.then(() => {
      for (const key of unique) {
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      }
    });

    return result;
  }
}
