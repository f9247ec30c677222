/**
 * FIFO mutual exclusion per key.
 *
 * Each key keeps the tail of a promise chain; a task starts once every task
 * queued before it on the same key has settled. Keys with nothing queued are
 * dropped from the map.
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // The chain must keep going after a failed task; the caller still sees the rejection through `result`
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with queued or running tasks
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}
