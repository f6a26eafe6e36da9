/**
 * In-process async mutex keyed by string (one per log file path).
 *
 * Waiters on the same key run strictly FIFO; different keys never wait on
 * each other. The single-threaded event loop means the map bookkeeping itself
 * needs no further guarding.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Last waiter out drops the entry so idle paths do not accumulate.
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
