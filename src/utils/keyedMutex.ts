/**
 * In-process mutual exclusion per key.
 *
 * Each key keeps the tail of a promise chain; a new holder runs once every
 * earlier holder for the same key has settled. Different keys never wait on
 * each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => fn());
    // The chain must keep going even when a holder rejects.
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with a holder or waiters. */
  activeKeys(): number {
    return this.tails.size;
  }
}
