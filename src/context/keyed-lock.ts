/**
 * Serializes async work per key. Work for different keys runs concurrently;
 * work for the same key runs in arrival order, one at a time.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(() => work());
    // The tail never rejects, so one failed holder does not poison the queue
    const tail = result.then(
      () => undefined,
      () => undefined,
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

  /** Number of keys with work queued or running */
  get size(): number {
    return this.tails.size;
  }
}
