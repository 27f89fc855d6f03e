/**
 * Runs tasks one at a time per key, in arrival order. Tasks under different
 * keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails: Map<string, Promise<void>> = new Map();

  /**
   * Number of keys that currently have a running or queued task
   */
  get size(): number {
    return this.tails.size;
  }

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => done);
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
}
