/**
 * In-process mutual exclusion per key. Work for one key runs strictly
 * one at a time in arrival order; different keys never wait on each other.
 */
export class KeyedMutex<K> {
  private readonly tails = new Map<K, Promise<void>>();

  async runExclusive<T>(key: K, work: () => Promise<T>): Promise<T> {
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
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
