/**
 * Keyed async lock: critical sections sharing a key run one after another in
 * arrival order, sections with different keys never wait on each other.
 */
export class TaskLock {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
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
      // No one queued behind this holder
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
