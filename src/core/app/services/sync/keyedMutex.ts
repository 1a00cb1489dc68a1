/** Serialises async work per key; tasks under different keys run concurrently. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /** Runs `task` once every earlier task registered under `key` has settled. */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const previous = this.tails.get(key) ?? Promise.resolve();
    const tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chained = previous.then(() => tail);
    this.tails.set(key, chained);

    try {
      await previous;
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === chained) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}

export const scopeKey = (entity: string, scope: string | number = '*'): string =>
  `${entity}:${String(scope)}`;
