/** Promise-chained mutex; callers run strictly one after another. */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    const release = this.enqueue();
    await previous;
    try {
      return await operation();
    } finally {
      release();
    }
  }

  private enqueue(): () => void {
    let release: () => void = () => undefined;
    const wait = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = this.tail.then(() => wait);
    return release;
  }
}

/**
 * One AsyncMutex per key, created on demand and dropped once nobody holds
 * or waits for it.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: AsyncMutex; users: number }>();

  async runExclusive<T>(key: string, operation: () => Promise<T> | T): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new AsyncMutex(), users: 0 };
      this.locks.set(key, entry);
    }
    entry.users += 1;
    try {
      return await entry.mutex.runExclusive(operation);
    } finally {
      entry.users -= 1;
      if (entry.users === 0) this.locks.delete(key);
    }
  }

  /** Number of keys currently held or awaited. */
  get size(): number {
    return this.locks.size;
  }
}
