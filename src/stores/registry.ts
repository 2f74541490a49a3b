/**
 * Keyed store of the resources this agent has granted. Implementations
 * may be remote, so every method is async; callers that read, modify
 * and write back must hold a lock on the key themselves.
 */
export interface ResourceStore<T> {
  get(key: string): Promise<T | undefined>;
  put(key: string, value: T): Promise<void>;
  delete(key: string): Promise<boolean>;
}

/**
 * Process-local store. Values are deep-copied on the way in and out so
 * callers never share references with the registry.
 */
export class InMemoryResourceStore<T> implements ResourceStore<T> {
  private readonly items = new Map<string, T>();

  async get(key: string): Promise<T | undefined> {
    const value = this.items.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  async put(key: string, value: T): Promise<void> {
    this.items.set(key, structuredClone(value));
  }

  async delete(key: string): Promise<boolean> {
    return this.items.delete(key);
  }

  get size(): number {
    return this.items.size;
  }
}
