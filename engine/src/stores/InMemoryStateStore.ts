import type { KeyValueStore } from './KeyValueStore.js';

/**
 * Process-local store. Values are deep-copied in and out so callers never
 * share a reference with the stored record.
 */
export class InMemoryStateStore<T> implements KeyValueStore<T> {
  private readonly records = new Map<string, T>();

  async get(key: string): Promise<T | undefined> {
    const value = this.records.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  async put(key: string, value: T): Promise<void> {
    this.records.set(key, structuredClone(value));
  }

  async delete(key: string): Promise<boolean> {
    return this.records.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.records.keys()].sort();
  }

  async entries(): Promise<Array<[string, T]>> {
    const result: Array<[string, T]> = [];
    for (const key of await this.keys()) {
      const value = this.records.get(key);
      if (value !== undefined) {
        result.push([key, structuredClone(value)]);
      }
    }
    return result;
  }

  get size(): number {
    return this.records.size;
  }
}
