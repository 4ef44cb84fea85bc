import type { MemoStore } from "../../core/ports/Cache.js";

/**
 * Map-backed MemoStore.
 * The value is written before it is returned, so a pending promise is
 * shared by concurrent lookups of the same key.
 */
export class InMemoryStore<V> implements MemoStore<V> {
  private readonly entries = new Map<string, { value: V }>();

  getOrCompute(key: string, compute: () => V): V {
    const entry = this.entries.get(key);
    if (entry) {
      return entry.value;
    }

    const value = compute();
    this.entries.set(key, { value });
    return value;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
