/**
 * Port for a session-scoped memo table.
 */
export interface MemoStore<V> {
  /**
   * Return the stored value for a key, computing and storing it on a miss.
   * The value is stored before it is returned, so a promise value is shared
   * by every caller that asks while it is still pending.
   */
  getOrCompute(key: string, compute: () => V): V;

  readonly size: number;

  clear(): void;
}
