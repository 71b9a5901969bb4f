/**
 * Synchronous string key-value store used to persist the sync queue.
 *
 * Compatible in shape with MMKV-style native stores; every call completes
 * before it returns, so a queue mutation and its persistence form one step.
 */
export interface KeyValueStorage {
  /** Read a value, `null` when absent */
  getItem(key: string): string | null;

  /** Write a value; `false` when the write did not stick */
  setItem(key: string, value: string): boolean;

  /** Delete a value */
  removeItem(key: string): void;
}
