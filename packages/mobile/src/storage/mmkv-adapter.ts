import { createLogger, errorMessage, type KeyValueStorage, type Logger } from '@kinesync/core';

/**
 * Subset of the react-native-mmkv instance API the adapter calls
 */
export interface MMKVInterface {
  getString(key: string): string | undefined;
  set(key: string, value: string | number | boolean): void;
  delete(key: string): void;
}

/**
 * Key-value storage backed by MMKV.
 * MMKV is synchronous, which is what the sync queue needs to persist each
 * mutation before the next one runs.
 *
 * @example
 * ```typescript
 * import { MMKV } from 'react-native-mmkv';
 *
 * const storage = new MMKVKeyValueStorage(new MMKV({ id: 'sync' }));
 * const queue = createSyncQueue({ storage });
 * ```
 */
export class MMKVKeyValueStorage implements KeyValueStorage {
  private readonly mmkv: MMKVInterface;
  private readonly logger: Logger;

  constructor(mmkv: MMKVInterface, logger?: Logger) {
    this.mmkv = mmkv;
    this.logger = logger ?? createLogger({ context: 'MMKVStorage' });
  }

  getItem(key: string): string | null {
    return this.mmkv.getString(key) ?? null;
  }

  setItem(key: string, value: string): boolean {
    try {
      this.mmkv.set(key, value);
      return true;
    } catch (error) {
      this.logger.warn('MMKV write failed', { key, error: errorMessage(error) });
      return false;
    }
  }

  removeItem(key: string): void {
    this.mmkv.delete(key);
  }
}
