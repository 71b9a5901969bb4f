import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { createLogger, errorMessage, type KeyValueStorage, type Logger } from '@kinesync/core';

/**
 * Options for {@link FileKeyValueStorage}
 */
export interface FileStorageOptions {
  /** Logger (default: console logger tagged 'FileStorage') */
  logger?: Logger;
}

/**
 * Key-value storage kept in a single JSON file.
 *
 * All keys live in one object that is read once at construction and
 * rewritten on every change. Writes go to a temporary file that is then
 * renamed over the target, so a crash mid-write leaves the previous
 * contents in place.
 *
 * @example
 * ```typescript
 * const storage = new FileKeyValueStorage('./data/sync-state.json');
 * const queue = createSyncQueue({ storage });
 * ```
 */
export class FileKeyValueStorage implements KeyValueStorage {
  readonly filePath: string;
  private readonly logger: Logger;
  private entries: Map<string, string>;

  constructor(filePath: string, options: FileStorageOptions = {}) {
    this.filePath = filePath;
    this.logger = options.logger ?? createLogger({ context: 'FileStorage' });
    this.entries = this.readFile();
  }

  getItem(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  setItem(key: string, value: string): boolean {
    const next = new Map(this.entries);
    next.set(key, value);
    return this.commit(next);
  }

  removeItem(key: string): void {
    if (!this.entries.has(key)) return;

    const next = new Map(this.entries);
    next.delete(key);
    this.commit(next);
  }

  private commit(next: Map<string, string>): boolean {
    const tempPath = `${this.filePath}.tmp`;

    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tempPath, JSON.stringify(Object.fromEntries(next)), 'utf8');
      renameSync(tempPath, this.filePath);
    } catch (error) {
      this.logger.warn('File write failed', { path: this.filePath, error: errorMessage(error) });
      return false;
    }

    this.entries = next;
    return true;
  }

  private readFile(): Map<string, string> {
    if (!existsSync(this.filePath)) return new Map();

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf8'));
    } catch (error) {
      this.logger.warn('Storage file unreadable, starting empty', {
        path: this.filePath,
        error: errorMessage(error),
      });
      return new Map();
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      this.logger.warn('Storage file is not an object, starting empty', { path: this.filePath });
      return new Map();
    }

    const entries = new Map<string, string>();
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') {
        entries.set(key, value);
      }
    }
    return entries;
  }
}
