/**
 * Durable priority queue of pending sync items.
 *
 * Holds the pending list, ordered by priority with FIFO order inside a
 * priority band, and a dead-letter set of items that ran out of retries or
 * were rejected by the server. Both collections are written to a
 * {@link KeyValueStorage} after every mutation, so a crash never loses an
 * acknowledged enqueue.
 *
 * @module sync-queue
 *
 * @example
 * ```typescript
 * import { createSyncQueue, createSyncItem } from '@kinesync/mobile';
 *
 * const queue = createSyncQueue({ storage });
 *
 * queue.enqueue(createSyncItem({
 *   id: 'session-42',
 *   entityType: 'session',
 *   operationType: 'create',
 *   data: { started_at: '2024-03-01T10:00:00.000Z' },
 * }));
 *
 * const next = queue.peek();
 * if (next) queue.markCompleted(next.id);
 *
 * queue.destroy();
 * ```
 */

import { BehaviorSubject, type Observable } from 'rxjs';

import {
  StorageError,
  createLogger,
  errorMessage,
  type KeyValueStorage,
  type Logger,
  type SyncItem,
} from '@kinesync/core';

import {
  comparePriority,
  copySyncItem,
  incrementRetry,
  shouldRetry,
  syncItemFromJson,
  syncItemToJson,
} from './sync-item.js';

// ────────────────────────────── Types ──────────────────────────────

/**
 * Configuration for {@link SyncQueue}.
 */
export interface SyncQueueConfig {
  /** Backing key-value store */
  storage: KeyValueStorage;

  /** Key of the pending list (default: 'kinesync_sync_queue') */
  queueKey?: string;

  /** Key of the dead-letter set (default: 'kinesync_sync_failed') */
  failedKey?: string;

  /** Logger (default: console logger tagged 'SyncQueue') */
  logger?: Logger;
}

/**
 * Sizes of both collections.
 */
export interface SyncQueueCounts {
  pending: number;
  failed: number;
}

/**
 * Where {@link SyncQueue.markFailed} put the item.
 */
export type MarkFailedOutcome = 'retrying' | 'dead-lettered';

// ────────────────────────────── Constants ──────────────────────────────

export const DEFAULT_QUEUE_KEY = 'kinesync_sync_queue';
export const DEFAULT_FAILED_KEY = 'kinesync_sync_failed';

// ────────────────────────────── SyncQueue ──────────────────────────────

/**
 * Priority-ordered outbox with a dead-letter set.
 *
 * Every method is synchronous, which makes each mutation together with its
 * persistence a single step of the event loop: a drain awaiting the network
 * never observes a half-applied change.
 *
 * The stored collections are read on first use, so a mutation can never
 * overwrite a backlog that has not been loaded yet.
 */
export class SyncQueue {
  private readonly storage: KeyValueStorage;
  private readonly queueKey: string;
  private readonly failedKey: string;
  private readonly logger: Logger;

  private readonly _pending: SyncItem[] = [];
  private readonly _failed = new Map<string, SyncItem>();
  private readonly _counts$ = new BehaviorSubject<SyncQueueCounts>({ pending: 0, failed: 0 });
  private loaded = false;

  constructor(config: SyncQueueConfig) {
    this.storage = config.storage;
    this.queueKey = config.queueKey ?? DEFAULT_QUEUE_KEY;
    this.failedKey = config.failedKey ?? DEFAULT_FAILED_KEY;
    this.logger = config.logger ?? createLogger({ context: 'SyncQueue' });
  }

  // ────────────────────────────── Public API ──────────────────────────────

  /**
   * Observable of collection sizes, emitted after every mutation.
   */
  get counts$(): Observable<SyncQueueCounts> {
    return this._counts$.asObservable();
  }

  get pendingCount(): number {
    this.ensureLoaded();
    return this._pending.length;
  }

  get failedCount(): number {
    this.ensureLoaded();
    return this._failed.size;
  }

  get isEmpty(): boolean {
    this.ensureLoaded();
    return this._pending.length === 0;
  }

  getCounts(): SyncQueueCounts {
    this.ensureLoaded();
    return this.currentCounts();
  }

  /**
   * Restore both collections from storage.
   *
   * Happens on first use anyway; calling it again re-reads storage. Items
   * held in memory but missing from storage (a write that failed) are kept
   * and written back. Missing or unreadable entries load as empty
   * collections; items that fail validation are dropped one by one. Never
   * throws.
   */
  load(): void {
    this.loaded = true;

    const stored = this.readPending();
    const storedFailed = this.readFailed();
    const unsaved = [...this._pending];
    const unsavedFailed = [...this._failed.values()];

    this._pending.length = 0;
    this._failed.clear();

    const seen = new Set<string>();
    for (const item of stored) {
      if (seen.has(item.id)) continue;
      seen.add(item.id);
      this._pending.push(item);
    }

    for (const item of storedFailed) {
      if (seen.has(item.id)) continue;
      seen.add(item.id);
      this._failed.set(item.id, item);
    }

    let merged = 0;
    for (const item of unsaved) {
      if (seen.has(item.id)) continue;
      seen.add(item.id);
      this.insertByPriority(item);
      merged++;
    }

    for (const item of unsavedFailed) {
      if (seen.has(item.id)) continue;
      seen.add(item.id);
      this._failed.set(item.id, item);
      merged++;
    }

    if (merged > 0) {
      this.persist();
    } else if (!sameCounts(this._counts$.value, this.currentCounts())) {
      this.emitCounts();
    }

    this.logger.info('Loaded sync queue', {
      pending: this._pending.length,
      failed: this._failed.size,
      merged,
    });
  }

  /**
   * Add an item to the pending list at its priority position.
   *
   * An id that is already pending is ignored. An id sitting in the dead-letter
   * set is taken out of it first.
   *
   * @returns Whether the item was added
   */
  enqueue(item: SyncItem): boolean {
    this.ensureLoaded();
    if (this.indexOfPending(item.id) !== -1) {
      this.logger.debug('Duplicate item, skipping', { id: item.id });
      return false;
    }

    this._failed.delete(item.id);
    this.insertByPriority(item);
    this.persist();

    this.logger.debug('Enqueued item', {
      id: item.id,
      entityType: item.entityType,
      priority: item.priority,
    });
    return true;
  }

  /**
   * Head of the pending list (highest priority, oldest among ties).
   */
  peek(): SyncItem | null {
    this.ensureLoaded();
    return this._pending[0] ?? null;
  }

  /**
   * Remove and return the head of the pending list.
   */
  dequeue(): SyncItem | null {
    this.ensureLoaded();
    const item = this._pending.shift();
    if (!item) return null;

    this.persist();
    return item;
  }

  /**
   * Forget an item that was delivered. Safe to call more than once.
   */
  markCompleted(id: string): void {
    this.ensureLoaded();
    const removedPending = this.removePending(id) !== null;
    const removedFailed = this._failed.delete(id);

    if (removedPending || removedFailed) {
      this.persist();
      this.logger.debug('Completed item', { id });
    }
  }

  /**
   * Record a transient failure of a pending item.
   *
   * The item's retry count goes up by one. It goes back into the pending list
   * at its priority position (behind its priority band) while retries remain,
   * otherwise into the dead-letter set.
   *
   * @returns Where the item went, or `null` if `id` was not pending
   */
  markFailed(id: string, error: string, maxRetries: number): MarkFailedOutcome | null {
    this.ensureLoaded();
    const item = this.removePending(id);
    if (!item) return null;

    const updated = incrementRetry(item, error);

    if (shouldRetry(updated, maxRetries)) {
      this.insertByPriority(updated);
      this.persist();
      this.logger.info('Retry scheduled', { id, attempt: updated.retryCount, error });
      return 'retrying';
    }

    this._failed.set(id, updated);
    this.persist();
    this.logger.warn('Moved item to dead-letter set, retries exhausted', {
      id,
      retryCount: updated.retryCount,
      error,
    });
    return 'dead-lettered';
  }

  /**
   * Move a pending item straight to the dead-letter set after the server
   * rejected it. The retry count is left as it is.
   *
   * @returns Whether `id` was pending
   */
  markRejected(id: string, error: string): boolean {
    this.ensureLoaded();
    const item = this.removePending(id);
    if (!item) return false;

    this._failed.set(id, copySyncItem(item, { lastError: error, lastRetryAt: Date.now() }));
    this.persist();
    this.logger.warn('Moved rejected item to dead-letter set', { id, error });
    return true;
  }

  /**
   * Move dead-lettered items back to the pending list, keeping their retry
   * counts.
   *
   * @param id - One item to retry; all of them when omitted
   * @returns Number of items moved
   */
  retryFailed(id?: string): number {
    this.ensureLoaded();
    const items =
      id === undefined ? [...this._failed.values()] : [this._failed.get(id)].filter(isDefined);

    if (items.length === 0) return 0;

    for (const item of items) {
      this._failed.delete(item.id);
      this.insertByPriority(item);
    }

    this.persist();
    this.logger.info('Retrying failed items', { count: items.length });
    return items.length;
  }

  /**
   * Snapshot of the pending list in delivery order.
   */
  getPendingItems(): readonly SyncItem[] {
    this.ensureLoaded();
    return [...this._pending];
  }

  /**
   * Snapshot of the dead-letter set in the order items arrived there.
   */
  getFailedItems(): readonly SyncItem[] {
    this.ensureLoaded();
    return [...this._failed.values()];
  }

  /**
   * Drop an item from whichever collection holds it.
   *
   * @returns Whether the item was found
   */
  remove(id: string): boolean {
    this.ensureLoaded();
    const removed = this.removePending(id) !== null || this._failed.delete(id);
    if (removed) this.persist();
    return removed;
  }

  /**
   * Empty both collections.
   */
  clear(): void {
    this.ensureLoaded();
    this._pending.length = 0;
    this._failed.clear();
    this.persist();
    this.logger.info('Cleared sync queue');
  }

  /**
   * Empty the dead-letter set.
   */
  clearFailed(): void {
    this.ensureLoaded();
    this._failed.clear();
    this.persist();
  }

  /**
   * Complete the counts stream. The stored data is left untouched.
   */
  destroy(): void {
    this._counts$.complete();
  }

  // ────────────────────────────── Private helpers ──────────────────────────────

  private ensureLoaded(): void {
    if (!this.loaded) this.load();
  }

  private currentCounts(): SyncQueueCounts {
    return { pending: this._pending.length, failed: this._failed.size };
  }

  private indexOfPending(id: string): number {
    return this._pending.findIndex((item) => item.id === id);
  }

  private removePending(id: string): SyncItem | null {
    const index = this.indexOfPending(id);
    if (index === -1) return null;
    return this._pending.splice(index, 1)[0] ?? null;
  }

  private insertByPriority(item: SyncItem): void {
    const index = this._pending.findIndex(
      (existing) => comparePriority(item.priority, existing.priority) > 0
    );

    if (index === -1) {
      this._pending.push(item);
    } else {
      this._pending.splice(index, 0, item);
    }
  }

  private persist(): void {
    this.write(this.queueKey, JSON.stringify(this._pending.map(syncItemToJson)));
    this.write(
      this.failedKey,
      JSON.stringify(
        Object.fromEntries([...this._failed].map(([id, item]) => [id, syncItemToJson(item)]))
      )
    );
    this.emitCounts();
  }

  private write(key: string, value: string): void {
    try {
      if (!this.storage.setItem(key, value)) {
        this.logger.error(
          'Failed to persist sync queue',
          new StorageError('KINESYNC_S300', `Write to "${key}" was not applied`, { key })
        );
      }
    } catch (error) {
      this.logger.error(
        'Failed to persist sync queue',
        new StorageError('KINESYNC_S300', errorMessage(error), { key }, asError(error))
      );
    }
  }

  private readPending(): SyncItem[] {
    const parsed = this.readJson(this.queueKey);
    if (parsed === undefined) return [];

    if (!Array.isArray(parsed)) {
      this.reportCorrupt(this.queueKey, 'expected an array');
      return [];
    }

    return this.parseItems(parsed);
  }

  private readFailed(): SyncItem[] {
    const parsed = this.readJson(this.failedKey);
    if (parsed === undefined) return [];

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      this.reportCorrupt(this.failedKey, 'expected an object');
      return [];
    }

    return this.parseItems(Object.values(parsed));
  }

  /**
   * Read and parse a stored entry; `undefined` when absent or unreadable.
   */
  private readJson(key: string): unknown {
    let raw: string | null;
    try {
      raw = this.storage.getItem(key);
    } catch (error) {
      this.reportCorrupt(key, errorMessage(error), asError(error));
      return undefined;
    }

    if (raw === null) return undefined;

    try {
      return JSON.parse(raw);
    } catch (error) {
      this.reportCorrupt(key, errorMessage(error), asError(error));
      return undefined;
    }
  }

  private parseItems(values: readonly unknown[]): SyncItem[] {
    const items: SyncItem[] = [];

    for (const value of values) {
      try {
        items.push(syncItemFromJson(value));
      } catch (error) {
        this.logger.warn('Skipping invalid stored item', { error: errorMessage(error) });
      }
    }

    return items;
  }

  private reportCorrupt(key: string, reason: string, cause?: Error): void {
    const error = new StorageError(
      'KINESYNC_S301',
      `Stored entry "${key}" is unreadable: ${reason}`,
      { key },
      cause
    );
    this.logger.warn(error.format());
  }

  private emitCounts(): void {
    this._counts$.next(this.currentCounts());
  }
}

function sameCounts(a: SyncQueueCounts, b: SyncQueueCounts): boolean {
  return a.pending === b.pending && a.failed === b.failed;
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

function asError(value: unknown): Error | undefined {
  return value instanceof Error ? value : undefined;
}

// ────────────────────────────── Factory Function ──────────────────────────────

/**
 * Creates a new {@link SyncQueue}. Persisted items are restored on first use.
 *
 * @example
 * ```typescript
 * const queue = createSyncQueue({ storage: new MMKVKeyValueStorage(mmkv) });
 * queue.pendingCount; // items left over from the last run
 * ```
 */
export function createSyncQueue(config: SyncQueueConfig): SyncQueue {
  return new SyncQueue(config);
}
