/**
 * Background sync worker.
 *
 * Decides *when* the sync service drains: on start-up, on a periodic timer,
 * shortly after connectivity returns, and when the app comes back to the
 * foreground. It never touches the queue itself; it reads the service's
 * state and calls `syncPendingItems()`.
 *
 * @module background-sync
 *
 * @example
 * ```typescript
 * import { createBackgroundSyncWorker } from '@kinesync/mobile';
 *
 * const worker = createBackgroundSyncWorker({
 *   service,
 *   connectivity: monitor,
 *   syncInterval: 60_000,
 * });
 *
 * worker.events$.subscribe((event) => {
 *   if (event.type === 'sync-triggered') console.log('Sync:', event.reason);
 * });
 *
 * worker.start();
 *
 * // App went to background
 * worker.pause();
 *
 * // Clean up
 * worker.dispose();
 * ```
 */

import { Subject, type Observable, type Subscription } from 'rxjs';

import { createLogger, type ConnectivityStatus, type Logger } from '@kinesync/core';

import { DEFAULT_SYNC_CONFIG } from './config.js';
import { hasPendingItems, type SyncState } from './sync-state.js';

// ────────────────────────────── Types ──────────────────────────────

/**
 * The part of the sync service the worker drives.
 */
export interface SyncTarget {
  readonly state: SyncState;
  syncPendingItems(): Promise<void>;
}

/**
 * Configuration for {@link BackgroundSyncWorker}.
 */
export interface BackgroundSyncConfig {
  /** Service to trigger */
  service: SyncTarget;

  /** Online/offline signal */
  connectivity: ConnectivityStatus;

  /** Interval between periodic syncs in milliseconds (default: 300000) */
  syncInterval?: number;

  /** Wait after connectivity returns before syncing, in milliseconds (default: 500) */
  debounceDelay?: number;

  /** Logger (default: console logger tagged 'BackgroundSync') */
  logger?: Logger;
}

/**
 * Why the worker triggered a sync.
 */
export type SyncTriggerReason = 'startup' | 'periodic' | 'reconnect' | 'resume';

/**
 * Events emitted by the worker.
 */
export interface WorkerEvent {
  /** Event type */
  type: 'started' | 'stopped' | 'paused' | 'resumed' | 'sync-triggered';

  /** Timestamp of the event */
  timestamp: number;

  /** Set on `sync-triggered` events */
  reason?: SyncTriggerReason;
}

// ────────────────────────────── BackgroundSyncWorker ──────────────────────────────

/**
 * Timer- and connectivity-driven sync scheduler.
 *
 * Lifecycle: stopped → running ⇄ running-and-paused → stopped. Triggers
 * that arrive while stopped or paused are dropped, not deferred.
 */
export class BackgroundSyncWorker {
  readonly syncInterval: number;
  readonly debounceDelay: number;

  private readonly service: SyncTarget;
  private readonly connectivity: ConnectivityStatus;
  private readonly logger: Logger;
  private readonly _events$ = new Subject<WorkerEvent>();

  private _isRunning = false;
  private _isPaused = false;
  private disposed = false;
  private periodicTimer: ReturnType<typeof setInterval> | null = null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private connectivitySubscription: Subscription | null = null;

  constructor(config: BackgroundSyncConfig) {
    this.service = config.service;
    this.connectivity = config.connectivity;
    this.syncInterval = config.syncInterval ?? DEFAULT_SYNC_CONFIG.syncInterval;
    this.debounceDelay = config.debounceDelay ?? DEFAULT_SYNC_CONFIG.debounceDelay;
    this.logger = config.logger ?? createLogger({ context: 'BackgroundSync' });
  }

  // ────────────────────────────── Public API ──────────────────────────────

  /**
   * Observable of worker events.
   */
  get events$(): Observable<WorkerEvent> {
    return this._events$.asObservable();
  }

  get isRunning(): boolean {
    return this._isRunning;
  }

  get isPaused(): boolean {
    return this._isPaused;
  }

  /**
   * Running and not paused.
   */
  get isActive(): boolean {
    return this._isRunning && !this._isPaused;
  }

  /**
   * Start following connectivity and the periodic timer. Syncs at once when
   * online with pending items. Idempotent.
   */
  start(): void {
    if (this.disposed) return;
    if (this._isRunning) {
      this.logger.debug('Already running');
      return;
    }

    this._isRunning = true;
    this._isPaused = false;

    this.connectivitySubscription = this.connectivity.online$.subscribe((online) =>
      this.handleConnectivityChange(online)
    );
    this.startPeriodicSync();

    this.logger.info('Worker started', { syncInterval: this.syncInterval });
    this.emit({ type: 'started', timestamp: Date.now() });

    this.syncIfPending('startup');
  }

  /**
   * Cancel timers and stop following connectivity. Idempotent.
   */
  stop(): void {
    if (!this._isRunning) return;

    this._isRunning = false;
    this._isPaused = false;

    this.stopTimers();
    this.connectivitySubscription?.unsubscribe();
    this.connectivitySubscription = null;

    this.logger.info('Worker stopped');
    this.emit({ type: 'stopped', timestamp: Date.now() });
  }

  /**
   * Suspend scheduling, e.g. when the app goes to the background.
   */
  pause(): void {
    if (!this._isRunning || this._isPaused) return;

    this._isPaused = true;
    this.stopTimers();

    this.logger.info('Worker paused');
    this.emit({ type: 'paused', timestamp: Date.now() });
  }

  /**
   * Resume scheduling and sync at once when online with pending items.
   */
  resume(): void {
    if (!this._isRunning || !this._isPaused) return;

    this._isPaused = false;
    this.startPeriodicSync();

    this.logger.info('Worker resumed');
    this.emit({ type: 'resumed', timestamp: Date.now() });

    this.syncIfPending('resume');
  }

  /**
   * Stop and complete the events stream.
   */
  dispose(): void {
    if (this.disposed) return;

    this.stop();
    this.disposed = true;
    this._events$.complete();
  }

  // ────────────────────────────── Private helpers ──────────────────────────────

  private startPeriodicSync(): void {
    if (this.periodicTimer !== null) {
      clearInterval(this.periodicTimer);
    }

    this.periodicTimer = setInterval(() => {
      if (this.connectivity.isOnline) {
        this.trigger('periodic');
      }
    }, this.syncInterval);
  }

  private stopTimers(): void {
    if (this.periodicTimer !== null) {
      clearInterval(this.periodicTimer);
      this.periodicTimer = null;
    }
    this.cancelDebounce();
  }

  private cancelDebounce(): void {
    if (this.debounceTimer !== null) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }

  private handleConnectivityChange(online: boolean): void {
    if (!this.isActive) return;

    // Flaky links flip several times in a row; only the last flip counts
    this.cancelDebounce();

    if (online) {
      this.debounceTimer = setTimeout(() => {
        this.debounceTimer = null;
        this.trigger('reconnect');
      }, this.debounceDelay);
    }
  }

  private syncIfPending(reason: SyncTriggerReason): void {
    if (this.connectivity.isOnline && hasPendingItems(this.service.state)) {
      this.trigger(reason);
    }
  }

  private trigger(reason: SyncTriggerReason): void {
    if (!this.isActive) return;

    this.logger.debug('Sync triggered', { reason });
    this.emit({ type: 'sync-triggered', timestamp: Date.now(), reason });
    void this.service.syncPendingItems();
  }

  private emit(event: WorkerEvent): void {
    this._events$.next(event);
  }
}

// ────────────────────────────── Factory Function ──────────────────────────────

export function createBackgroundSyncWorker(config: BackgroundSyncConfig): BackgroundSyncWorker {
  return new BackgroundSyncWorker(config);
}
