/**
 * Sync service: drains the {@link SyncQueue} against a remote transport.
 *
 * The service is the single writer of {@link SyncState}. Producers enqueue
 * work through it; the UI observes `state$`; the background worker calls
 * `syncPendingItems()` when connectivity or a timer says so.
 *
 * Delivery is strictly sequential. Each item is offered to the transport with
 * its id as the idempotency key, so a retry after an ambiguous failure (the
 * server applied the write but the response was lost) is harmless.
 *
 * @module sync-service
 *
 * @example
 * ```typescript
 * import { createSyncService } from '@kinesync/mobile';
 *
 * const service = createSyncService({ queue, connectivity, transport });
 * service.initialize();
 *
 * service.state$.subscribe((state) => {
 *   statusLabel.text = describeSyncStatus(state);
 * });
 *
 * service.queueSession({ id: 'session-42', startedAt: new Date() });
 * ```
 */

import {
  BehaviorSubject,
  Subject,
  filter,
  firstValueFrom,
  merge,
  takeUntil,
  timer,
  type Observable,
  type Subscription,
} from 'rxjs';

import {
  KinesyncError,
  createLogger,
  ensureKinesyncError,
  errorMessage,
  type ConnectivityStatus,
  type JsonObject,
  type Logger,
  type SyncEntityType,
  type SyncItem,
  type SyncOperationType,
  type SyncPriority,
  type SyncTransport,
  type TransportResult,
} from '@kinesync/core';

import { DEFAULT_SYNC_CONFIG, type PermanentFailurePolicy } from './config.js';
import {
  EXERCISE_RESULT_PRIORITY,
  SESSION_PRIORITY,
  exerciseResultToPayload,
  sessionToPayload,
  type ExerciseResultRecord,
  type SessionRecord,
} from './entity-payloads.js';
import { ExponentialBackoff } from './exponential-backoff.js';
import { createSyncItem } from './sync-item.js';
import type { SyncQueue } from './sync-queue.js';
import { INITIAL_SYNC_STATE, type SyncState } from './sync-state.js';

// ────────────────────────────── Types ──────────────────────────────

/**
 * Configuration for {@link SyncService}.
 */
export interface SyncServiceConfig {
  /** Queue to drain */
  queue: SyncQueue;

  /** Online/offline signal */
  connectivity: ConnectivityStatus;

  /** Remote endpoint */
  transport: SyncTransport;

  /** Delay policy between retries (default: 1s base, 5min cap, 20% jitter) */
  backoff?: ExponentialBackoff;

  /** Delivery attempts before an item is dead-lettered (default: 5) */
  maxRetries?: number;

  /** Start a drain after each enqueue while online (default: true) */
  syncOnEnqueue?: boolean;

  /** Handling of items the server rejects outright (default: 'dead-letter') */
  permanentFailurePolicy?: PermanentFailurePolicy;

  /** Rejections in a row that stop a drain with an error (default: 10) */
  maxConsecutiveRejections?: number;

  /** Logger (default: console logger tagged 'SyncService') */
  logger?: Logger;
}

/**
 * A mutation handed to {@link SyncService.enqueue}.
 */
export interface EnqueueRequest {
  id: string;
  entityType: SyncEntityType;
  operationType: SyncOperationType;
  data: JsonObject;
  priority?: SyncPriority;
}

type DrainExit =
  | { kind: 'drained' }
  | { kind: 'offline' }
  | { kind: 'disposed' }
  | { kind: 'error'; message: string };

/** Thrown transport errors that no retry can fix */
const FATAL_TRANSPORT_CODES = ['KINESYNC_C502', 'KINESYNC_C505'] as const;

// ────────────────────────────── SyncService ──────────────────────────────

export class SyncService {
  private readonly queue: SyncQueue;
  private readonly connectivity: ConnectivityStatus;
  private readonly transport: SyncTransport;
  private readonly backoff: ExponentialBackoff;
  private readonly maxRetries: number;
  private readonly syncOnEnqueue: boolean;
  private readonly permanentFailurePolicy: PermanentFailurePolicy;
  private readonly maxConsecutiveRejections: number;
  private readonly logger: Logger;

  private readonly _state$ = new BehaviorSubject<SyncState>(INITIAL_SYNC_STATE);
  private readonly destroy$ = new Subject<void>();
  private readonly subscriptions: Subscription[] = [];

  private initialized = false;
  private disposed = false;
  private drainPromise: Promise<void> | null = null;

  constructor(config: SyncServiceConfig) {
    this.queue = config.queue;
    this.connectivity = config.connectivity;
    this.transport = config.transport;
    this.backoff = config.backoff ?? new ExponentialBackoff();
    this.maxRetries = config.maxRetries ?? DEFAULT_SYNC_CONFIG.maxRetries;
    this.syncOnEnqueue = config.syncOnEnqueue ?? DEFAULT_SYNC_CONFIG.syncOnEnqueue;
    this.permanentFailurePolicy =
      config.permanentFailurePolicy ?? DEFAULT_SYNC_CONFIG.permanentFailurePolicy;
    this.maxConsecutiveRejections =
      config.maxConsecutiveRejections ?? DEFAULT_SYNC_CONFIG.maxConsecutiveRejections;
    this.logger = config.logger ?? createLogger({ context: 'SyncService' });

    this.subscriptions.push(
      this.queue.counts$.subscribe(({ pending, failed }) => {
        this.setState({ pendingCount: pending, failedCount: failed });
      })
    );
  }

  // ────────────────────────────── Public API ──────────────────────────────

  /**
   * Observable of state changes. Replays the current state on subscribe.
   */
  get state$(): Observable<SyncState> {
    return this._state$.asObservable();
  }

  /**
   * Current state snapshot.
   */
  get state(): SyncState {
    return this._state$.value;
  }

  /**
   * Restore the queue and start following connectivity. Idempotent.
   */
  initialize(): void {
    if (this.initialized || this.disposed) return;
    this.initialized = true;

    this.queue.load();

    const isOnline = this.connectivity.isOnline;
    this.setState({ isOnline, status: isOnline ? 'idle' : 'offline' });

    this.subscriptions.push(
      this.connectivity.online$.subscribe((online) => this.handleConnectivityChange(online))
    );

    this.logger.info('Sync service initialized', {
      pending: this.queue.pendingCount,
      failed: this.queue.failedCount,
      isOnline,
    });
  }

  /**
   * Queue a mutation for delivery.
   *
   * @returns `false` when the id is already pending or the service is disposed
   */
  enqueue(request: EnqueueRequest): boolean {
    if (this.disposed) {
      this.logger.warn('Enqueue after dispose ignored', { id: request.id });
      return false;
    }

    const added = this.queue.enqueue(createSyncItem(request));

    if (added && this.syncOnEnqueue && this.connectivity.isOnline) {
      void this.syncPendingItems();
    }

    return added;
  }

  queueSession(session: SessionRecord): boolean {
    return this.enqueue({
      id: session.id,
      entityType: 'session',
      operationType: 'create',
      data: sessionToPayload(session),
      priority: SESSION_PRIORITY,
    });
  }

  queueExerciseResult(result: ExerciseResultRecord): boolean {
    return this.enqueue({
      id: result.id,
      entityType: 'exerciseResult',
      operationType: 'create',
      data: exerciseResultToPayload(result),
      priority: EXERCISE_RESULT_PRIORITY,
    });
  }

  /**
   * Deliver pending items until the queue is empty, connectivity drops, or
   * the service is disposed.
   *
   * Does nothing when disposed or offline. While a drain is running, returns
   * the promise of that drain instead of starting another.
   */
  syncPendingItems(): Promise<void> {
    if (this.disposed || !this.connectivity.isOnline) {
      return Promise.resolve();
    }

    this.drainPromise ??= this.runDrain().finally(() => {
      this.drainPromise = null;
    });
    return this.drainPromise;
  }

  /**
   * Put dead-lettered items back in the pending list and drain if online.
   *
   * @param id - One item to retry; all of them when omitted
   * @returns Number of items moved
   */
  retryFailedItems(id?: string): number {
    if (this.disposed) return 0;

    const moved = this.queue.retryFailed(id);
    if (moved > 0 && this.connectivity.isOnline) {
      void this.syncPendingItems();
    }
    return moved;
  }

  /**
   * Drain immediately, bypassing any scheduling.
   */
  forceSyncNow(): Promise<void> {
    return this.syncPendingItems();
  }

  getPendingItems(): readonly SyncItem[] {
    return this.queue.getPendingItems();
  }

  getFailedItems(): readonly SyncItem[] {
    return this.queue.getFailedItems();
  }

  /**
   * Stop all work. A transport call in flight may still complete, but its
   * result is discarded; backoff waits end at once.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    this.destroy$.next();
    this.destroy$.complete();

    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions.length = 0;

    this._state$.complete();
    this.logger.debug('Sync service disposed');
  }

  // ────────────────────────────── Drain ──────────────────────────────

  private async runDrain(): Promise<void> {
    this.setState({ status: 'syncing' });
    this.logger.info('Sync started', { pending: this.queue.pendingCount });

    let exit: DrainExit;
    try {
      exit = await this.drain();
    } catch (error) {
      exit = { kind: 'error', message: errorMessage(error) };
      this.logger.error('Sync failed unexpectedly', ensureKinesyncError(error, 'KINESYNC_C500'));
    }

    switch (exit.kind) {
      case 'drained':
        this.setState({ status: 'idle', lastSyncAt: Date.now(), errorMessage: undefined });
        this.logger.info('Sync finished', { failed: this.queue.failedCount });
        break;

      case 'offline':
        this.setState({ status: 'offline', isOnline: this.connectivity.isOnline });
        this.logger.info('Sync paused, offline', { pending: this.queue.pendingCount });
        break;

      case 'error':
        this.setState({ status: 'error', errorMessage: exit.message });
        break;

      case 'disposed':
        break;
    }
  }

  private async drain(): Promise<DrainExit> {
    let consecutiveRejections = 0;

    for (;;) {
      if (this.disposed) return { kind: 'disposed' };
      if (!this.connectivity.isOnline) return { kind: 'offline' };

      const item = this.queue.peek();
      if (!item) return { kind: 'drained' };

      let result: TransportResult;
      try {
        result = await this.transport.send(item);
      } catch (error) {
        if (this.disposed) return { kind: 'disposed' };

        const fatal = FATAL_TRANSPORT_CODES.find((code) => KinesyncError.isCode(error, code));
        if (fatal && error instanceof Error) {
          this.logger.error('Sync stopped, transport cannot recover', error, { id: item.id });
          return { kind: 'error', message: error.message };
        }

        result = { kind: 'retryable', message: errorMessage(error) };
      }

      if (this.disposed) return { kind: 'disposed' };

      switch (result.kind) {
        case 'success':
          consecutiveRejections = 0;
          this.queue.markCompleted(item.id);
          this.logger.debug('Synced item', { id: item.id });
          break;

        case 'retryable':
          consecutiveRejections = 0;
          await this.failAndBackOff(item, result.message);
          break;

        case 'permanent':
          consecutiveRejections++;
          if (this.permanentFailurePolicy === 'retry') {
            await this.failAndBackOff(item, result.message);
          } else {
            this.queue.markRejected(item.id, result.message);
          }

          if (consecutiveRejections >= this.maxConsecutiveRejections) {
            this.logger.warn('Sync stopped after repeated rejections', {
              rejections: consecutiveRejections,
            });
            return {
              kind: 'error',
              message: `Server rejected ${consecutiveRejections} items in a row`,
            };
          }
          break;
      }
    }
  }

  /**
   * Count a failed attempt and, if the item stays pending, wait out the
   * backoff delay for the attempt that just failed. The wait ends early on
   * dispose or when connectivity drops.
   */
  private async failAndBackOff(item: SyncItem, message: string): Promise<void> {
    const outcome = this.queue.markFailed(item.id, message, this.maxRetries);
    this.logger.warn('Sync attempt failed', { id: item.id, error: message, outcome });

    if (outcome !== 'retrying') return;

    const delay = this.backoff.delayWithJitter(item.retryCount);
    const offline$ = this.connectivity.online$.pipe(filter((online) => !online));
    await firstValueFrom(timer(delay).pipe(takeUntil(merge(this.destroy$, offline$))), {
      defaultValue: 0,
    });
  }

  // ────────────────────────────── State ──────────────────────────────

  private handleConnectivityChange(online: boolean): void {
    if (!online) {
      this.setState({ isOnline: false, status: 'offline' });
      return;
    }

    // A drain still waiting on a call made before the drop carries on
    this.setState({ isOnline: true, status: this.drainPromise ? 'syncing' : 'idle' });
  }

  private setState(patch: Partial<SyncState>): void {
    if (this.disposed) return;
    this._state$.next({ ...this._state$.value, ...patch });
  }
}

// ────────────────────────────── Factory Function ──────────────────────────────

export function createSyncService(config: SyncServiceConfig): SyncService {
  return new SyncService(config);
}
