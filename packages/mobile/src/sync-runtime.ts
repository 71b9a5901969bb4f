/**
 * Sync runtime: builds the engine from its collaborators and ties it to the
 * app lifecycle.
 *
 * @module sync-runtime
 *
 * @example
 * ```typescript
 * import { createSyncRuntime, createHttpTransport, MMKVKeyValueStorage } from '@kinesync/mobile';
 *
 * const runtime = createSyncRuntime({
 *   storage: new MMKVKeyValueStorage(mmkv),
 *   connectivitySource: netInfoSource,
 *   transport: createHttpTransport({ baseUrl: 'https://api.example.com' }),
 *   config: { syncInterval: 120_000 },
 * });
 *
 * await runtime.initialize();
 *
 * AppState.addEventListener('change', (state) => {
 *   if (state === 'background') runtime.onAppPaused();
 *   if (state === 'active') runtime.onAppResumed();
 * });
 *
 * runtime.service.queueSession(session);
 * ```
 */

import type { Observable } from 'rxjs';

import {
  createLogger,
  ensureKinesyncError,
  type ConnectivitySource,
  type KeyValueStorage,
  type Logger,
  type SyncTransport,
} from '@kinesync/core';

import { BackgroundSyncWorker } from './background-sync.js';
import { resolveSyncConfig, type SyncConfig, type SyncConfigInput } from './config.js';
import { ConnectivityMonitor } from './connectivity-monitor.js';
import { ExponentialBackoff } from './exponential-backoff.js';
import { SyncQueue } from './sync-queue.js';
import { SyncService } from './sync-service.js';
import type { SyncState } from './sync-state.js';

// ────────────────────────────── Types ──────────────────────────────

/**
 * Collaborators and settings for {@link SyncRuntime}.
 */
export interface SyncRuntimeConfig {
  /** Where the queue is persisted */
  storage: KeyValueStorage;

  /** Platform connectivity provider */
  connectivitySource: ConnectivitySource;

  /** Remote endpoint */
  transport: SyncTransport;

  /** Engine settings, validated by {@link resolveSyncConfig} */
  config?: SyncConfigInput;

  /** Root logger; each component logs through a child of it */
  logger?: Logger;
}

// ────────────────────────────── SyncRuntime ──────────────────────────────

/**
 * Owns one instance of every engine component.
 *
 * `initialize()` brings them up in dependency order and never rejects: a
 * sync engine that fails to start is logged, not allowed to block app
 * start-up.
 */
export class SyncRuntime {
  readonly config: SyncConfig;
  readonly connectivity: ConnectivityMonitor;
  readonly queue: SyncQueue;
  readonly service: SyncService;
  readonly worker: BackgroundSyncWorker;

  private readonly logger: Logger;
  private initPromise: Promise<void> | null = null;
  private _isInitialized = false;
  private disposed = false;

  /**
   * @throws {ValidationError} `KINESYNC_V100` when `config` is invalid
   */
  constructor(options: SyncRuntimeConfig) {
    this.config = resolveSyncConfig(options.config);
    this.logger = options.logger ?? createLogger({ context: 'Kinesync' });

    this.connectivity = new ConnectivityMonitor({
      source: options.connectivitySource,
      logger: this.logger.child('ConnectivityMonitor'),
    });

    this.queue = new SyncQueue({
      storage: options.storage,
      logger: this.logger.child('SyncQueue'),
    });

    this.service = new SyncService({
      queue: this.queue,
      connectivity: this.connectivity,
      transport: options.transport,
      backoff: new ExponentialBackoff({
        baseDelay: this.config.baseDelay,
        maxDelay: this.config.maxDelay,
        jitterFactor: this.config.jitterFactor,
      }),
      maxRetries: this.config.maxRetries,
      syncOnEnqueue: this.config.syncOnEnqueue,
      permanentFailurePolicy: this.config.permanentFailurePolicy,
      maxConsecutiveRejections: this.config.maxConsecutiveRejections,
      logger: this.logger.child('SyncService'),
    });

    this.worker = new BackgroundSyncWorker({
      service: this.service,
      connectivity: this.connectivity,
      syncInterval: this.config.syncInterval,
      debounceDelay: this.config.debounceDelay,
      logger: this.logger.child('BackgroundSync'),
    });
  }

  // ────────────────────────────── Public API ──────────────────────────────

  get state$(): Observable<SyncState> {
    return this.service.state$;
  }

  get state(): SyncState {
    return this.service.state;
  }

  get isInitialized(): boolean {
    return this._isInitialized;
  }

  /**
   * Connectivity first, then the service (loads the queue), then the worker.
   * Calling again returns the same promise.
   */
  initialize(): Promise<void> {
    this.initPromise ??= this.doInitialize();
    return this.initPromise;
  }

  /**
   * App moved to the background.
   */
  onAppPaused(): void {
    if (!this._isInitialized || this.disposed) return;
    this.worker.pause();
  }

  /**
   * App returned to the foreground.
   */
  onAppResumed(): void {
    if (!this._isInitialized || this.disposed) return;
    this.worker.resume();
  }

  /**
   * Tear down in reverse order of initialization.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    this.worker.dispose();
    this.service.dispose();
    this.queue.destroy();
    this.connectivity.dispose();

    this.logger.info('Sync runtime disposed');
  }

  // ────────────────────────────── Private helpers ──────────────────────────────

  private async doInitialize(): Promise<void> {
    this.logger.info('Starting sync runtime');

    try {
      await this.connectivity.initialize();
      if (this.disposed) return;

      this.service.initialize();
      this.worker.start();

      this.logger.info('Sync runtime ready', {
        isOnline: this.connectivity.isOnline,
        pending: this.queue.pendingCount,
      });
    } catch (error) {
      this.logger.error('Sync runtime failed to start', ensureKinesyncError(error));
    }

    this._isInitialized = true;
  }
}

// ────────────────────────────── Factory Function ──────────────────────────────

export function createSyncRuntime(options: SyncRuntimeConfig): SyncRuntime {
  return new SyncRuntime(options);
}
