/**
 * Connectivity monitor.
 *
 * Reduces the platform's raw transport reports to a single online/offline
 * signal and publishes it edge-triggered: `online$` emits only when the
 * derived value flips, so repeated reports of the same state are silent.
 *
 * @module connectivity-monitor
 *
 * @example
 * ```typescript
 * import { createConnectivityMonitor } from '@kinesync/mobile';
 *
 * const monitor = createConnectivityMonitor({ source: netInfoSource });
 * await monitor.initialize();
 *
 * monitor.online$.subscribe((online) => {
 *   console.log(online ? 'Back online' : 'Went offline');
 * });
 *
 * monitor.dispose();
 * ```
 */

import { Subject, type Observable, type Subscription } from 'rxjs';

import {
  createLogger,
  errorMessage,
  type ConnectivitySource,
  type ConnectivityStatus,
  type Logger,
  type TransportKind,
} from '@kinesync/core';

// ────────────────────────────── Types ──────────────────────────────

/**
 * Configuration for {@link ConnectivityMonitor}.
 */
export interface ConnectivityMonitorConfig {
  /** Platform connectivity provider */
  source: ConnectivitySource;

  /** Logger (default: console logger tagged 'ConnectivityMonitor') */
  logger?: Logger;
}

// ────────────────────────────── Constants ──────────────────────────────

/**
 * Transports that count as a usable connection.
 */
export const ONLINE_TRANSPORTS: ReadonlySet<TransportKind> = new Set<TransportKind>([
  'wifi',
  'cellular',
  'ethernet',
  'vpn',
]);

/**
 * Whether a transport report contains at least one usable connection.
 */
export function isOnlineTransportSet(transports: readonly TransportKind[]): boolean {
  return transports.some((transport) => ONLINE_TRANSPORTS.has(transport));
}

// ────────────────────────────── ConnectivityMonitor ──────────────────────────────

/**
 * Edge-triggered online/offline signal over a {@link ConnectivitySource}.
 *
 * Starts out online. Failures to read the platform state are treated
 * optimistically: an initial check that fails leaves the monitor online, a
 * later one keeps the last known value.
 */
export class ConnectivityMonitor implements ConnectivityStatus {
  private readonly source: ConnectivitySource;
  private readonly logger: Logger;
  private readonly _online$ = new Subject<boolean>();

  private _isOnline = true;
  private initPromise: Promise<void> | null = null;
  private subscription: Subscription | null = null;
  private disposed = false;

  constructor(config: ConnectivityMonitorConfig) {
    this.source = config.source;
    this.logger = config.logger ?? createLogger({ context: 'ConnectivityMonitor' });
  }

  // ────────────────────────────── Public API ──────────────────────────────

  get isOnline(): boolean {
    return this._isOnline;
  }

  /**
   * Emits the new value each time the online state flips.
   */
  get online$(): Observable<boolean> {
    return this._online$.asObservable();
  }

  /**
   * Read the current state and start following platform reports.
   *
   * The first reading is taken silently (no emission). Calling again returns
   * the same promise.
   */
  initialize(): Promise<void> {
    this.initPromise ??= this.doInitialize();
    return this.initPromise;
  }

  /**
   * Re-read the platform state, emitting if it flipped.
   *
   * @returns The online state after the check
   */
  async checkConnectivity(): Promise<boolean> {
    try {
      const transports = await this.source.getCurrentTransports();
      this.update(isOnlineTransportSet(transports));
    } catch (error) {
      this.logger.warn('Connectivity check failed, keeping last state', {
        isOnline: this._isOnline,
        error: errorMessage(error),
      });
    }
    return this._isOnline;
  }

  /**
   * Stop following platform reports and complete `online$`.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    this.subscription?.unsubscribe();
    this.subscription = null;
    this._online$.complete();
  }

  // ────────────────────────────── Private helpers ──────────────────────────────

  private async doInitialize(): Promise<void> {
    try {
      const transports = await this.source.getCurrentTransports();
      this._isOnline = isOnlineTransportSet(transports);
    } catch (error) {
      this._isOnline = true;
      this.logger.warn('Initial connectivity check failed, assuming online', {
        error: errorMessage(error),
      });
    }

    if (this.disposed) return;

    this.subscription = this.source.changes$.subscribe({
      next: (transports) => this.update(isOnlineTransportSet(transports)),
      error: (error: unknown) => {
        this.logger.warn('Connectivity stream failed, keeping last state', {
          isOnline: this._isOnline,
          error: errorMessage(error),
        });
      },
    });

    this.logger.info('Connectivity monitor initialized', { isOnline: this._isOnline });
  }

  private update(online: boolean): void {
    if (this.disposed || online === this._isOnline) return;

    this._isOnline = online;
    this.logger.info(online ? 'Connection restored' : 'Connection lost');
    this._online$.next(online);
  }
}

// ────────────────────────────── Factory Function ──────────────────────────────

export function createConnectivityMonitor(config: ConnectivityMonitorConfig): ConnectivityMonitor {
  return new ConnectivityMonitor(config);
}
