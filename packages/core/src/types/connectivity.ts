import type { Observable } from 'rxjs';

/**
 * A network transport reported active by the platform.
 */
export type TransportKind =
  | 'wifi'
  | 'cellular'
  | 'ethernet'
  | 'vpn'
  | 'bluetooth'
  | 'other'
  | 'none';

/**
 * Platform connectivity provider.
 */
export interface ConnectivitySource {
  /** Currently active transports */
  getCurrentTransports(): readonly TransportKind[] | Promise<readonly TransportKind[]>;

  /** Stream of transport sets, one per platform report */
  readonly changes$: Observable<readonly TransportKind[]>;
}

/**
 * Read-only online/offline signal consumed by the sync service and worker.
 */
export interface ConnectivityStatus {
  /** Last known online state */
  readonly isOnline: boolean;

  /** Edge-triggered stream: emits only when the online state flips */
  readonly online$: Observable<boolean>;
}
