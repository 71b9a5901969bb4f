/**
 * Observable sync state and the helpers the UI reads it through.
 *
 * @module sync-state
 */

/**
 * Status of the sync service.
 */
export type SyncStatus = 'idle' | 'syncing' | 'error' | 'offline';

/**
 * Snapshot of the sync service, published read-only to observers.
 */
export interface SyncState {
  /** Current status */
  readonly status: SyncStatus;

  /** Items waiting for delivery */
  readonly pendingCount: number;

  /** Items in the dead-letter set */
  readonly failedCount: number;

  /** Time of the last complete drain (epoch ms) */
  readonly lastSyncAt?: number;

  /** Message of the failure that put the service in `error` */
  readonly errorMessage?: string;

  /** Last known connectivity */
  readonly isOnline: boolean;
}

export const INITIAL_SYNC_STATE: SyncState = {
  status: 'idle',
  pendingCount: 0,
  failedCount: 0,
  isOnline: false,
};

/**
 * Whether a drain may start: online and not already draining.
 */
export function canSync(state: SyncState): boolean {
  return state.isOnline && state.status !== 'syncing';
}

export function hasPendingItems(state: SyncState): boolean {
  return state.pendingCount > 0;
}

export function hasFailedItems(state: SyncState): boolean {
  return state.failedCount > 0;
}

/**
 * One-line status for display, derived from the state alone.
 *
 * @example
 * ```typescript
 * describeSyncStatus({ ...INITIAL_SYNC_STATE, pendingCount: 3 }); // '3 pending'
 * ```
 */
export function describeSyncStatus(state: SyncState): string {
  switch (state.status) {
    case 'syncing':
      return 'Syncing...';
    case 'offline':
      return 'Offline';
    case 'error':
      return state.errorMessage ?? 'Sync error';
    case 'idle':
      return state.pendingCount > 0 ? `${state.pendingCount} pending` : 'All synced';
  }
}
