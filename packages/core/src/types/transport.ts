import type { SyncItem } from './sync.js';

/**
 * Outcome of delivering one sync item.
 *
 * - `success`: the server applied (or had already applied) the operation
 * - `retryable`: transient failure (network error, timeout, 5xx, rate limit)
 * - `permanent`: the server rejected the item (validation, other 4xx)
 */
export type TransportResult =
  | { readonly kind: 'success' }
  | { readonly kind: 'retryable'; readonly message: string }
  | { readonly kind: 'permanent'; readonly message: string; readonly status?: number };

/**
 * Remote endpoint that applies sync items.
 *
 * Implementations classify failures into a {@link TransportResult} instead of
 * throwing. Throwing is reserved for conditions no retry can fix, such as a
 * misconfigured base URL or rejected credentials.
 */
export interface SyncTransport {
  send(item: SyncItem): Promise<TransportResult>;
}
