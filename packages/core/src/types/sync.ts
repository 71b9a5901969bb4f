/**
 * Any value that survives a JSON round trip unchanged
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/**
 * A JSON object payload
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Kind of domain entity a sync item carries.
 */
export type SyncEntityType = 'session' | 'exerciseResult';

/**
 * Mutation the server is asked to apply.
 */
export type SyncOperationType = 'create' | 'update' | 'delete';

/**
 * Queue priority, ordered `low < normal < high < critical`.
 */
export type SyncPriority = 'low' | 'normal' | 'high' | 'critical';

/**
 * A unit of pending work.
 *
 * The `id` is the idempotency key for the logical operation: the server may
 * see the same id more than once and must apply it only once.
 */
export interface SyncItem {
  /** Idempotency key, unique per logical operation */
  readonly id: string;

  /** Entity the payload describes */
  readonly entityType: SyncEntityType;

  /** Mutation to apply on the server */
  readonly operationType: SyncOperationType;

  /** Opaque JSON payload */
  readonly data: JsonObject;

  /** Queue priority */
  readonly priority: SyncPriority;

  /** Creation time (epoch ms) */
  readonly createdAt: number;

  /** Failed delivery attempts so far */
  readonly retryCount: number;

  /** Message of the last failure */
  readonly lastError?: string;

  /** Time of the last failure (epoch ms) */
  readonly lastRetryAt?: number;
}
