/**
 * Sync item helpers.
 *
 * A {@link SyncItem} is an immutable value: every helper here returns a new
 * object. Retry bookkeeping only ever advances through {@link incrementRetry}.
 *
 * @module sync-item
 */

import { z } from 'zod';

import {
  ValidationError,
  type JsonObject,
  type JsonValue,
  type SyncEntityType,
  type SyncItem,
  type SyncOperationType,
  type SyncPriority,
} from '@kinesync/core';

// ────────────────────────────── Types ──────────────────────────────

/**
 * Input for {@link createSyncItem}.
 */
export interface CreateSyncItemInput {
  id: string;
  entityType: SyncEntityType;
  operationType: SyncOperationType;
  data: JsonObject;

  /** Queue priority (default: 'normal') */
  priority?: SyncPriority;

  /** Creation time in epoch ms (default: now) */
  createdAt?: number;
}

/**
 * Fields {@link copySyncItem} may replace.
 */
export type SyncItemPatch = Partial<Omit<SyncItem, 'id'>>;

/**
 * Persisted JSON shape of a sync item.
 */
export interface SyncItemJson {
  id: string;
  entityType: SyncEntityType;
  operationType: SyncOperationType;
  data: JsonObject;
  priority: SyncPriority;
  retryCount: number;
  createdAt: string;
  lastError: string | null;
  lastRetryAt: string | null;
}

// ────────────────────────────── Constants ──────────────────────────────

export const SYNC_PRIORITIES: readonly SyncPriority[] = ['low', 'normal', 'high', 'critical'];

const PRIORITY_RANK: Record<SyncPriority, number> = {
  low: 0,
  normal: 1,
  high: 2,
  critical: 3,
};

// ────────────────────────────── Schemas ──────────────────────────────

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const isoTimestamp = z.string().datetime({ offset: true });

const syncItemJsonSchema = z.object({
  id: z.string().min(1),
  entityType: z.enum(['session', 'exerciseResult']),
  operationType: z.enum(['create', 'update', 'delete']),
  data: z.record(jsonValueSchema),
  priority: z.enum(['low', 'normal', 'high', 'critical']).default('normal'),
  retryCount: z.number().int().nonnegative().default(0),
  createdAt: isoTimestamp,
  lastError: z.string().nullish(),
  lastRetryAt: isoTimestamp.nullish(),
});

// ────────────────────────────── Helpers ──────────────────────────────

/**
 * Compare two priorities: positive when `a` outranks `b`.
 */
export function comparePriority(a: SyncPriority, b: SyncPriority): number {
  return PRIORITY_RANK[a] - PRIORITY_RANK[b];
}

/**
 * Create a fresh sync item with no retry history.
 */
export function createSyncItem(input: CreateSyncItemInput): SyncItem {
  return {
    id: input.id,
    entityType: input.entityType,
    operationType: input.operationType,
    data: input.data,
    priority: input.priority ?? 'normal',
    createdAt: input.createdAt ?? Date.now(),
    retryCount: 0,
  };
}

/**
 * Whether another delivery attempt is allowed.
 */
export function shouldRetry(item: SyncItem, maxRetries: number): boolean {
  return item.retryCount < maxRetries;
}

/**
 * Record a failed attempt: bumps `retryCount` and stamps the error and time.
 */
export function incrementRetry(item: SyncItem, error: string): SyncItem {
  return {
    ...item,
    retryCount: item.retryCount + 1,
    lastError: error,
    lastRetryAt: Date.now(),
  };
}

export function copySyncItem(item: SyncItem, patch: SyncItemPatch): SyncItem {
  return { ...item, ...patch };
}

export function syncItemToJson(item: SyncItem): SyncItemJson {
  return {
    id: item.id,
    entityType: item.entityType,
    operationType: item.operationType,
    data: item.data,
    priority: item.priority,
    retryCount: item.retryCount,
    createdAt: new Date(item.createdAt).toISOString(),
    lastError: item.lastError ?? null,
    lastRetryAt: item.lastRetryAt === undefined ? null : new Date(item.lastRetryAt).toISOString(),
  };
}

/**
 * Parse a persisted item.
 *
 * @throws {ValidationError} `KINESYNC_V101` when the value is not a valid item
 */
export function syncItemFromJson(value: unknown): SyncItem {
  const result = syncItemJsonSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      'KINESYNC_V101',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const json = result.data;
  return {
    id: json.id,
    entityType: json.entityType,
    operationType: json.operationType,
    data: json.data,
    priority: json.priority,
    createdAt: Date.parse(json.createdAt),
    retryCount: json.retryCount,
    ...(json.lastError != null ? { lastError: json.lastError } : {}),
    ...(json.lastRetryAt != null ? { lastRetryAt: Date.parse(json.lastRetryAt) } : {}),
  };
}
