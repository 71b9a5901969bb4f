/**
 * Engine-wide configuration.
 *
 * @module config
 */

import { z } from 'zod';

import { ValidationError } from '@kinesync/core';

// ────────────────────────────── Types ──────────────────────────────

/**
 * What happens to an item the server rejected outright.
 *
 * - `dead-letter`: move it to the failed set without using a retry
 * - `retry`: treat it like a transient failure
 */
export type PermanentFailurePolicy = 'dead-letter' | 'retry';

/**
 * Fully resolved configuration of the sync engine.
 */
export interface SyncConfig {
  /** Delivery attempts before an item is dead-lettered */
  maxRetries: number;

  /** Start a drain right after an enqueue while online */
  syncOnEnqueue: boolean;

  permanentFailurePolicy: PermanentFailurePolicy;

  /** Permanent failures in a row that stop a drain with an error */
  maxConsecutiveRejections: number;

  /** Backoff delay for attempt 0 (ms) */
  baseDelay: number;

  /** Backoff ceiling (ms) */
  maxDelay: number;

  /** Relative backoff jitter in [0, 1] */
  jitterFactor: number;

  /** Periodic sync interval of the background worker (ms) */
  syncInterval: number;

  /** Delay between regaining connectivity and syncing (ms) */
  debounceDelay: number;
}

/**
 * Partial configuration accepted from callers.
 */
export type SyncConfigInput = Partial<SyncConfig>;

// ────────────────────────────── Constants ──────────────────────────────

export const DEFAULT_SYNC_CONFIG: Readonly<SyncConfig> = {
  maxRetries: 5,
  syncOnEnqueue: true,
  permanentFailurePolicy: 'dead-letter',
  maxConsecutiveRejections: 10,
  baseDelay: 1_000,
  maxDelay: 300_000,
  jitterFactor: 0.2,
  syncInterval: 300_000,
  debounceDelay: 500,
};

// ────────────────────────────── Schema ──────────────────────────────

const syncConfigSchema = z
  .object({
    maxRetries: z.number().int().nonnegative().default(DEFAULT_SYNC_CONFIG.maxRetries),
    syncOnEnqueue: z.boolean().default(DEFAULT_SYNC_CONFIG.syncOnEnqueue),
    permanentFailurePolicy: z
      .enum(['dead-letter', 'retry'])
      .default(DEFAULT_SYNC_CONFIG.permanentFailurePolicy),
    maxConsecutiveRejections: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_SYNC_CONFIG.maxConsecutiveRejections),
    baseDelay: z.number().positive().default(DEFAULT_SYNC_CONFIG.baseDelay),
    maxDelay: z.number().positive().default(DEFAULT_SYNC_CONFIG.maxDelay),
    jitterFactor: z.number().min(0).max(1).default(DEFAULT_SYNC_CONFIG.jitterFactor),
    syncInterval: z.number().positive().default(DEFAULT_SYNC_CONFIG.syncInterval),
    debounceDelay: z.number().nonnegative().default(DEFAULT_SYNC_CONFIG.debounceDelay),
  })
  .refine((config) => config.maxDelay >= config.baseDelay, {
    message: 'must be at least baseDelay',
    path: ['maxDelay'],
  });

// ────────────────────────────── Resolution ──────────────────────────────

/**
 * Fill defaults and validate.
 *
 * @throws {ValidationError} `KINESYNC_V100` listing every invalid field
 *
 * @example
 * ```typescript
 * const config = resolveSyncConfig({ maxRetries: 3, syncInterval: 60_000 });
 * config.debounceDelay; // 500
 * ```
 */
export function resolveSyncConfig(input: SyncConfigInput = {}): SyncConfig {
  const result = syncConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      'KINESYNC_V100',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
