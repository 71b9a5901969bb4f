/**
 * @kinesync/mobile - Offline-first sync engine for mobile apps
 *
 * Records written on the device are queued locally and delivered to the
 * server once connectivity allows, surviving crashes, flapping networks and
 * partial failures.
 *
 * ## Features
 *
 * - **Sync Queue**: Durable priority queue with a dead-letter set
 * - **Sync Service**: Sequential delivery with exponential backoff
 * - **Background Worker**: Periodic, reconnect and foreground triggers
 * - **Connectivity Monitor**: Edge-triggered online/offline signal
 * - **Conflict Resolution**: Server-wins, last-write-wins and merge
 * - **HTTP Transport**: REST delivery with idempotency keys
 *
 * ## Architecture
 *
 * ```
 * ┌──────────────────────────────────────────────────────────────────┐
 * │                      @kinesync/mobile                            │
 * │                                                                  │
 * │  ┌────────────────┐   ┌────────────────┐   ┌─────────────────┐   │
 * │  │ Background     │──▶│ Sync Service   │──▶│ Sync Transport  │   │
 * │  │ Sync Worker    │   │ (SyncState)    │   │ (HTTP)          │   │
 * │  └────────────────┘   └────────────────┘   └─────────────────┘   │
 * │          ▲                    │                                  │
 * │  ┌────────────────┐   ┌────────────────┐   ┌─────────────────┐   │
 * │  │ Connectivity   │   │ Sync Queue     │──▶│ Key-Value       │   │
 * │  │ Monitor        │   │ (pending/dead) │   │ Storage         │   │
 * │  └────────────────┘   └────────────────┘   └─────────────────┘   │
 * └──────────────────────────────────────────────────────────────────┘
 * ```
 *
 * ## Quick Start
 *
 * ```typescript
 * import {
 *   createSyncRuntime,
 *   createHttpTransport,
 *   describeSyncStatus,
 *   MMKVKeyValueStorage,
 * } from '@kinesync/mobile';
 *
 * const runtime = createSyncRuntime({
 *   storage: new MMKVKeyValueStorage(mmkv),
 *   connectivitySource,
 *   transport: createHttpTransport({ baseUrl: 'https://api.example.com' }),
 * });
 *
 * await runtime.initialize();
 *
 * runtime.state$.subscribe((state) => {
 *   console.log(describeSyncStatus(state));
 * });
 *
 * runtime.service.queueExerciseResult(result);
 * ```
 *
 * @packageDocumentation
 * @module @kinesync/mobile
 */

// Sync item model
export * from './sync-item.js';

// Observable state
export * from './sync-state.js';

// Configuration
export * from './config.js';

// Durable queue
export * from './sync-queue.js';

// Retry policy
export * from './exponential-backoff.js';

// Network connectivity
export * from './connectivity-monitor.js';

// Conflict resolution
export * from './conflict-resolver.js';

// Domain payloads
export * from './entity-payloads.js';

// Queue draining
export * from './sync-service.js';

// Background sync scheduling
export * from './background-sync.js';

// Transport
export * from './http-transport.js';

// Storage adapters
export * from './storage/index.js';

// Composition root
export * from './sync-runtime.js';
