import type {
  ConnectivitySource,
  KeyValueStorage,
  SyncItem,
  SyncTransport,
  TransportKind,
  TransportResult,
} from '@kinesync/core';

// --- Storage Types ---

/**
 * How a storage stand-in answers writes.
 *
 * - `ok`: writes succeed
 * - `reject`: `setItem` returns `false`
 * - `throw`: `setItem` throws
 */
export type WriteMode = 'ok' | 'reject' | 'throw';

export interface MemoryStorageConfig {
  /** Entries present before the first call */
  initial?: Record<string, string>;
}

export interface MemoryStorage extends KeyValueStorage {
  setWriteMode(mode: WriteMode): void;
  /** Copy of every stored entry */
  snapshot(): Record<string, string>;
  /** Number of successful `setItem` calls */
  getWriteCount(): number;
  clear(): void;
}

// --- Connectivity Types ---

export interface ConnectivitySimulatorConfig {
  /** Transports reported before the first change (default: ['wifi']) */
  initialTransports?: readonly TransportKind[];
}

export interface ConnectivitySimulator extends ConnectivitySource {
  /** Replace the current transports and report them on `changes$` */
  setTransports(transports: readonly TransportKind[]): void;
  goOnline(transport?: TransportKind): void;
  goOffline(): void;
  /** Make the next `getCurrentTransports()` call reject */
  failNextCheck(error?: Error): void;
  /** Terminate `changes$` with an error */
  failStream(error?: Error): void;
  getCheckCount(): number;
}

// --- Transport Types ---

/**
 * A scripted answer to one `send` call: a result, or a thrown error.
 */
export type ScriptedOutcome = TransportResult | { readonly kind: 'throw'; readonly error: Error };

export interface ScriptedTransportConfig {
  /** Answer once the script runs out (default: success) */
  defaultOutcome?: ScriptedOutcome;
}

/**
 * Handle to a `send` call that stays in flight until settled.
 */
export interface PendingSend {
  resolve(result: TransportResult): void;
  reject(error: Error): void;
}

export interface ScriptedTransport extends SyncTransport {
  /** Append answers, consumed one per `send` call */
  script(...outcomes: ScriptedOutcome[]): void;
  /** Hold the next `send` call open until the returned handle settles it */
  deferNext(): PendingSend;
  /** Items passed to `send`, in call order */
  getCalls(): readonly SyncItem[];
  /** Ids passed to `send`, in call order */
  getCallIds(): readonly string[];
  reset(): void;
}
