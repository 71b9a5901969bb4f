// Types
export type {
  ConnectivitySimulator,
  ConnectivitySimulatorConfig,
  MemoryStorage,
  MemoryStorageConfig,
  PendingSend,
  ScriptedOutcome,
  ScriptedTransport,
  ScriptedTransportConfig,
  WriteMode,
} from './types.js';

// Key-value storage
export { createMemoryStorage } from './memory-storage.js';

// Connectivity
export { createConnectivitySimulator } from './connectivity-simulator.js';

// Transport
export { createScriptedTransport } from './scripted-transport.js';
