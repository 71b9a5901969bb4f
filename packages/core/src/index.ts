/**
 * @kinesync/core - shared foundations for the Kinesync sync engine
 *
 * Holds the sync item model, the contracts the engine expects from its
 * collaborators (key-value storage, connectivity source, transport), the
 * structured error system and the structured logger.
 *
 * @packageDocumentation
 * @module @kinesync/core
 */

// Types
export type * from './types/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logger.js';
