/**
 * Kinesync Error System
 *
 * Structured error handling with stable codes (KINESYNC_V101,
 * KINESYNC_C505, ...), suggestions, categories and error chaining.
 *
 * @example
 * ```typescript
 * import { KinesyncError, ConnectionError } from '@kinesync/core';
 *
 * try {
 *   await transport.send(item);
 * } catch (error) {
 *   if (KinesyncError.isCode(error, 'KINESYNC_C502')) {
 *     await refreshToken();
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  ConnectionError,
  KinesyncError,
  StorageError,
  ValidationError,
  ensureKinesyncError,
  errorMessage,
  type KinesyncErrorOptions,
  type SerializedKinesyncError,
} from './kinesync-error.js';
