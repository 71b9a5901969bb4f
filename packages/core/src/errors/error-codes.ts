/**
 * Kinesync Error Codes
 *
 * Error codes are structured as KINESYNC_[CATEGORY][NUMBER]:
 * - V: Validation errors (V100-V199)
 * - S: Storage errors (S300-S399)
 * - C: Connection/Sync errors (C500-C599)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  KINESYNC_V100: {
    code: 'KINESYNC_V100',
    message: 'Invalid configuration',
    suggestion: 'Check the configuration values against their documented ranges.',
  },
  KINESYNC_V101: {
    code: 'KINESYNC_V101',
    message: 'Invalid sync item',
    suggestion: 'A sync item needs an id, a known entity and operation type, and a JSON object payload.',
  },

  // Storage errors (S300-S399)
  KINESYNC_S300: {
    code: 'KINESYNC_S300',
    message: 'Storage operation failed',
    suggestion: 'Check that the key-value store is writable and has free space.',
  },
  KINESYNC_S301: {
    code: 'KINESYNC_S301',
    message: 'Persisted data is corrupt',
    suggestion: 'The stored queue could not be parsed and was reset to empty.',
  },

  // Connection/Sync errors (C500-C599)
  KINESYNC_C500: {
    code: 'KINESYNC_C500',
    message: 'Sync operation failed',
    suggestion: 'Check network connectivity and server status.',
  },
  KINESYNC_C502: {
    code: 'KINESYNC_C502',
    message: 'Authentication failed',
    suggestion: 'Refresh the auth token handed to the transport.',
  },
  KINESYNC_C503: {
    code: 'KINESYNC_C503',
    message: 'Sync conflict could not be resolved',
    suggestion: 'Only items with the same id can be resolved against each other.',
  },
  KINESYNC_C505: {
    code: 'KINESYNC_C505',
    message: 'Transport misconfigured',
    suggestion: 'Check the server base URL and endpoint mapping.',
  },

  // Internal errors (X900-X999)
  KINESYNC_X900: {
    code: 'KINESYNC_X900',
    message: 'Internal error',
    suggestion: 'This is unexpected. Please report it with the error context.',
  },
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'validation' | 'storage' | 'connection' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt('KINESYNC_'.length);
  switch (letter) {
    case 'V':
      return 'validation';
    case 'S':
      return 'storage';
    case 'C':
      return 'connection';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
