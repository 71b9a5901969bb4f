/**
 * KinesyncError - error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a KinesyncError
 */
export interface KinesyncErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a KinesyncError
 */
export interface SerializedKinesyncError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedKinesyncError | { name: string; message: string; stack?: string };
}

/**
 * Error class for the sync engine with structured error information.
 *
 * Carries a stable code, a category derived from it, a suggestion for the
 * caller, free-form context and an optional cause.
 *
 * @example
 * ```typescript
 * throw new KinesyncError({
 *   code: 'KINESYNC_C505',
 *   context: { baseUrl: 'not a url' },
 * });
 *
 * if (KinesyncError.isCategory(error, 'connection')) {
 *   logger.warn(error.format());
 * }
 * ```
 */
export class KinesyncError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: KinesyncErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'KinesyncError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, KinesyncError);
    }
  }

  /**
   * Create a KinesyncError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): KinesyncError {
    return new KinesyncError({ code, context });
  }

  /**
   * Wrap an existing error with a KinesyncError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): KinesyncError {
    return new KinesyncError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isKinesyncError(error: unknown): error is KinesyncError {
    return error instanceof KinesyncError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return KinesyncError.isKinesyncError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return KinesyncError.isKinesyncError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedKinesyncError {
    const result: SerializedKinesyncError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (KinesyncError.isKinesyncError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Validation error for configuration values and persisted items
 */
export class ValidationError extends KinesyncError {
  /** Field-level issues, as `path: message` strings */
  readonly issues: string[];

  constructor(
    code: 'KINESYNC_V100' | 'KINESYNC_V101',
    issues: string[],
    context?: Record<string, unknown>
  ) {
    super({
      code,
      message: `${getErrorInfo(code).message}: ${issues.join('; ')}`,
      context: { ...context, issues },
    });

    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Storage error
 */
export class StorageError extends KinesyncError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'StorageError';
  }
}

/**
 * Connection error
 */
export class ConnectionError extends KinesyncError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'ConnectionError';
  }
}

/**
 * Normalize any thrown value into a KinesyncError
 */
export function ensureKinesyncError(
  error: unknown,
  defaultCode: ErrorCode = 'KINESYNC_X900'
): KinesyncError {
  if (KinesyncError.isKinesyncError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return KinesyncError.wrap(error, defaultCode);
  }

  return new KinesyncError({
    code: defaultCode,
    message: String(error),
  });
}

/**
 * Extract a human-readable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
