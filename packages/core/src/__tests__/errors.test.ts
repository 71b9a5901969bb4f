import { describe, it, expect } from 'vitest';
import {
  ConnectionError,
  KinesyncError,
  ValidationError,
  ensureKinesyncError,
  errorMessage,
  getErrorCategory,
} from '../errors/index.js';

describe('KinesyncError', () => {
  it('uses the default message and suggestion of its code', () => {
    const error = new KinesyncError({ code: 'KINESYNC_C505' });
    expect(error.message).toBe('Transport misconfigured');
    expect(error.suggestion).toBe('Check the server base URL and endpoint mapping.');
    expect(error.category).toBe('connection');
    expect(error.context).toEqual({});
  });

  it('derives the category from the code letter', () => {
    expect(getErrorCategory('KINESYNC_V101')).toBe('validation');
    expect(getErrorCategory('KINESYNC_S300')).toBe('storage');
    expect(getErrorCategory('KINESYNC_C500')).toBe('connection');
    expect(getErrorCategory('KINESYNC_X900')).toBe('internal');
  });

  it('matches codes and categories', () => {
    const error = new ConnectionError('KINESYNC_C502', 'Token rejected');
    expect(KinesyncError.isCode(error, 'KINESYNC_C502')).toBe(true);
    expect(KinesyncError.isCode(error, 'KINESYNC_C505')).toBe(false);
    expect(KinesyncError.isCategory(error, 'connection')).toBe(true);
    expect(KinesyncError.isCode(new Error('plain'), 'KINESYNC_C502')).toBe(false);
  });

  it('formats code, context and suggestion on separate lines', () => {
    const error = new KinesyncError({
      code: 'KINESYNC_S300',
      message: 'Write failed',
      context: { key: 'queue' },
    });
    expect(error.format()).toBe(
      '[KINESYNC_S300] Write failed\n' +
        'Context: {"key":"queue"}\n' +
        'Suggestion: Check that the key-value store is writable and has free space.'
    );
  });

  it('serializes its cause chain', () => {
    const inner = new KinesyncError({ code: 'KINESYNC_C503' });
    const outer = KinesyncError.wrap(inner, 'KINESYNC_C500');
    const json = outer.toJSON();
    expect(json.code).toBe('KINESYNC_C500');
    expect(json.message).toBe('Sync conflict could not be resolved');
    expect(json.cause).toMatchObject({ code: 'KINESYNC_C503', name: 'KinesyncError' });
  });
});

describe('ValidationError', () => {
  it('joins issues into the message', () => {
    const error = new ValidationError('KINESYNC_V100', ['syncInterval: too small', 'jitterFactor: too big']);
    expect(error.message).toBe('Invalid configuration: syncInterval: too small; jitterFactor: too big');
    expect(error.issues).toHaveLength(2);
    expect(error.name).toBe('ValidationError');
  });
});

describe('ensureKinesyncError', () => {
  it('returns KinesyncErrors unchanged', () => {
    const error = new KinesyncError({ code: 'KINESYNC_C500' });
    expect(ensureKinesyncError(error)).toBe(error);
  });

  it('wraps plain errors and keeps the cause', () => {
    const cause = new Error('boom');
    const wrapped = ensureKinesyncError(cause);
    expect(wrapped.code).toBe('KINESYNC_X900');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe(cause);
  });

  it('stringifies non-error values', () => {
    expect(ensureKinesyncError(42, 'KINESYNC_C500').message).toBe('42');
  });
});

describe('errorMessage', () => {
  it('reads messages from errors and stringifies anything else', () => {
    expect(errorMessage(new Error('offline'))).toBe('offline');
    expect(errorMessage('socket hang up')).toBe('socket hang up');
  });
});
