import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConnectionError, KinesyncError, type SyncItem } from '@kinesync/core';
import { classifyStatus, createHttpTransport } from '../http-transport.js';
import { createSyncItem } from '../sync-item.js';

const session = createSyncItem({
  id: 'session-1',
  entityType: 'session',
  operationType: 'create',
  data: { id: 'session-1', notes: null },
  createdAt: 0,
});

function withOperation(item: SyncItem, operationType: SyncItem['operationType']): SyncItem {
  return { ...item, operationType };
}

describe('classifyStatus', () => {
  it('treats 2xx as success', () => {
    expect(classifyStatus(200)).toEqual({ kind: 'success' });
    expect(classifyStatus(204)).toEqual({ kind: 'success' });
  });

  it('treats 408, 429 and 5xx as retryable', () => {
    expect(classifyStatus(408)).toEqual({ kind: 'retryable', message: 'Server error: 408' });
    expect(classifyStatus(429)).toEqual({ kind: 'retryable', message: 'Server error: 429' });
    expect(classifyStatus(503)).toEqual({ kind: 'retryable', message: 'Server error: 503' });
  });

  it('treats other 4xx as permanent', () => {
    expect(classifyStatus(422)).toEqual({
      kind: 'permanent',
      message: 'Rejected by server: 422',
      status: 422,
    });
  });
});

describe('HttpSyncTransport', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    fetchMock.mockResolvedValue(new Response(null, { status: 201 }));
  });

  function lastRequest(): { url: string; init: RequestInit | undefined } {
    const call = fetchMock.mock.calls.at(-1);
    return { url: String(call?.[0]), init: call?.[1] };
  }

  describe('requests', () => {
    const transport = createHttpTransport({
      baseUrl: 'https://api.example.com/',
      authToken: 'test-token',
      fetch: fetchMock,
    });

    it('POSTs creates to the entity endpoint with the payload', async () => {
      expect(await transport.send(session)).toEqual({ kind: 'success' });

      const { url, init } = lastRequest();
      expect(url).toBe('https://api.example.com/api/v1/sessions');
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe('{"id":"session-1","notes":null}');
      expect(init?.headers).toEqual({
        'Content-Type': 'application/json',
        'Idempotency-Key': 'session-1',
        Authorization: 'Bearer test-token',
      });
    });

    it('PUTs updates to the item path', async () => {
      await transport.send(withOperation(session, 'update'));

      const { url, init } = lastRequest();
      expect(url).toBe('https://api.example.com/api/v1/sessions/session-1');
      expect(init?.method).toBe('PUT');
    });

    it('DELETEs without a body', async () => {
      await transport.send(withOperation(session, 'delete'));

      const { url, init } = lastRequest();
      expect(url).toBe('https://api.example.com/api/v1/sessions/session-1');
      expect(init?.method).toBe('DELETE');
      expect(init?.body).toBeUndefined();
    });

    it('routes exercise results to their endpoint and encodes ids', async () => {
      await transport.send({
        ...session,
        id: 'result 7',
        entityType: 'exerciseResult',
        operationType: 'update',
      });

      expect(lastRequest().url).toBe('https://api.example.com/api/v1/exercise-results/result%207');
    });
  });

  describe('configuration', () => {
    it('keeps a path prefix and honours custom endpoints', async () => {
      const transport = createHttpTransport({
        baseUrl: 'https://api.example.com/v2',
        endpoints: { session: '/workouts' },
        fetch: fetchMock,
      });

      await transport.send(session);

      expect(lastRequest().url).toBe('https://api.example.com/v2/workouts');
    });

    it('reads the token from a getter on every request', async () => {
      let token: string | null = 'first-token';
      const transport = createHttpTransport({
        baseUrl: 'https://api.example.com',
        authToken: () => token,
        fetch: fetchMock,
      });

      await transport.send(session);
      expect(lastRequest().init?.headers).toMatchObject({ Authorization: 'Bearer first-token' });

      token = null;
      await transport.send(session);
      expect(lastRequest().init?.headers).not.toHaveProperty('Authorization');
    });

    it('rejects an invalid base URL with KINESYNC_C505', () => {
      expect(() => createHttpTransport({ baseUrl: 'not a url' })).toThrow(ConnectionError);

      let caught: unknown;
      try {
        createHttpTransport({ baseUrl: 'ftp://files.example.com' });
      } catch (error) {
        caught = error;
      }
      expect(KinesyncError.isCode(caught, 'KINESYNC_C505')).toBe(true);
    });
  });

  describe('responses', () => {
    const transport = createHttpTransport({
      baseUrl: 'https://api.example.com',
      timeoutMs: 20,
      fetch: fetchMock,
    });

    it('classifies server errors as retryable', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 502 }));

      expect(await transport.send(session)).toEqual({ kind: 'retryable', message: 'Server error: 502' });
    });

    it('classifies validation errors as permanent', async () => {
      fetchMock.mockResolvedValue(new Response('{"detail":"bad"}', { status: 400 }));

      expect(await transport.send(session)).toEqual({
        kind: 'permanent',
        message: 'Rejected by server: 400',
        status: 400,
      });
    });

    it('releases the response body', async () => {
      const response = new Response('{"detail":"unavailable"}', { status: 503 });
      fetchMock.mockResolvedValue(response);

      await transport.send(session);

      expect(response.bodyUsed).toBe(true);
    });

    it('throws KINESYNC_C502 on rejected credentials', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 401 }));

      await expect(transport.send(session)).rejects.toMatchObject({
        code: 'KINESYNC_C502',
        message: 'Authentication failed: 401',
      });
    });

    it('reports network failures as retryable', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      expect(await transport.send(session)).toEqual({ kind: 'retryable', message: 'fetch failed' });
    });

    it('reports timeouts as retryable', async () => {
      fetchMock.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          })
      );

      expect(await transport.send(session)).toEqual({ kind: 'retryable', message: 'Connection timeout' });
    });
  });
});
