import {
  ConnectionError,
  errorMessage,
  type SyncEntityType,
  type SyncItem,
  type SyncTransport,
  type TransportResult,
} from '@kinesync/core';

/**
 * HTTP transport configuration
 */
export interface HttpTransportConfig {
  /** Server origin, optionally with a path prefix (e.g. 'https://api.example.com') */
  baseUrl: string;
  /** Bearer token, or a getter read before every request */
  authToken?: string | (() => string | null | undefined);
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Endpoint path per entity type */
  endpoints?: Partial<Record<SyncEntityType, string>>;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

export const DEFAULT_ENDPOINTS: Readonly<Record<SyncEntityType, string>> = {
  session: '/api/v1/sessions',
  exerciseResult: '/api/v1/exercise-results',
};

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Classify a non-auth HTTP status into a transport outcome
 */
export function classifyStatus(status: number): TransportResult {
  if (status >= 200 && status < 300) {
    return { kind: 'success' };
  }
  if (status === 408 || status === 429 || status >= 500) {
    return { kind: 'retryable', message: `Server error: ${status}` };
  }
  return { kind: 'permanent', message: `Rejected by server: ${status}`, status };
}

/**
 * REST transport for sync items.
 *
 * Maps each item onto its entity's endpoint:
 * - `create` - `POST {endpoint}` with the payload
 * - `update` - `PUT {endpoint}/{id}` with the payload
 * - `delete` - `DELETE {endpoint}/{id}`
 *
 * Every request carries the item id as `Idempotency-Key`, so the server can
 * recognise a redelivery after a lost response.
 *
 * Failures are returned as {@link TransportResult}s. Only rejected
 * credentials (401/403) throw, since no retry can fix them.
 *
 * @example
 * ```typescript
 * const transport = createHttpTransport({
 *   baseUrl: 'https://api.example.com',
 *   authToken: () => session.accessToken,
 * });
 *
 * const result = await transport.send(item);
 * ```
 */
export class HttpSyncTransport implements SyncTransport {
  private readonly baseUrl: string;
  private readonly authToken: HttpTransportConfig['authToken'];
  private readonly timeoutMs: number;
  private readonly endpoints: Readonly<Record<SyncEntityType, string>>;
  private readonly fetchFn: typeof fetch;

  /**
   * @throws {ConnectionError} `KINESYNC_C505` when `baseUrl` is not an http(s) URL
   */
  constructor(config: HttpTransportConfig) {
    let url: URL;
    try {
      url = new URL(config.baseUrl);
    } catch (error) {
      throw new ConnectionError(
        'KINESYNC_C505',
        `Invalid base URL: ${config.baseUrl}`,
        { baseUrl: config.baseUrl },
        error instanceof Error ? error : undefined
      );
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ConnectionError('KINESYNC_C505', `Unsupported protocol: ${url.protocol}`, {
        baseUrl: config.baseUrl,
      });
    }

    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.authToken = config.authToken;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.endpoints = { ...DEFAULT_ENDPOINTS, ...config.endpoints };
    this.fetchFn = config.fetch ?? fetch;
  }

  async send(item: SyncItem): Promise<TransportResult> {
    const url = this.getUrl(item);
    const method = getMethod(item);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: this.getHeaders(item),
        body: item.operationType === 'delete' ? undefined : JSON.stringify(item.data),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        return { kind: 'retryable', message: 'Connection timeout' };
      }
      return { kind: 'retryable', message: errorMessage(error) };
    } finally {
      clearTimeout(timeoutId);
    }

    // Only the status matters; release the connection
    await response.body?.cancel();

    if (response.status === 401 || response.status === 403) {
      throw new ConnectionError('KINESYNC_C502', `Authentication failed: ${response.status}`, {
        transport: 'http',
        statusCode: response.status,
        url,
      });
    }

    return classifyStatus(response.status);
  }

  /**
   * Get the request URL for an item
   */
  private getUrl(item: SyncItem): string {
    const endpoint = `${this.baseUrl}${this.endpoints[item.entityType]}`;
    return item.operationType === 'create' ? endpoint : `${endpoint}/${encodeURIComponent(item.id)}`;
  }

  /**
   * Get request headers
   */
  private getHeaders(item: SyncItem): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Idempotency-Key': item.id,
    };

    const token = typeof this.authToken === 'function' ? this.authToken() : this.authToken;
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    return headers;
  }
}

function getMethod(item: SyncItem): 'POST' | 'PUT' | 'DELETE' {
  switch (item.operationType) {
    case 'create':
      return 'POST';
    case 'update':
      return 'PUT';
    case 'delete':
      return 'DELETE';
  }
}

/**
 * Create an HTTP transport
 */
export function createHttpTransport(config: HttpTransportConfig): HttpSyncTransport {
  return new HttpSyncTransport(config);
}
