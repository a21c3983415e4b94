/**
 * HTTP Client for geocoder adapters
 *
 * Thin wrapper over native fetch with:
 * - Per-request timeouts via AbortController
 * - Caller cancellation merged with the timeout signal
 * - Typed errors that let adapters tell timeouts from other failures
 *
 * No retries here: the retrying geocode client owns the retry policy, and
 * each attempt counts against the rate budget once.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 10_000, userAgent: 'geo-accuracy/1.0' });
 * const body: unknown = await client.fetchJSON('https://nominatim.example.org/reverse?...');
 * ```
 */

// ============================================================================
// Configuration Types
// ============================================================================

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

export interface HTTPClientConfig {
  /** Request timeout in milliseconds (default: 10000) */
  readonly timeoutMs: number;

  /** User-Agent header (default: 'geo-accuracy/1.0') */
  readonly userAgent: string;

  /** fetch implementation (default: global fetch) */
  readonly fetch: FetchFunction;
}

/**
 * Per-request fetch options (override client defaults)
 */
export interface FetchOptions {
  /** Override request timeout */
  readonly timeoutMs?: number;

  /** Additional HTTP headers */
  readonly headers?: Record<string, string>;

  /** AbortSignal for external cancellation */
  readonly signal?: AbortSignal;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx HTTP response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

/**
 * Request timeout error (AbortController triggered by the timeout)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Request cancelled by the caller's signal
 */
export class HTTPAbortedError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Request aborted: ${url}`);
    this.name = 'HTTPAbortedError';
    this.url = url;
  }
}

/**
 * Network error (connection failed, DNS resolution, etc.)
 */
export class HTTPNetworkError extends Error {
  readonly url: string;
  readonly cause: Error;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`);
    this.name = 'HTTPNetworkError';
    this.url = url;
    this.cause = cause;
  }
}

/**
 * JSON parse error
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;
  readonly cause: Error;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`);
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
    this.cause = cause;
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      timeoutMs: 10000,
      userAgent: 'geo-accuracy/1.0',
      fetch: (input, init) => fetch(input, init),
      ...config,
    };
  }

  /**
   * Fetch and parse a JSON response; the body is returned unvalidated
   *
   * @throws {HTTPError} For HTTP error responses (4xx, 5xx)
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPAbortedError} If the caller's signal aborts the request
   * @throws {HTTPNetworkError} For network failures
   * @throws {HTTPJSONParseError} If response is not valid JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const response = await this.fetchWithTimeout(url, options);

    if (!response.ok) {
      throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
    }

    const text = await response.text();

    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    const signal = options?.signal
      ? this.mergeAbortSignals([controller.signal, options.signal])
      : controller.signal;

    try {
      return await this.config.fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
          ...options?.headers,
        },
        signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      if (options?.signal?.aborted) {
        throw new HTTPAbortedError(url);
      }

      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Merge multiple AbortSignals into one
   *
   * The merged signal aborts when ANY of the input signals abort.
   */
  private mergeAbortSignals(signals: readonly AbortSignal[]): AbortSignal {
    const controller = new AbortController();

    for (const signal of signals) {
      if (signal.aborted) {
        controller.abort();
        break;
      }

      signal.addEventListener('abort', () => controller.abort(), { once: true });
    }

    return controller.signal;
  }
}
