/**
 * Transport seam of the pipeline. Providers only see `HttpClient`; the
 * default implementation uses the global fetch of Node.js 20.
 */

export interface HttpRequest {
  method: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  url: string;
  headers?: Record<string, string>;
  body?: unknown;
  /** Per-request timeout in milliseconds. */
  timeout?: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * The request never produced a response: connection failure, DNS error,
 * or the per-request timeout elapsed.
 */
export class TransportError extends Error {
  public readonly url: string;
  public readonly timedOut: boolean;

  constructor(message: string, url: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.url = url;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * The server answered with a non-2xx status.
 */
export class HttpStatusError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string) {
    super(`HTTP ${status}: ${body.slice(0, 200)}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.body = body;
  }
}

/**
 * Transport failures worth another attempt: anything without a response,
 * request timeouts, throttling and server errors. Other 4xx answers would
 * fail the same way again.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 408 || error.status === 429 || error.status >= 500;
  }
  return true;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export interface FetchHttpClientOptions {
  /** Custom fetch implementation (defaults to global fetch) */
  fetch?: typeof globalThis.fetch;
  /** Timeout for requests that do not set their own, in milliseconds (default: 30000) */
  timeout?: number;
}

export class FetchHttpClient implements HttpClient {
  private readonly _fetch: typeof globalThis.fetch;
  private readonly timeout: number;

  constructor(options: FetchHttpClientOptions = {}) {
    this._fetch = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeout = options.timeout ?? 30_000;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const { method, url, headers = {}, body, signal } = request;
    const timeout = request.timeout ?? this.timeout;

    signal?.throwIfAborted();

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new TransportError(`Request to ${url} timed out after ${timeout}ms`, url, { timedOut: true }));
    }, timeout);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this._fetch(url, {
        method,
        headers: body === undefined ? headers : { 'Content-Type': 'application/json', ...headers },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      return { status: response.status, body: await response.text() };
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      if (controller.signal.reason instanceof TransportError) {
        throw controller.signal.reason;
      }
      throw new TransportError(
        `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        url,
        { cause: error },
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
