import { describe, it, expect, vi } from 'vitest';
import {
  FetchHttpClient,
  HttpStatusError,
  TransportError,
  isRetryableError,
} from '../../../src/services/http-client.js';

function mockResponse(status: number, body: string): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  } as unknown as Response;
}

// Never settles on its own; rejects with the signal's reason once aborted.
const hangingFetch: typeof globalThis.fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    signal?.addEventListener('abort', () => reject(signal.reason));
  });

describe('FetchHttpClient', () => {
  it('sends JSON bodies and returns status and text', async () => {
    const fetchFn = vi.fn<typeof globalThis.fetch>().mockResolvedValue(mockResponse(200, '{"ok":true}'));
    const client = new FetchHttpClient({ fetch: fetchFn });

    const response = await client.request({
      method: 'POST',
      url: 'https://llm.test/chat',
      headers: { Authorization: 'Bearer test-key' },
      body: { a: 1 },
    });

    expect(response).toEqual({ status: 200, body: '{"ok":true}' });
    expect(fetchFn).toHaveBeenCalledWith('https://llm.test/chat', expect.objectContaining({
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-key' },
      body: '{"a":1}',
    }));
  });

  it('returns error statuses instead of throwing', async () => {
    const fetchFn = vi.fn<typeof globalThis.fetch>().mockResolvedValue(mockResponse(500, 'upstream down'));
    const client = new FetchHttpClient({ fetch: fetchFn });

    await expect(client.request({ method: 'GET', url: 'https://llm.test/models' })).resolves.toEqual({
      status: 500,
      body: 'upstream down',
    });
  });

  it('wraps network failures', async () => {
    const cause = new TypeError('fetch failed');
    const client = new FetchHttpClient({ fetch: vi.fn<typeof globalThis.fetch>().mockRejectedValue(cause) });

    const error = await client.request({ method: 'GET', url: 'https://llm.test/models' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ url: 'https://llm.test/models', timedOut: false });
    expect((error as TransportError).message).toBe('Request to https://llm.test/models failed: fetch failed');
    expect((error as TransportError).cause).toBe(cause);
  });

  it('times out slow requests', async () => {
    const client = new FetchHttpClient({ fetch: hangingFetch, timeout: 1_000 });

    const error = await client.request({ method: 'GET', url: 'https://llm.test/slow', timeout: 10 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).timedOut).toBe(true);
    expect((error as TransportError).message).toBe('Request to https://llm.test/slow timed out after 10ms');
  });

  it('rejects with the caller abort reason', async () => {
    const controller = new AbortController();
    const client = new FetchHttpClient({ fetch: hangingFetch, timeout: 1_000 });
    setTimeout(() => controller.abort(), 5);

    const error = await client.request({ method: 'GET', url: 'https://llm.test/slow', signal: controller.signal }).catch((e: unknown) => e);

    expect(error).toBe(controller.signal.reason);
  });

  it('does not call fetch when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchFn = vi.fn<typeof globalThis.fetch>();
    const client = new FetchHttpClient({ fetch: fetchFn });

    await expect(client.request({ method: 'GET', url: 'https://llm.test/', signal: controller.signal })).rejects.toBe(controller.signal.reason);
    expect(fetchFn).not.toHaveBeenCalled();
  });
});

describe('isRetryableError', () => {
  it('retries throttling, timeouts and server errors', () => {
    expect(isRetryableError(new HttpStatusError(408, ''))).toBe(true);
    expect(isRetryableError(new HttpStatusError(429, ''))).toBe(true);
    expect(isRetryableError(new HttpStatusError(503, ''))).toBe(true);
    expect(isRetryableError(new TransportError('down', 'https://llm.test/'))).toBe(true);
    expect(isRetryableError(new Error('unknown'))).toBe(true);
  });

  it('does not retry other client errors', () => {
    expect(isRetryableError(new HttpStatusError(400, '{"error":"bad request"}'))).toBe(false);
    expect(isRetryableError(new HttpStatusError(401, ''))).toBe(false);
  });
});

describe('HttpStatusError', () => {
  it('keeps status and body', () => {
    const error = new HttpStatusError(401, 'invalid api key');
    expect(error.message).toBe('HTTP 401: invalid api key');
    expect(error).toMatchObject({ status: 401, body: 'invalid api key' });
  });
});
