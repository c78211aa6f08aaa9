import { describe, it, expect, vi } from 'vitest';
import { HttpClient, anySignal, backoffDelay, readJsonBody, sleep, type FetchLike } from './http.js';
import { CancelledError, NetworkError } from './errors.js';

const FAST_RETRY = { retries: 2, baseDelay: 1, maxDelay: 5 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('backoffDelay', () => {
  it('should double per attempt up to the cap', () => {
    const policy = { retries: 5, baseDelay: 100, maxDelay: 500 };
    expect([0, 1, 2, 3, 4].map((attempt) => backoffDelay(policy, attempt))).toEqual([100, 200, 400, 500, 500]);
  });
});

describe('anySignal', () => {
  it('should abort with the reason of the first aborted signal', () => {
    const a = new AbortController();
    const b = new AbortController();
    const combined = anySignal([a.signal, b.signal]);

    b.abort('second');
    expect(combined.aborted).toBe(true);
    expect(combined.reason).toBe('second');
  });

  it('should start aborted when an input already is', () => {
    const a = new AbortController();
    a.abort('early');
    expect(anySignal([a.signal]).reason).toBe('early');
  });
});

describe('sleep', () => {
  it('should reject with CancelledError when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow(CancelledError);
  });
});

describe('HttpClient', () => {
  it('should return a successful response', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ ok: true }));
    const http = new HttpClient({ fetch: fetchMock, timeout: 1_000, retry: FAST_RETRY });

    const res = await http.request('https://auth.test/token', { method: 'POST', body: 'a=b' });

    expect(res.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const init = fetchMock.mock.calls[0][1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('a=b');
  });

  it('should retry connection failures and then succeed', async () => {
    const fetchMock = vi
      .fn<FetchLike>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const http = new HttpClient({ fetch: fetchMock, timeout: 1_000, retry: FAST_RETRY });

    const res = await http.request('https://auth.test/token');

    expect(res.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should raise NetworkError once retries are exhausted', async () => {
    const fetchMock = vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed'));
    const http = new HttpClient({ fetch: fetchMock, timeout: 1_000, retry: FAST_RETRY });

    await expect(http.request('https://auth.test/token?x=1')).rejects.toThrow(
      new NetworkError('Request to https://auth.test/token failed: fetch failed'),
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should retry 503 responses and return the last one when retries run out', async () => {
    const fetchMock = vi.fn<FetchLike>().mockImplementation(async () => jsonResponse({ error: 'busy' }, 503));
    const http = new HttpClient({ fetch: fetchMock, timeout: 1_000, retry: FAST_RETRY });

    const res = await http.request('https://auth.test/token');

    expect(res.status).toBe(503);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should not retry client errors', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ error: 'invalid_grant' }, 400));
    const http = new HttpClient({ fetch: fetchMock, timeout: 1_000, retry: FAST_RETRY });

    const res = await http.request('https://auth.test/token');

    expect(res.status).toBe(400);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should not retry when retries are disabled for the request', async () => {
    const fetchMock = vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed'));
    const http = new HttpClient({ fetch: fetchMock, timeout: 1_000, retry: FAST_RETRY });

    await expect(http.request('https://auth.test/token', { retry: false })).rejects.toThrow(NetworkError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should raise CancelledError when the caller aborts', async () => {
    const controller = new AbortController();
    const fetchMock = vi.fn<FetchLike>().mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const http = new HttpClient({ fetch: fetchMock, timeout: 10_000, retry: FAST_RETRY });

    const pending = http.request('https://relay.test/mcp', { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toThrow(CancelledError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should report a per-attempt timeout', async () => {
    const fetchMock = vi.fn<FetchLike>().mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const http = new HttpClient({ fetch: fetchMock, timeout: 20, retry: { ...FAST_RETRY, retries: 0 } });

    await expect(http.request('https://relay.test/mcp')).rejects.toThrow(
      'Request to https://relay.test/mcp failed: timed out after 20ms',
    );
  });
});

describe('readJsonBody', () => {
  it('should parse JSON bodies', async () => {
    expect(await readJsonBody(jsonResponse({ a: 1 }))).toEqual({ a: 1 });
  });

  it('should return null for empty or non-JSON bodies', async () => {
    expect(await readJsonBody(new Response(''))).toBeNull();
    expect(await readJsonBody(new Response('<html>'))).toBeNull();
  });
});
