/**
 * HTTP transport edge.
 *
 * Wraps an injectable `fetch` with per-attempt timeouts, caller cancellation
 * and bounded exponential backoff.  Only transient failures are retried:
 * connection-level errors and 429/502/503/504 responses.  Anything the server
 * actually answered (a 4xx, an OAuth error body) is returned to the caller
 * untouched, so security failures are never retried here.
 */

import { CancelledError, NetworkError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('http');

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface RetryPolicy {
  /** Additional attempts after the first one */
  retries: number;
  /** Delay before the first retry (ms); doubles on each further retry */
  baseDelay: number;
  /** Upper bound for a single delay (ms) */
  maxDelay: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { retries: 3, baseDelay: 250, maxDelay: 4_000 };

const RETRYABLE_STATUS = new Set([429, 502, 503, 504]);

export interface HttpClientOptions {
  fetch?: FetchLike;
  /** Default per-attempt timeout (ms) */
  timeout: number;
  retry?: RetryPolicy;
}

export interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  headers?: Record<string, string>;
  body?: string | URLSearchParams;
  signal?: AbortSignal;
  /** Per-attempt timeout (ms), overriding the client default */
  timeout?: number;
  /** `false` disables retries for this request */
  retry?: Partial<RetryPolicy> | false;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelay, policy.baseDelay * 2 ** attempt);
}

/** Abort when any of the given signals aborts, with that signal's reason. */
export function anySignal(signals: AbortSignal[]): AbortSignal {
  const controller = new AbortController();
  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
  }
  return controller.signal;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function describeTarget(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return url;
  }
}

/** Release a response body the caller will not read. */
export async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (err) {
    log.debug(`Could not discard response body: ${errorMessage(err)}`);
  }
}

export class HttpClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeout: number;
  private readonly retry: RetryPolicy;

  constructor(options: HttpClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeout = options.timeout;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * Send a request, retrying transient failures.
   *
   * The per-attempt timeout keeps running while the caller reads the body,
   * which matters for relay calls that stream their answer late.
   *
   * @throws CancelledError when `options.signal` aborts
   * @throws NetworkError when every attempt failed to get a response
   */
  async request(url: string, options: RequestOptions = {}): Promise<Response> {
    const policy: RetryPolicy =
      options.retry === false ? { ...this.retry, retries: 0 } : { ...this.retry, ...options.retry };
    const timeout = options.timeout ?? this.timeout;
    const target = describeTarget(url);

    for (let attempt = 0; ; attempt++) {
      if (options.signal?.aborted) throw new CancelledError(`Request to ${target} cancelled`);

      const timeoutSignal = AbortSignal.timeout(timeout);
      const signal = options.signal ? anySignal([options.signal, timeoutSignal]) : timeoutSignal;

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: options.method ?? 'GET',
          headers: options.headers,
          body: options.body,
          signal,
        });
      } catch (err) {
        if (options.signal?.aborted) throw new CancelledError(`Request to ${target} cancelled`);
        const reason = timeoutSignal.aborted ? `timed out after ${timeout}ms` : errorMessage(err);
        if (attempt < policy.retries) {
          const delay = backoffDelay(policy, attempt);
          log.debug(`${target}: ${reason}; retrying in ${delay}ms (${attempt + 1}/${policy.retries})`);
          await sleep(delay, options.signal);
          continue;
        }
        throw new NetworkError(`Request to ${target} failed: ${reason}`, { cause: err });
      }

      if (RETRYABLE_STATUS.has(response.status) && attempt < policy.retries) {
        const delay = backoffDelay(policy, attempt);
        log.debug(`${target}: HTTP ${response.status}; retrying in ${delay}ms (${attempt + 1}/${policy.retries})`);
        await discardBody(response);
        await sleep(delay, options.signal);
        continue;
      }

      return response;
    }
  }
}

/** Read a response body as JSON, or null when it is empty or not JSON. */
export async function readJsonBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return null;
  }
}
