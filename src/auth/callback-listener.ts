/**
 * Loopback listener for the OAuth authorization redirect.
 *
 * Binds an express app to a loopback interface (ephemeral port by default),
 * accepts exactly one redirect on the callback path and answers the browser
 * with a small page.  Use `withCallbackListener()` so the socket is released
 * on every exit path.
 */

import express from 'express';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';

import type { CallbackConfig } from '../shared/config.js';
import { AuthorizationTimeoutError, CancelledError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('callback');

export type CallbackListenerOptions = Pick<CallbackConfig, 'host' | 'port' | 'path'>;

export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function page(title: string, body: string): string {
  return `<!DOCTYPE html><html><head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head><body><h1>${escapeHtml(title)}</h1><p>${escapeHtml(body)}</p></body></html>`;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function hostForUrl(host: string): string {
  return host.includes(':') ? `[${host}]` : host;
}

export class CallbackListener {
  private received: CallbackParams | null = null;
  private deliver: (params: CallbackParams) => void = () => undefined;
  private readonly callback: Promise<CallbackParams>;
  private closed = false;

  private constructor(
    private readonly server: Server,
    readonly port: number,
    readonly redirectUri: string,
  ) {
    this.callback = new Promise((resolve) => {
      this.deliver = resolve;
    });
  }

  /** Bind the listener; resolves once the port is known. */
  static async open(options: CallbackListenerOptions): Promise<CallbackListener> {
    const app = express();
    app.disable('x-powered-by');

    let listener: CallbackListener | null = null;

    app.get(options.path, (req, res) => {
      if (!listener || listener.received) {
        res.status(409).type('html').send(page('Already handled', 'This authorization request was already completed.'));
        return;
      }

      const params: CallbackParams = {
        code: queryString(req.query.code),
        state: queryString(req.query.state),
        error: queryString(req.query.error),
        errorDescription: queryString(req.query.error_description),
      };
      listener.received = params;
      listener.deliver(params);

      if (params.error) {
        res
          .status(400)
          .type('html')
          .send(page('Authorization failed', params.errorDescription ?? params.error));
      } else {
        res.type('html').send(page('Authorization complete', 'You can close this window and return to the terminal.'));
      }
    });

    const server = await new Promise<Server>((resolve, reject) => {
      const srv = app.listen(options.port, options.host, () => resolve(srv));
      srv.once('error', reject);
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      server.close();
      throw new Error('Callback listener did not bind to a TCP port');
    }
    const { port }: AddressInfo = address;
    listener = new CallbackListener(server, port, `http://${hostForUrl(options.host)}:${port}${options.path}`);
    log.debug(`Listening for the authorization redirect on ${listener.redirectUri}`);
    return listener;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Wait for the single redirect.
   *
   * @throws AuthorizationTimeoutError when nothing arrives within `timeoutMs`
   * @throws CancelledError when `signal` aborts first
   */
  waitForCallback(timeoutMs: number, signal?: AbortSignal): Promise<CallbackParams> {
    if (this.received) return Promise.resolve(this.received);

    return new Promise<CallbackParams>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = () => {
        cleanup();
        reject(new CancelledError('Login cancelled'));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new AuthorizationTimeoutError(timeoutMs));
      }, timeoutMs);

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.callback.then(
        (params) => {
          cleanup();
          resolve(params);
        },
        (err: unknown) => {
          cleanup();
          reject(err);
        },
      );
    });
  }

  /** Stop listening and drop open connections.  Safe to call twice. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server.closeAllConnections();
    });
    log.debug('Callback listener closed');
  }
}

/** Run `fn` with a bound listener, closing it however `fn` ends. */
export async function withCallbackListener<T>(
  options: CallbackListenerOptions,
  fn: (listener: CallbackListener) => Promise<T>,
): Promise<T> {
  const listener = await CallbackListener.open(options);
  try {
    return await fn(listener);
  } finally {
    await listener.close();
  }
}
