/**
 * End-to-end encrypting proxy between a local MCP client and the relay.
 *
 * Sensitive tools never reach the relay in plaintext: their arguments are
 * sealed to the user's device key and sent to the relay's encrypted variant
 * (`<tool>_e2ee`), and sealed replies are opened locally.  Everything else
 * passes through unchanged.
 *
 * Each call is a ProxyExchange with a fresh correlation id, which names it in
 * the logs of both ends.  An exchange ends when its reply is delivered, when
 * it times out, or when the proxy shuts down.  Any crypto failure ends only
 * that exchange and never falls back to plaintext.
 */

import crypto from 'node:crypto';

import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';

import type { SensitiveTool } from '../shared/config.js';
import { openText, publicKeyFromBase64, sealJSON, type AgentKeyPair } from '../shared/crypto/index.js';
import {
  AgentError,
  CancelledError,
  DecryptionError,
  EncryptionError,
  ExchangeTimeoutError,
} from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { RelayTransport } from './relay-client.js';

const log = createLogger('proxy');

export type ExchangeTarget = 'plaintext' | 'encrypted';

export interface ProxyExchange {
  correlationId: string;
  toolName: string;
  /** Held in memory only, for the lifetime of the call */
  payload: Record<string, unknown>;
  target: ExchangeTarget;
  startedAt: number;
}

export interface ProxyResult {
  correlationId: string;
  toolName: string;
  target: ExchangeTarget;
  result: CallToolResult;
}

export interface EncryptingProxyOptions {
  relay: RelayTransport;
  keyPair: AgentKeyPair;
  sensitiveTools: SensitiveTool[];
  /** Suffix of the relay's encrypted tool variants, e.g. `_e2ee` */
  encryptedSuffix: string;
  /** Upper bound for one exchange, including the human's reply (ms) */
  exchangeTimeout: number;
  now?: () => number;
}

interface InFlight {
  exchange: ProxyExchange;
  controller: AbortController;
}

/** Settle with `work`, or reject with the signal's reason as soon as it aborts. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  const aborted = new Promise<never>((_resolve, reject) => {
    if (signal.aborted) reject(signal.reason);
    else signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
  return Promise.race([work, aborted]);
}

export class EncryptingProxy {
  private readonly inFlight = new Map<string, InFlight>();
  private readonly sensitive: Map<string, SensitiveTool>;
  private readonly now: () => number;
  private closed = false;

  constructor(private readonly options: EncryptingProxyOptions) {
    this.sensitive = new Map(options.sensitiveTools.map((tool) => [tool.name, tool]));
    this.now = options.now ?? Date.now;
  }

  /** Snapshot of the exchanges currently in flight */
  get pending(): ProxyExchange[] {
    return [...this.inFlight.values()].map(({ exchange }) => exchange);
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  isSensitive(toolName: string): boolean {
    return this.sensitive.has(toolName);
  }

  /** The relay's tools as the local client should see them: encrypted variants hidden. */
  async listTools(signal?: AbortSignal): Promise<Tool[]> {
    const tools = await this.options.relay.listTools(signal);
    return tools.filter((tool) => !tool.name.endsWith(this.options.encryptedSuffix));
  }

  /**
   * Proxy one tool call.
   *
   * @throws EncryptionError when the call cannot be sealed (nothing is sent)
   * @throws DecryptionError when a sealed reply fails to open
   * @throws ExchangeTimeoutError when no reply arrives within the exchange timeout
   * @throws CancelledError when `signal` aborts or the proxy shuts down
   */
  async callTool(toolName: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ProxyResult> {
    if (this.closed) throw new CancelledError('Proxy is shutting down');

    const sensitive = this.sensitive.get(toolName);
    const exchange: ProxyExchange = {
      correlationId: crypto.randomUUID(),
      toolName,
      payload: args,
      target: sensitive ? 'encrypted' : 'plaintext',
      startedAt: this.now(),
    };
    const controller = new AbortController();
    this.inFlight.set(exchange.correlationId, { exchange, controller });

    const timeout = this.options.exchangeTimeout;
    const timer = setTimeout(() => controller.abort(new ExchangeTimeoutError(toolName, timeout)), timeout);
    const onCallerAbort = () => controller.abort(new CancelledError(`Call to ${toolName} cancelled`));
    if (signal?.aborted) onCallerAbort();
    else signal?.addEventListener('abort', onCallerAbort, { once: true });

    log.debug(`[${exchange.correlationId}] ${toolName} → ${exchange.target}`);
    try {
      const work = sensitive
        ? this.callEncrypted(exchange, sensitive, controller.signal)
        : this.options.relay.callTool(exchange.correlationId, toolName, args, controller.signal);
      const result = await untilAborted(work, controller.signal);
      log.debug(`[${exchange.correlationId}] ${toolName} completed in ${this.now() - exchange.startedAt}ms`);
      return { correlationId: exchange.correlationId, toolName, target: exchange.target, result };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
      this.inFlight.delete(exchange.correlationId);
      exchange.payload = {};
    }
  }

  /** Cancel every outstanding exchange and refuse new ones. */
  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.inFlight.size > 0) log.info(`Cancelling ${this.inFlight.size} outstanding exchange(s)`);
    for (const { exchange, controller } of this.inFlight.values()) {
      controller.abort(new CancelledError(`Call to ${exchange.toolName} cancelled: proxy shutting down`));
    }
  }

  /** Shut down, then release the relay session. */
  async close(): Promise<void> {
    this.shutdown();
    await this.options.relay.close();
  }

  private async callEncrypted(
    exchange: ProxyExchange,
    tool: SensitiveTool,
    signal: AbortSignal,
  ): Promise<CallToolResult> {
    const deviceKeys = await this.options.relay.getDevicePublicKeys(signal);
    const recipient = deviceKeys[0];
    if (recipient === undefined) {
      throw new EncryptionError(`No paired device key is available; ${exchange.toolName} was not sent`);
    }

    let encryptedPayload: string;
    try {
      encryptedPayload = sealJSON(exchange.payload, publicKeyFromBase64(recipient), this.options.keyPair);
    } catch (err) {
      if (err instanceof EncryptionError) throw err;
      throw new EncryptionError(`Could not seal the arguments of ${exchange.toolName}`, { cause: err });
    }

    const result = await this.options.relay.callTool(
      exchange.correlationId,
      `${exchange.toolName}${this.options.encryptedSuffix}`,
      { encrypted_payload: encryptedPayload },
      signal,
    );

    if (!tool.encryptedResponse || result.isError) return result;
    return { content: [{ type: 'text', text: this.openReply(exchange, result, deviceKeys) }] };
  }

  private openReply(exchange: ProxyExchange, result: CallToolResult, deviceKeys: string[]): string {
    const sealed = result.content.find((item) => item.type === 'text');
    if (!sealed || sealed.type !== 'text') {
      throw new DecryptionError(`Encrypted reply to ${exchange.toolName} carried no payload`);
    }
    try {
      return openText(sealed.text, this.options.keyPair.privateKey, { expectedSenders: deviceKeys });
    } catch (err) {
      if (err instanceof AgentError) throw err;
      throw new DecryptionError(`Could not open the reply to ${exchange.toolName}`, { cause: err });
    }
  }
}
