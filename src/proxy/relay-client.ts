/**
 * Client for the relay's MCP endpoint.
 *
 * The relay speaks MCP over Streamable HTTP, so the SDK's `Client` does the
 * protocol work: framing, JSON or SSE replies, reply matching and the
 * session id.  This class supplies the `fetch` underneath it, which adds the
 * agent's credential and renews it once when the relay answers 401.  Device
 * public keys come from a plain REST endpoint on the same server.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport, StreamableHTTPError } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { CallToolResultSchema, McpError, type CallToolResult, type Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { credentialHeaders, renewCredential, type Credential } from '../auth/credentials.js';
import { AGENT_NAME_HEADER } from '../auth/token-endpoint.js';
import { AgentError, ReauthenticationRequiredError, RelayError, errorMessage } from '../shared/errors.js';
import { discardBody, readJsonBody, type HttpClient, type RequestOptions } from '../shared/http.js';
import { createLogger } from '../shared/logger.js';
import { SingleFlight } from '../shared/single-flight.js';

const log = createLogger('relay');

export const RELAY_CLIENT_NAME = 'hitl-agent';

/** What the encrypting proxy needs from the relay */
export interface RelayTransport {
  listTools(signal?: AbortSignal): Promise<Tool[]>;
  /** `correlationId` names the exchange in logs on both sides */
  callTool(
    correlationId: string,
    name: string,
    args: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<CallToolResult>;
  /** Base64 raw X25519 keys of the user's paired devices */
  getDevicePublicKeys(signal?: AbortSignal): Promise<string[]>;
  close(): Promise<void>;
}

export interface HttpRelayClientOptions {
  http: HttpClient;
  relayUrl: string;
  deviceKeysUrl: string;
  credential: Credential;
  agentName: string;
  /** How long one relay request may wait for its reply (ms) */
  requestTimeout: number;
  /** Reported to the relay during initialization */
  version?: string;
}

const DeviceKeysSchema = z.object({ public_keys: z.array(z.string()) });

function requestMethod(method: string | undefined): RequestOptions['method'] {
  switch (method?.toUpperCase()) {
    case 'POST':
      return 'POST';
    case 'DELETE':
      return 'DELETE';
    default:
      return 'GET';
  }
}

function headerRecord(init: RequestInit['headers']): Record<string, string> {
  const record: Record<string, string> = {};
  new Headers(init).forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

/** Map what the SDK client throws onto the agent's error taxonomy. */
export function relayFailure(action: string, err: unknown): AgentError {
  if (err instanceof AgentError) return err;
  if (err instanceof McpError) return new RelayError(`Relay ${action} failed: ${err.message}`, { rpcCode: err.code, cause: err });
  if (err instanceof StreamableHTTPError) {
    return new RelayError(`Relay ${action} failed: ${err.message}`, { status: err.code, cause: err });
  }
  return new RelayError(`Relay ${action} failed: ${errorMessage(err)}`, { cause: err });
}

// ── Client ──────────────────────────────────────────────────────────────

export class HttpRelayClient implements RelayTransport {
  private client: Client | null = null;
  private readonly connecting = new SingleFlight<Client>();

  constructor(private readonly options: HttpRelayClientOptions) {}

  async listTools(signal?: AbortSignal): Promise<Tool[]> {
    const client = await this.connected();
    const tools: Tool[] = [];
    let cursor: string | undefined;
    try {
      do {
        const page = await client.listTools(cursor ? { cursor } : undefined, { signal });
        tools.push(...page.tools);
        cursor = page.nextCursor;
      } while (cursor);
    } catch (err) {
      throw relayFailure('tools/list', err);
    }
    return tools;
  }

  async callTool(
    correlationId: string,
    name: string,
    args: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<CallToolResult> {
    const client = await this.connected();
    log.debug(`[${correlationId}] tools/call ${name}`);
    let raw: unknown;
    try {
      raw = await client.callTool({ name, arguments: args }, CallToolResultSchema, {
        signal,
        timeout: this.options.requestTimeout,
      });
    } catch (err) {
      throw relayFailure(`call to ${name}`, err);
    }
    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) throw new RelayError(`Relay returned a malformed result for ${name}`);
    return parsed.data;
  }

  async getDevicePublicKeys(signal?: AbortSignal): Promise<string[]> {
    const response = await this.send(this.options.deviceKeysUrl, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal,
    });
    if (!response.ok) {
      const detail = (await response.text()).slice(0, 200);
      throw new RelayError(`Device key request failed: HTTP ${response.status}${detail ? ` ${detail}` : ''}`, {
        status: response.status,
      });
    }
    const parsed = DeviceKeysSchema.safeParse(await readJsonBody(response));
    if (!parsed.success) throw new RelayError('Device key response is missing public_keys');
    return parsed.data.public_keys;
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    await client?.close();
  }

  /** The initialized SDK client, connecting on first use. */
  private async connected(): Promise<Client> {
    if (this.client) return this.client;
    return this.connecting.run(async () => {
      const client = new Client({ name: RELAY_CLIENT_NAME, version: this.options.version ?? '0.0.0' });
      const transport = new StreamableHTTPClientTransport(new URL(this.options.relayUrl), {
        fetch: (input, init) => this.relayFetch(input, init),
      });
      client.onerror = (err) => log.debug(`Relay transport: ${errorMessage(err)}`);
      client.onclose = () => {
        if (this.client === client) this.client = null;
      };
      try {
        await client.connect(transport, { timeout: this.options.requestTimeout });
      } catch (err) {
        throw relayFailure('initialize', err);
      }
      log.debug(`Connected to relay ${this.options.relayUrl}`);
      this.client = client;
      return client;
    });
  }

  /** The `fetch` the SDK transport sends through. */
  private relayFetch(input: string | URL, init?: RequestInit): Promise<Response> {
    const method = requestMethod(init?.method);
    return this.send(String(input), {
      method,
      headers: headerRecord(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
      signal: init?.signal ?? undefined,
      // a tool call may already have reached a human; never resend a POST
      retry: method === 'POST' ? false : undefined,
    });
  }

  /**
   * Send an authenticated request.  A 401 renews the credential once and
   * repeats the request; other statuses are the caller's to judge.
   */
  private async send(url: string, options: RequestOptions): Promise<Response> {
    for (let renewed = false; ; renewed = true) {
      const response = await this.options.http.request(url, {
        ...options,
        headers: {
          ...options.headers,
          [AGENT_NAME_HEADER]: this.options.agentName,
          ...(await credentialHeaders(this.options.credential)),
        },
      });
      if (response.status !== 401) return response;

      await discardBody(response);
      if (renewed) {
        throw new ReauthenticationRequiredError('The relay rejected the renewed credential; run `hitl-agent login`');
      }
      log.warn('Relay answered 401; renewing the credential');
      await renewCredential(this.options.credential);
    }
  }
}
