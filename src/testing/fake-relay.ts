/**
 * In-process stand-in for the relay's Streamable HTTP MCP endpoint, used as
 * the `fetch` behind HttpClient in tests.  It answers initialize, tools/list
 * (paged) and tools/call, and records every JSON-RPC message it receives.
 */

import {
  CallToolRequestSchema,
  JSONRPCNotificationSchema,
  JSONRPCRequestSchema,
  LATEST_PROTOCOL_VERSION,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import { errorMessage } from '../shared/errors.js';

export interface RecordedRpc {
  method: string;
  params: Record<string, unknown>;
  /** Request headers, lower-cased */
  headers: Record<string, string>;
}

/** Thrown by a tool handler to answer with a JSON-RPC error. */
export class RpcFailure extends Error {
  constructor(
    readonly code: number,
    message: string,
  ) {
    super(message);
  }
}

export type ToolHandler = (name: string, args: Record<string, unknown>, headers: Headers) => Promise<CallToolResult>;

export interface FakeRelayOptions {
  /** Pages returned by tools/list */
  toolPages?: Tool[][];
  onCall?: ToolHandler;
  /** Issued on initialize and expected back afterwards */
  sessionId?: string;
  /** Answer requests as an SSE stream instead of a JSON body */
  stream?: boolean;
  /** Return false to answer 401 */
  authorize?: (headers: Headers) => boolean;
}

function headerRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

export class FakeRelay {
  readonly rpcs: RecordedRpc[] = [];

  constructor(private readonly options: FakeRelayOptions = {}) {}

  /** Tool calls received, in order */
  get toolCalls(): RecordedRpc[] {
    return this.rpcs.filter((rpc) => rpc.method === 'tools/call');
  }

  async handle(init?: RequestInit): Promise<Response> {
    const headers = new Headers(init?.headers);
    if (this.options.authorize && !this.options.authorize(headers)) return new Response('unauthorized', { status: 401 });
    // no standalone server stream
    if (init?.method !== 'POST') return new Response(null, { status: 405 });

    const body: unknown = JSON.parse(String(init.body));
    const parsed = JSONRPCRequestSchema.safeParse(body);
    if (!parsed.success) {
      const notification = JSONRPCNotificationSchema.parse(body);
      this.rpcs.push({ method: notification.method, params: notification.params ?? {}, headers: headerRecord(headers) });
      return new Response(null, { status: 202 });
    }

    const request = parsed.data;
    const params: Record<string, unknown> = request.params ?? {};
    this.rpcs.push({ method: request.method, params, headers: headerRecord(headers) });

    if (request.method !== 'initialize' && this.options.sessionId && headers.get('mcp-session-id') !== this.options.sessionId) {
      return new Response('unknown session', { status: 404 });
    }

    try {
      return this.reply({ jsonrpc: '2.0', id: request.id, result: await this.dispatch(request.method, params, headers) });
    } catch (err) {
      const code = err instanceof RpcFailure ? err.code : -32603;
      return this.reply({ jsonrpc: '2.0', id: request.id, error: { code, message: errorMessage(err) } });
    }
  }

  private async dispatch(method: string, params: Record<string, unknown>, headers: Headers): Promise<object> {
    switch (method) {
      case 'initialize':
        return {
          protocolVersion: typeof params.protocolVersion === 'string' ? params.protocolVersion : LATEST_PROTOCOL_VERSION,
          capabilities: { tools: {} },
          serverInfo: { name: 'fake-relay', version: '1.0.0' },
        };
      case 'tools/list': {
        const pages = this.options.toolPages ?? [[]];
        const index = typeof params.cursor === 'string' ? Number(params.cursor) : 0;
        const next = index + 1 < pages.length ? { nextCursor: String(index + 1) } : {};
        return { tools: pages[index] ?? [], ...next };
      }
      case 'tools/call': {
        const call = CallToolRequestSchema.shape.params.parse(params);
        const onCall = this.options.onCall;
        if (!onCall) throw new RpcFailure(-32602, `Unknown tool: ${call.name}`);
        return onCall(call.name, call.arguments ?? {}, headers);
      }
      default:
        throw new RpcFailure(-32601, `Method not found: ${method}`);
    }
  }

  private reply(payload: object): Response {
    const headers: Record<string, string> = {};
    if (this.options.sessionId) headers['Mcp-Session-Id'] = this.options.sessionId;
    if (!this.options.stream) {
      return new Response(JSON.stringify(payload), { status: 200, headers: { ...headers, 'Content-Type': 'application/json' } });
    }
    const progress = { jsonrpc: '2.0', method: 'notifications/message', params: { level: 'info', data: 'waiting' } };
    const body = [progress, payload].map((event) => `event: message\ndata: ${JSON.stringify(event)}\n\n`).join('');
    return new Response(body, { status: 200, headers: { ...headers, 'Content-Type': 'text/event-stream' } });
  }
}
