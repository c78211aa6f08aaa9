/**
 * MCP Proxy Server, the local side.
 *
 * The MCP client (an IDE or agent runtime) spawns `hitl-agent proxy` as a
 * child process on stdio.  Tool listing and tool calls are handed to the
 * EncryptingProxy, which talks to the relay; sensitive tools are sealed
 * end to end on the way.
 *
 * stdout carries JSON-RPC frames only.  All logging goes to stderr.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';

import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { EncryptingProxy } from '../proxy/encrypting-proxy.js';

const log = createLogger('mcp');

export const SERVER_NAME = 'hitl-agent';

export interface ProxyServerOptions {
  version: string;
}

function errorResult(err: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: `Error: ${errorMessage(err)}` }],
    isError: true,
  };
}

// ── MCP Server ─────────────────────────────────────────────────────────────

/** Build an MCP server whose tools are the relay's, routed through `proxy`. */
export function createProxyServer(proxy: EncryptingProxy, options: ProxyServerOptions): Server {
  const server = new Server({ name: SERVER_NAME, version: options.version }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async (_request, extra) => ({
    tools: await proxy.listTools(extra.signal),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    try {
      const { result } = await proxy.callTool(name, args ?? {}, extra.signal);
      return result;
    } catch (err) {
      log.error(`${name} failed: ${errorMessage(err)}`);
      return errorResult(err);
    }
  });

  return server;
}

// ── Start ──────────────────────────────────────────────────────────────────

/**
 * Serve `proxy` over stdio until the client disconnects or the process is
 * told to stop.  Outstanding exchanges are cancelled and the relay session
 * closed before returning.
 */
export async function runStdioServer(proxy: EncryptingProxy, options: ProxyServerOptions): Promise<void> {
  const server = createProxyServer(proxy, options);
  const transport = new StdioServerTransport();
  const closed = new Promise<void>((resolve) => {
    server.onclose = () => resolve();
  });

  const stop = (reason: string) => {
    if (proxy.isShutdown) return;
    log.info(`Shutting down (${reason})`);
    proxy.shutdown();
    server.close().catch((err: unknown) => {
      log.error(`Failed to close the MCP transport: ${errorMessage(err)}`);
    });
  };
  const onSigint = () => stop('SIGINT');
  const onSigterm = () => stop('SIGTERM');
  const onStdinEnd = () => stop('stdin closed');

  process.once('SIGINT', onSigint);
  process.once('SIGTERM', onSigterm);
  process.stdin.once('end', onStdinEnd);
  try {
    await server.connect(transport);
    log.info('MCP proxy started (stdio transport)');
    await closed;
  } finally {
    await proxy.close();
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
    process.stdin.off('end', onStdinEnd);
  }
}
