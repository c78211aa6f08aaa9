/**
 * CLI command implementations.  Each command receives its collaborators
 * explicitly so tests can run them against a temp config directory and a
 * fake browser.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import type { BrowserOpener } from '../auth/browser.js';
import {
  createAuthComponents,
  loadLegacyToken,
  resolveCredential,
  type Credential,
} from '../auth/credentials.js';
import { AuthorizationFlow } from '../auth/flow.js';
import { decodeJwtClaims } from '../auth/jwt.js';
import { registerPublicKey } from '../auth/key-registration.js';
import { runStdioServer } from '../mcp/server.js';
import { EncryptingProxy } from '../proxy/encrypting-proxy.js';
import { HttpRelayClient } from '../proxy/relay-client.js';
import { resolveEndpoint } from '../shared/config.js';
import type { AppContext } from '../shared/context.js';
import { ensureKeyPair, loadKeyPair, type AgentKeyPair } from '../shared/crypto/index.js';
import { EncryptionError, ReauthenticationRequiredError, RelayError } from '../shared/errors.js';
import { removeFile } from '../shared/fs.js';

export interface CommandEnv {
  ctx: AppContext;
  /** Where user-facing output goes (stdout for every command but `proxy`) */
  out: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
}

export interface LoginOptions {
  force?: boolean;
  openBrowser: BrowserOpener;
  signal?: AbortSignal;
}

/** The snippet users paste into their MCP client configuration. */
export function mcpClientSnippet(agentName: string): string {
  const config = { mcpServers: { 'hitl-agent': { command: 'hitl-agent', args: ['proxy'], env: { HITL_AGENT_NAME: agentName } } } };
  return JSON.stringify(config, null, 2);
}

/**
 * Load the keypair, creating it on first use, and publish the public key
 * whenever a credential is at hand, so running `keys` again retries a
 * publication that failed during login.
 */
async function keyPairFor(
  { ctx, out }: CommandEnv,
  credential: Credential | null,
): Promise<AgentKeyPair> {
  const existing = await loadKeyPair(ctx.paths.keyFile);
  const keyPair = existing ?? (await ensureKeyPair(ctx.paths.keyFile));
  if (!existing) out(`✓ Generated agent key pair (fingerprint: ${keyPair.fingerprint})`);

  if (credential) {
    const registered = await registerPublicKey({
      http: ctx.http,
      endpoint: resolveEndpoint(ctx.config, 'keyRegistration'),
      credential,
      keyPair,
      agentName: ctx.config.agentName,
    });
    out(registered ? '✓ Public key registered with the server' : '⚠️  Public key not registered; run `hitl-agent keys` later');
  }
  return keyPair;
}

// ── login ──────────────────────────────────────────────────────────────────

export async function login(command: CommandEnv, options: LoginOptions): Promise<void> {
  const { ctx, out } = command;
  const { registrar, tokenStore } = createAuthComponents(ctx, command.now);

  const current = await tokenStore.load();
  if (!options.force && current && current.agentName === ctx.config.agentName) {
    const usable = !tokenStore.isExpired(current) || current.refreshToken !== undefined;
    if (usable) {
      out(`✓ Already logged in as ${current.agentName} (use --force to log in again)`);
      return;
    }
  }

  out(`Logging in to ${ctx.config.serverUrl} as ${ctx.config.agentName}...`);
  const flow = new AuthorizationFlow({
    agentName: ctx.config.agentName,
    scopes: ctx.config.scopes,
    authorizationEndpoint: resolveEndpoint(ctx.config, 'authorization'),
    tokenEndpoint: resolveEndpoint(ctx.config, 'token'),
    callback: ctx.config.callback,
    registrar,
    tokenStore,
    http: ctx.http,
    openBrowser: options.openBrowser,
    now: command.now,
  });
  const tokens = await flow.run(options.signal);
  out(`✓ Logged in as ${tokens.agentName}`);

  await keyPairFor(command, { kind: 'oauth', store: tokenStore });

  out('\nAdd the proxy to your MCP client configuration:\n');
  out(mcpClientSnippet(ctx.config.agentName));
}

// ── logout ─────────────────────────────────────────────────────────────────

export async function logout({ ctx, out, now }: CommandEnv, options: { forgetClient?: boolean } = {}): Promise<void> {
  const { registrar, tokenStore } = createAuthComponents(ctx, now);
  const hadTokens = (await tokenStore.load()) !== null;
  await tokenStore.clear();
  const hadLegacy = await removeFile(ctx.paths.legacyTokenFile);
  out(hadTokens || hadLegacy ? '✓ Logged out' : 'Not logged in');

  if (options.forgetClient) {
    await registrar.clear();
    out('✓ Forgot the cached client registration');
  }
}

// ── status ─────────────────────────────────────────────────────────────────

function describeExpiry(expiresAt: number, now: number): string {
  const when = new Date(expiresAt).toISOString();
  return expiresAt > now ? `expires ${when}` : `expired ${when}`;
}

export async function status({ ctx, out, env, now = Date.now }: CommandEnv): Promise<void> {
  const { tokenStore } = createAuthComponents(ctx, now);
  out(`Server:      ${ctx.config.serverUrl}`);
  out(`Agent name:  ${ctx.config.agentName}`);

  let credential: Credential | null = null;
  try {
    credential = await resolveCredential({ tokenStore, legacyTokenFile: ctx.paths.legacyTokenFile, env, now });
  } catch (err) {
    if (!(err instanceof ReauthenticationRequiredError)) throw err;
    out(`Credential:  none (${err.message})`);
  }

  if (credential?.kind === 'apiKey') {
    out('Credential:  API key (HITL_API_KEY)');
  } else if (credential?.kind === 'oauth') {
    const tokens = await tokenStore.load();
    const detail = tokens
      ? `${describeExpiry(tokens.expiresAt, now())}${tokens.refreshToken ? ', refreshable' : ''}`
      : 'unavailable';
    out(`Credential:  OAuth token for ${tokens?.agentName ?? ctx.config.agentName} (${detail})`);
  } else if (credential?.kind === 'jwt') {
    const token = await loadLegacyToken(ctx.paths.legacyTokenFile);
    const exp = token ? decodeJwtClaims(token)?.exp : undefined;
    out(`Credential:  legacy bearer token${typeof exp === 'number' ? ` (${describeExpiry(exp * 1000, now())})` : ''}`);
  }

  const keyPair = await loadKeyPair(ctx.paths.keyFile);
  out(`Agent key:   ${keyPair ? keyPair.fingerprint : 'none (run `hitl-agent keys`)'}`);
}

// ── keys ───────────────────────────────────────────────────────────────────

export async function keys(command: CommandEnv): Promise<void> {
  const { ctx, out, env, now } = command;
  const { tokenStore } = createAuthComponents(ctx, now);
  const credential = await resolveCredential({
    tokenStore,
    legacyTokenFile: ctx.paths.legacyTokenFile,
    env,
    now,
  }).catch((err: unknown) => {
    if (err instanceof ReauthenticationRequiredError) return null;
    throw err;
  });

  const keyPair = await keyPairFor(command, credential);
  out(`Public key:  ${keyPair.publicKeyBase64}`);
  out(`Fingerprint: ${keyPair.fingerprint}`);
  out(`Key file:    ${ctx.paths.keyFile}`);
}

// ── proxy ──────────────────────────────────────────────────────────────────

export interface ProxyOptions {
  relayUrl?: string;
  version?: string;
}

/** Build the encrypting proxy for the current credential and keypair. */
export async function createProxy(
  { ctx, env, now }: CommandEnv,
  { relayUrl, version }: ProxyOptions = {},
): Promise<EncryptingProxy> {
  const { tokenStore } = createAuthComponents(ctx, now);
  const credential = await resolveCredential({ tokenStore, legacyTokenFile: ctx.paths.legacyTokenFile, env, now });

  const keyPair = await loadKeyPair(ctx.paths.keyFile);
  if (!keyPair) throw new EncryptionError('No agent key pair found; run `hitl-agent login` or `hitl-agent keys`');

  const relay = new HttpRelayClient({
    http: ctx.relayHttp,
    relayUrl: relayUrl ?? resolveEndpoint(ctx.config, 'relayMcp'),
    deviceKeysUrl: resolveEndpoint(ctx.config, 'devicePublicKeys'),
    credential,
    agentName: ctx.config.agentName,
    requestTimeout: ctx.config.requestTimeout,
    version,
  });
  return new EncryptingProxy({
    relay,
    keyPair,
    sensitiveTools: ctx.config.sensitiveTools,
    encryptedSuffix: ctx.config.encryptedSuffix,
    exchangeTimeout: ctx.config.exchangeTimeout,
    now,
  });
}

export async function proxy(command: CommandEnv, options: ProxyOptions & { version: string }): Promise<void> {
  const encryptingProxy = await createProxy(command, options);
  await runStdioServer(encryptingProxy, { version: options.version });
}

// ── request / notify / notify-completion ───────────────────────────────────

export interface HumanRequest {
  prompt: string;
  choices?: string[];
  placeholderText?: string;
}

function resultText(result: CallToolResult): string {
  return result.content.flatMap((item) => (item.type === 'text' ? [item.text] : [])).join('\n');
}

/** One call through the encrypting proxy; an error result fails the command. */
async function callThroughProxy(command: CommandEnv, toolName: string, args: Record<string, unknown>): Promise<string> {
  const encryptingProxy = await createProxy(command);
  try {
    const { result } = await encryptingProxy.callTool(toolName, args);
    const text = resultText(result);
    if (result.isError) throw new RelayError(`${toolName} failed: ${text || 'no details'}`);
    return text;
  } finally {
    await encryptingProxy.close();
  }
}

export async function request(command: CommandEnv, input: HumanRequest): Promise<void> {
  const { out } = command;
  const choices = input.choices ?? [];
  out(`Sending request: ${input.prompt}`);
  if (choices.length > 0) out(`Choices: ${choices.join(', ')}`);
  if (input.placeholderText) out(`Placeholder: ${input.placeholderText}`);
  out('Waiting for the human response...');

  const reply = await callThroughProxy(command, 'request_human_input', {
    prompt: input.prompt,
    ...(choices.length > 0 && { choices }),
    ...(input.placeholderText ? { placeholder_text: input.placeholderText } : {}),
  });
  out(`✓ Human response: ${reply}`);
}

export async function notify(command: CommandEnv, message: string): Promise<void> {
  command.out(`Sending notification: ${message}`);
  const acknowledgement = await callThroughProxy(command, 'notify_human', { message });
  command.out(`✓ ${acknowledgement}`);
}

export async function notifyCompletion(command: CommandEnv, summary: string): Promise<void> {
  command.out(`Task completed: ${summary}`);
  command.out('Waiting for the human response...');
  const reply = await callThroughProxy(command, 'notify_human_completion', { summary });
  command.out(`✓ Human response: ${reply}`);
}
