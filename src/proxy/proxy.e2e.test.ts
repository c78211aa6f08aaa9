/**
 * The proxy, relay client and token store wired together against an
 * in-process fake of the backend (token endpoint, device keys and relay,
 * with the paired device answering sealed prompts).
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { EncryptingProxy } from './encrypting-proxy.js';
import { HttpRelayClient } from './relay-client.js';
import { TokenStore } from '../auth/token-store.js';
import { defaultConfig } from '../shared/config.js';
import { generateKeyPair, openJSON, sealText } from '../shared/crypto/index.js';
import { ReauthenticationRequiredError } from '../shared/errors.js';
import { HttpClient, type FetchLike } from '../shared/http.js';
import { FakeRelay } from '../testing/fake-relay.js';

const SERVER = 'https://hitl.test';
const TOKEN_URL = `${SERVER}/api/v1/oauth/token`;
const RELAY_URL = `${SERVER}/mcp-server/mcp/`;
const KEYS_URL = `${SERVER}/api/v1/devices/public-keys`;

const agent = generateKeyPair();
const device = generateKeyPair();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/** The relay, with the paired device opening each sealed prompt and approving it. */
function deviceRelay(): FakeRelay {
  return new FakeRelay({
    onCall: async (_name, args) => {
      const payload = typeof args.encrypted_payload === 'string' ? args.encrypted_payload : '';
      const sealed = openJSON(payload, device.privateKey, { expectedSenders: [agent.publicKeyBase64] });
      const prompt = typeof sealed === 'object' && sealed !== null && 'prompt' in sealed ? String(sealed.prompt) : '';
      return { content: [{ type: 'text', text: sealText(`Approved: ${prompt}`, agent.publicKey, device) }] };
    },
  });
}

describe('encrypting proxy end to end', () => {
  let tmpDir: string;
  let tokensFile: string;
  let fetchMock: Mock<FetchLike>;
  let tokenReply: () => Response;
  let relay: FakeRelay;
  let proxy: EncryptingProxy;

  const tokenCalls = () => fetchMock.mock.calls.filter(([url]) => String(url) === TOKEN_URL);
  const relayCalls = () =>
    relay.toolCalls.map((rpc) => ({ tool: rpc.params.name, authorization: rpc.headers.authorization }));

  /** The backend: refreshes tokens, lists the device key and relays to the device. */
  const backend: FetchLike = async (input, init) => {
    const url = String(input);
    if (url === TOKEN_URL) return tokenReply();
    if (url === KEYS_URL) return jsonResponse({ public_keys: [device.publicKeyBase64] });
    return relay.handle(init);
  };

  function storeTokens(refreshToken: string): void {
    fs.writeFileSync(
      tokensFile,
      JSON.stringify({
        accessToken: 'access-expired',
        refreshToken,
        tokenType: 'Bearer',
        expiresAt: Date.now() - 1_000,
        agentName: 'build-bot',
      }),
      { mode: 0o600 },
    );
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hitl-e2e-test-'));
    tokensFile = path.join(tmpDir, 'tokens.json');
    relay = deviceRelay();
    fetchMock = vi.fn<FetchLike>(backend);
    const http = new HttpClient({ fetch: fetchMock, timeout: 1_000, retry: { retries: 0, baseDelay: 1, maxDelay: 1 } });
    const store = new TokenStore({
      file: tokensFile,
      tokenEndpoint: TOKEN_URL,
      http,
      registration: async () => ({
        clientId: 'client-1',
        redirectUri: 'http://127.0.0.1:1/callback',
        issuer: SERVER,
        agentName: 'build-bot',
        registeredAt: 0,
      }),
      skew: 60_000,
    });
    const relayClient = new HttpRelayClient({
      http,
      relayUrl: RELAY_URL,
      deviceKeysUrl: KEYS_URL,
      credential: { kind: 'oauth', store },
      agentName: 'build-bot',
      requestTimeout: 5_000,
    });
    const config = defaultConfig();
    proxy = new EncryptingProxy({
      relay: relayClient,
      keyPair: agent,
      sensitiveTools: config.sensitiveTools,
      encryptedSuffix: config.encryptedSuffix,
      exchangeTimeout: 5_000,
    });
  });

  afterEach(async () => {
    await proxy.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should refresh an expired access token once and return the decrypted reply', async () => {
    storeTokens('refresh-1');
    tokenReply = () => jsonResponse({ access_token: 'access-new', token_type: 'Bearer', expires_in: 3600 });

    const outcome = await proxy.callTool('request_human_input', { prompt: 'Deploy to staging?' });

    expect(tokenCalls()).toHaveLength(1);
    expect(outcome.result.content).toEqual([{ type: 'text', text: 'Approved: Deploy to staging?' }]);
    expect(relayCalls()).toEqual([{ tool: 'request_human_input_e2ee', authorization: 'Bearer access-new' }]);
  });

  it('should purge the store and require login when the refresh token is rejected', async () => {
    storeTokens('refresh-expired');
    tokenReply = () => jsonResponse({ error: 'invalid_grant', error_description: 'refresh token expired' }, 400);

    await expect(proxy.callTool('request_human_input', { prompt: 'Deploy?' })).rejects.toBeInstanceOf(
      ReauthenticationRequiredError,
    );

    expect(tokenCalls()).toHaveLength(1);
    expect(relay.rpcs).toEqual([]);
    expect(fs.existsSync(tokensFile)).toBe(false);
  });
});
