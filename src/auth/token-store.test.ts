import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { TokenStore, isGrantRejection } from './token-store.js';
import type { ClientRegistration, TokenSet } from './types.js';
import { HttpClient, type FetchLike } from '../shared/http.js';
import { NetworkError, ReauthenticationRequiredError, TokenRefreshError } from '../shared/errors.js';

const NOW = 1_700_000_000_000;
const TOKEN_ENDPOINT = 'https://auth.test/api/v1/oauth/token';

const REGISTRATION: ClientRegistration = {
  clientId: 'client-1',
  clientSecret: 'test-secret',
  redirectUri: 'http://127.0.0.1:50123/callback',
  issuer: 'https://auth.test',
  agentName: 'build-bot',
  registeredAt: NOW - 86_400_000,
};

function tokenSet(overrides: Partial<TokenSet> = {}): TokenSet {
  return {
    accessToken: 'access-old',
    refreshToken: 'refresh-old',
    tokenType: 'Bearer',
    expiresAt: NOW + 3_600_000,
    scope: 'openid profile',
    agentName: 'build-bot',
    ...overrides,
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('TokenStore', () => {
  let tmpDir: string;
  let file: string;
  let fetchMock: Mock<FetchLike>;
  let store: TokenStore;

  function createStore(): TokenStore {
    return new TokenStore({
      file,
      tokenEndpoint: TOKEN_ENDPOINT,
      http: new HttpClient({ fetch: fetchMock, timeout: 1_000, retry: { retries: 1, baseDelay: 1, maxDelay: 1 } }),
      registration: async (agentName) => (agentName === REGISTRATION.agentName ? REGISTRATION : null),
      skew: 60_000,
      now: () => NOW,
    });
  }

  function writeTokens(tokens: TokenSet): void {
    fs.writeFileSync(file, JSON.stringify(tokens), { mode: 0o600 });
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hitl-tokens-test-'));
    file = path.join(tmpDir, 'tokens.json');
    fetchMock = vi.fn<FetchLike>();
    store = createStore();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('load / save / clear', () => {
    it('should return null when nothing is stored', async () => {
      expect(await store.load()).toBeNull();
    });

    it('should persist token sets with 0600 permissions', async () => {
      await store.save(tokenSet());

      expect(await createStore().load()).toEqual(tokenSet());
      expect(fs.statSync(file).mode & 0o777).toBe(0o600);
    });

    it('should delete the file on clear', async () => {
      await store.save(tokenSet());
      await store.clear();

      expect(fs.existsSync(file)).toBe(false);
      expect(await store.load()).toBeNull();
    });
  });

  describe('isExpired', () => {
    it('should honour the skew', () => {
      const tokens = tokenSet({ expiresAt: NOW + 60_000 });
      expect(store.isExpired(tokens)).toBe(true);
      expect(store.isExpired(tokens, 59_999)).toBe(false);
      expect(store.isExpired(tokenSet({ expiresAt: NOW + 60_001 }))).toBe(false);
    });
  });

  describe('getValid', () => {
    it('should return a valid token without contacting the server', async () => {
      writeTokens(tokenSet());

      expect((await store.getValid()).accessToken).toBe('access-old');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should raise ReauthenticationRequired when nothing is stored', async () => {
      await expect(store.getValid()).rejects.toThrow(ReauthenticationRequiredError);
    });

    it('should refresh an expired token with the refresh grant', async () => {
      writeTokens(tokenSet({ expiresAt: NOW - 1 }));
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ access_token: 'access-new', token_type: 'Bearer', expires_in: 3600 }),
      );

      const refreshed = await store.getValid();

      expect(refreshed.accessToken).toBe('access-new');
      expect(refreshed.expiresAt).toBe(NOW + 3_600_000);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(TOKEN_ENDPOINT);
      expect(init?.headers).toMatchObject({
        'Content-Type': 'application/x-www-form-urlencoded',
        'X-MCP-Agent-Name': 'build-bot',
      });
      expect(Object.fromEntries(new URLSearchParams(String(init?.body)))).toEqual({
        grant_type: 'refresh_token',
        refresh_token: 'refresh-old',
        client_id: 'client-1',
        client_secret: 'test-secret',
      });
    });

    it('should keep the previous refresh token when the server does not rotate it', async () => {
      writeTokens(tokenSet({ expiresAt: NOW - 1 }));
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ access_token: 'access-new', token_type: 'Bearer', expires_in: 3600 }),
      );

      await store.getValid();

      const stored = JSON.parse(fs.readFileSync(file, 'utf-8'));
      expect(stored.refreshToken).toBe('refresh-old');
      expect(stored.scope).toBe('openid profile');
    });

    it('should replace the refresh token when the server rotates it', async () => {
      writeTokens(tokenSet({ expiresAt: NOW - 1 }));
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ access_token: 'access-new', token_type: 'Bearer', expires_in: 3600, refresh_token: 'refresh-new' }),
      );

      await store.getValid();

      const stored = JSON.parse(fs.readFileSync(file, 'utf-8'));
      expect(stored.refreshToken).toBe('refresh-new');
    });

    it('should refresh a token that expires within the skew', async () => {
      writeTokens(tokenSet({ expiresAt: NOW + 30_000 }));
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ access_token: 'access-new', token_type: 'Bearer', expires_in: 3600 }),
      );

      expect((await store.getValid()).accessToken).toBe('access-new');
    });

    it('should issue exactly one refresh for concurrent callers', async () => {
      writeTokens(tokenSet({ expiresAt: NOW - 1 }));
      fetchMock.mockImplementation(async () =>
        jsonResponse({ access_token: 'access-new', token_type: 'Bearer', expires_in: 3600 }),
      );

      const results = await Promise.all(Array.from({ length: 5 }, () => store.getValid()));

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(results.map((t) => t.accessToken)).toEqual(Array(5).fill('access-new'));
    });

    it('should purge the store and require login when the refresh token is rejected', async () => {
      writeTokens(tokenSet({ expiresAt: NOW - 1 }));
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ error: 'invalid_grant', error_description: 'refresh token expired' }, 400),
      );

      const attempt = store.getValid();

      await expect(attempt).rejects.toThrow(ReauthenticationRequiredError);
      await expect(attempt).rejects.toThrow('Token refresh rejected: HTTP 400 invalid_grant: refresh token expired');
      expect(fs.existsSync(file)).toBe(false);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should require login without calling the server when no refresh token exists', async () => {
      writeTokens(tokenSet({ expiresAt: NOW - 1, refreshToken: undefined }));

      await expect(store.getValid()).rejects.toThrow(ReauthenticationRequiredError);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(fs.existsSync(file)).toBe(false);
    });

    it('should keep the tokens when the token endpoint is unreachable', async () => {
      writeTokens(tokenSet({ expiresAt: NOW - 1 }));
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(store.getValid()).rejects.toThrow(NetworkError);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(fs.existsSync(file)).toBe(true);
    });

    it('should keep the tokens when the token endpoint fails with 500', async () => {
      writeTokens(tokenSet({ expiresAt: NOW - 1 }));
      fetchMock.mockResolvedValue(jsonResponse({ error: 'server_error' }, 500));

      await expect(store.getValid()).rejects.toThrow('Token refresh did not complete: HTTP 500 server_error');
      expect(fs.existsSync(file)).toBe(true);
    });

    it('should keep the tokens when the token endpoint keeps answering 429', async () => {
      writeTokens(tokenSet({ expiresAt: NOW - 1 }));
      fetchMock.mockImplementation(async () => jsonResponse({ error: 'slow_down' }, 429));

      const attempt = store.getValid();

      await expect(attempt).rejects.toBeInstanceOf(NetworkError);
      await expect(attempt).rejects.toThrow('Token refresh did not complete: HTTP 429 slow_down');
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(fs.existsSync(file)).toBe(true);
    });

    it('should keep the tokens when the refresh answer is unusable', async () => {
      writeTokens(tokenSet({ expiresAt: NOW - 1 }));
      fetchMock.mockResolvedValueOnce(jsonResponse({ token_type: 'Bearer' }));

      await expect(store.getValid()).rejects.toThrow('Token refresh did not complete: HTTP 200 malformed token response');
      expect(fs.existsSync(file)).toBe(true);
    });

    it('should purge the store when a non-400 answer names a dead grant', async () => {
      writeTokens(tokenSet({ expiresAt: NOW - 1 }));
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'invalid_grant' }, 403));

      await expect(store.getValid()).rejects.toThrow(ReauthenticationRequiredError);
      expect(fs.existsSync(file)).toBe(false);
    });
  });

  describe('isGrantRejection', () => {
    it('should only treat rejections of the grant itself as final', () => {
      expect(isGrantRejection({ status: 400 })).toBe(true);
      expect(isGrantRejection({ status: 401, error: 'invalid_client' })).toBe(true);
      expect(isGrantRejection({ status: 403, error: 'invalid_grant' })).toBe(true);
      expect(isGrantRejection({ status: 429, error: 'slow_down' })).toBe(false);
      expect(isGrantRejection({ status: 200 })).toBe(false);
      expect(isGrantRejection({ status: 503 })).toBe(false);
    });
  });

  describe('refresh', () => {
    it('should raise TokenRefreshError without a client registration', async () => {
      const tokens = tokenSet({ agentName: 'unknown-agent' });
      await store.save(tokens);

      await expect(store.refresh(tokens)).rejects.toThrow(TokenRefreshError);
      expect(fs.existsSync(file)).toBe(false);
    });
  });

  describe('forceRefresh', () => {
    it('should refresh even when the token has not expired', async () => {
      writeTokens(tokenSet());
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ access_token: 'access-forced', token_type: 'Bearer', expires_in: 600 }),
      );

      expect((await store.forceRefresh()).accessToken).toBe('access-forced');
      expect((await store.getValid()).accessToken).toBe('access-forced');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});
