/**
 * Token persistence and lifecycle.
 *
 * tokens.json holds the current TokenSet (0600, atomic writes).  `getValid()`
 * hands out an access token that is good for at least the expiry skew,
 * refreshing it when needed.  Concurrent callers share one in-flight
 * resolution, so an expired token triggers exactly one refresh request.
 *
 * Refresh outcomes:
 *   - server rejects the grant      → store cleared, ReauthenticationRequired
 *     (HTTP 400/401, or an OAuth error naming the grant or client)
 *   - expired without refresh token → store cleared, ReauthenticationRequired
 *   - anything else (unreachable, 429, 5xx, unusable body)
 *                                   → NetworkError, store kept for a later retry
 */

import { NetworkError, ReauthenticationRequiredError, TokenRefreshError } from '../shared/errors.js';
import { readJsonFile, removeFile, writeJsonFileAtomic } from '../shared/fs.js';
import type { HttpClient } from '../shared/http.js';
import { createLogger } from '../shared/logger.js';
import { SingleFlight } from '../shared/single-flight.js';
import { clientCredentials, describeFailure, requestTokens, tokenSetFromResponse } from './token-endpoint.js';
import { TokenSetSchema, type ClientRegistration, type TokenSet } from './types.js';

const log = createLogger('token-store');

const REJECTING_ERRORS = new Set(['invalid_grant', 'invalid_client', 'unauthorized_client']);

/** Whether a failed refresh means the stored grant is dead, not just unlucky. */
export function isGrantRejection(result: { status: number; error?: string }): boolean {
  if (result.status === 400 || result.status === 401) return true;
  return result.error !== undefined && REJECTING_ERRORS.has(result.error);
}

export interface TokenStoreOptions {
  /** Path of tokens.json */
  file: string;
  tokenEndpoint: string;
  http: HttpClient;
  /** Looks up the client registration used for refresh grants */
  registration: (agentName: string) => Promise<ClientRegistration | null>;
  /** Treat tokens as expired this long before their expiry (ms) */
  skew: number;
  now?: () => number;
}

export class TokenStore {
  private cached: TokenSet | null = null;
  private readonly flight = new SingleFlight<TokenSet>();
  private readonly now: () => number;

  constructor(private readonly options: TokenStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  async load(): Promise<TokenSet | null> {
    this.cached = await readJsonFile(this.options.file, TokenSetSchema);
    return this.cached;
  }

  async save(tokens: TokenSet): Promise<void> {
    await writeJsonFileAtomic(this.options.file, tokens);
    this.cached = tokens;
  }

  async clear(): Promise<void> {
    this.cached = null;
    if (await removeFile(this.options.file)) log.info('Stored tokens removed');
  }

  isExpired(tokens: TokenSet, skew = this.options.skew, now = this.now()): boolean {
    return now >= tokens.expiresAt - skew;
  }

  /**
   * Exchange the refresh token for a new token set and persist it.
   *
   * @throws TokenRefreshError when the server rejects the grant (the store is cleared)
   * @throws NetworkError for any other failure (the store is kept)
   */
  async refresh(tokens: TokenSet): Promise<TokenSet> {
    if (!tokens.refreshToken) {
      await this.clear();
      throw new TokenRefreshError('No refresh token available');
    }

    const registration = await this.options.registration(tokens.agentName);
    if (!registration) {
      await this.clear();
      throw new TokenRefreshError(`No client registration found for ${tokens.agentName}`);
    }

    const result = await requestTokens({
      http: this.options.http,
      endpoint: this.options.tokenEndpoint,
      agentName: tokens.agentName,
      params: {
        grant_type: 'refresh_token',
        refresh_token: tokens.refreshToken,
        ...clientCredentials(registration),
      },
    });

    if (!result.ok) {
      if (!isGrantRejection(result)) {
        throw new NetworkError(`Token refresh did not complete: ${describeFailure(result)}`);
      }
      await this.clear();
      throw new TokenRefreshError(`Token refresh rejected: ${describeFailure(result)}`, {
        status: result.status,
        oauthError: result.error,
      });
    }

    const refreshed = tokenSetFromResponse(result.tokens, tokens.agentName, this.now(), tokens);
    await this.save(refreshed);
    log.info(
      result.tokens.refresh_token ? 'Access token refreshed (refresh token rotated)' : 'Access token refreshed',
    );
    return refreshed;
  }

  /**
   * Return a token set that stays valid for at least the expiry skew.
   *
   * @throws ReauthenticationRequiredError when no usable tokens remain
   * @throws NetworkError when a needed refresh could not reach the server
   */
  async getValid(): Promise<TokenSet> {
    if (this.cached && !this.isExpired(this.cached)) return this.cached;
    return this.flight.run(() => this.resolveValid(false));
  }

  /** Refresh even if the current token looks valid (e.g. the relay answered 401). */
  async forceRefresh(): Promise<TokenSet> {
    return this.flight.run(() => this.resolveValid(true));
  }

  private async resolveValid(force: boolean): Promise<TokenSet> {
    const current = await this.load();
    if (!current) throw new ReauthenticationRequiredError();
    if (!force && !this.isExpired(current)) return current;

    if (!current.refreshToken) {
      await this.clear();
      throw new ReauthenticationRequiredError('Access token expired and no refresh token is available; run `hitl-agent login`');
    }

    try {
      return await this.refresh(current);
    } catch (err) {
      if (err instanceof TokenRefreshError) {
        throw new ReauthenticationRequiredError(`${err.message}; run \`hitl-agent login\``, { cause: err });
      }
      throw err;
    }
  }
}
