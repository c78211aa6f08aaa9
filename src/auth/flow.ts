/**
 * OAuth 2.1 authorization-code flow with PKCE for a CLI agent.
 *
 *   Init ──▶ AwaitingCallback ──▶ CodeReceived ──▶ Exchanging ──▶ Complete
 *     │              │                  │               │
 *     └──────────────┴──────────────────┴───────────────┴──────▶ Failed
 *
 * Init binds the loopback listener, obtains a client registration and
 * builds the PKCE session.  The listener and the session live exactly as
 * long as one attempt.  A cached registration that the server no longer
 * accepts is discarded and the flow restarts once with a fresh one.
 */

import {
  AuthorizationDeniedError,
  AuthorizationTimeoutError,
  NetworkError,
  StateMismatchError,
  TokenExchangeError,
  errorMessage,
  isInvalidClient,
} from '../shared/errors.js';
import type { CallbackConfig } from '../shared/config.js';
import type { HttpClient } from '../shared/http.js';
import { createLogger, redact } from '../shared/logger.js';
import type { BrowserOpener } from './browser.js';
import { withCallbackListener, type CallbackListener } from './callback-listener.js';
import {
  createPkceSession,
  destroyPkceSession,
  isPkceSessionExpired,
  statesMatch,
  verifyPkceSession,
  type PkceSession,
} from './pkce.js';
import type { ClientRegistrar } from './registrar.js';
import { clientCredentials, describeFailure, requestTokens, tokenSetFromResponse } from './token-endpoint.js';
import type { TokenStore } from './token-store.js';
import type { ClientRegistration, TokenSet } from './types.js';

const log = createLogger('flow');

export type FlowState = 'Init' | 'AwaitingCallback' | 'CodeReceived' | 'Exchanging' | 'Complete' | 'Failed';

const TRANSITIONS: Record<FlowState, readonly FlowState[]> = {
  Init: ['AwaitingCallback', 'Failed'],
  AwaitingCallback: ['CodeReceived', 'Failed'],
  CodeReceived: ['Exchanging', 'Failed'],
  Exchanging: ['Complete', 'Failed'],
  Complete: [],
  Failed: [],
};

export interface AuthorizationFlowOptions {
  agentName: string;
  scopes: string[];
  authorizationEndpoint: string;
  tokenEndpoint: string;
  callback: CallbackConfig;
  registrar: ClientRegistrar;
  tokenStore: TokenStore;
  http: HttpClient;
  openBrowser: BrowserOpener;
  onStateChange?: (state: FlowState) => void;
  now?: () => number;
}

export function buildAuthorizationUrl(
  endpoint: string,
  registration: ClientRegistration,
  session: PkceSession,
  scopes: string[],
): string {
  const url = new URL(endpoint);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('client_id', registration.clientId);
  url.searchParams.set('redirect_uri', session.redirectUri);
  if (scopes.length > 0) url.searchParams.set('scope', scopes.join(' '));
  url.searchParams.set('state', session.state);
  url.searchParams.set('code_challenge', session.codeChallenge);
  url.searchParams.set('code_challenge_method', session.challengeMethod);
  return url.toString();
}

export class AuthorizationFlow {
  private current: FlowState = 'Init';
  private error: Error | null = null;
  private started = false;
  private readonly now: () => number;

  constructor(private readonly options: AuthorizationFlowOptions) {
    this.now = options.now ?? Date.now;
  }

  get state(): FlowState {
    return this.current;
  }

  /** The error that moved the flow to Failed */
  get failure(): Error | null {
    return this.error;
  }

  /**
   * Drive the flow to Complete and persist the resulting tokens.
   * A flow object runs once.
   */
  async run(signal?: AbortSignal): Promise<TokenSet> {
    if (this.started) throw new Error('An authorization flow can only run once');
    this.started = true;

    try {
      return await this.attempt(signal);
    } catch (err) {
      if (!(err instanceof ReusedClientRejected)) return this.fail(err);
      log.warn('The authorization server rejected the cached client registration; registering again');
      await this.options.registrar.discard(this.options.agentName);
      this.current = 'Init';
      this.options.onStateChange?.('Init');
      try {
        return await this.attempt(signal);
      } catch (retryErr) {
        return this.fail(retryErr instanceof ReusedClientRejected ? retryErr.rejection : retryErr);
      }
    }
  }

  private fail(err: unknown): never {
    const error = err instanceof Error ? err : new Error(String(err));
    this.error = error;
    if (this.current !== 'Failed') this.transition('Failed');
    log.debug(`Authorization failed: ${error.message}`);
    throw error;
  }

  private transition(next: FlowState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid authorization flow transition ${this.current} → ${next}`);
    }
    this.current = next;
    this.options.onStateChange?.(next);
  }

  private attempt(signal?: AbortSignal): Promise<TokenSet> {
    return withCallbackListener(this.options.callback, async (listener) => {
      const { registration, reused } = await this.options.registrar.resolve(
        this.options.agentName,
        listener.redirectUri,
        signal,
      );
      const session = createPkceSession(listener.redirectUri, this.options.callback.timeout, this.now());
      try {
        return await this.authorize(listener, registration, session, signal);
      } catch (err) {
        if (reused && isInvalidClient(err)) throw new ReusedClientRejected(err);
        throw err;
      } finally {
        destroyPkceSession(session);
      }
    });
  }

  private async authorize(
    listener: CallbackListener,
    registration: ClientRegistration,
    session: PkceSession,
    signal?: AbortSignal,
  ): Promise<TokenSet> {
    const url = buildAuthorizationUrl(this.options.authorizationEndpoint, registration, session, this.options.scopes);
    this.transition('AwaitingCallback');
    await this.launchBrowser(url);

    const params = await listener.waitForCallback(this.options.callback.timeout, signal);
    if (params.error) throw new AuthorizationDeniedError(params.error, params.errorDescription);

    this.transition('CodeReceived');
    if (!statesMatch(session.state, params.state)) throw new StateMismatchError();
    if (!params.code) throw new AuthorizationDeniedError('invalid_request', 'the callback carried no authorization code');
    if (isPkceSessionExpired(session, this.now())) throw new AuthorizationTimeoutError(this.options.callback.timeout);
    if (!verifyPkceSession(session)) throw new TokenExchangeError('PKCE verifier does not match its challenge');

    this.transition('Exchanging');
    log.debug(`Exchanging authorization code ${redact(params.code)}`);
    const tokens = await this.exchange(registration, session, params.code, signal);
    await this.options.tokenStore.save(tokens);
    this.transition('Complete');
    log.info(`Logged in as ${this.options.agentName}`);
    return tokens;
  }

  private async launchBrowser(url: string): Promise<void> {
    log.info(`Opening the browser to authorize ${this.options.agentName}`);
    try {
      await this.options.openBrowser(url);
    } catch (err) {
      log.warn(`Could not open a browser (${errorMessage(err)}). Open this URL to continue:\n${url}`);
    }
  }

  private async exchange(
    registration: ClientRegistration,
    session: PkceSession,
    code: string,
    signal?: AbortSignal,
  ): Promise<TokenSet> {
    const result = await requestTokens({
      http: this.options.http,
      endpoint: this.options.tokenEndpoint,
      agentName: this.options.agentName,
      params: {
        grant_type: 'authorization_code',
        code,
        redirect_uri: session.redirectUri,
        code_verifier: session.codeVerifier,
        ...clientCredentials(registration),
      },
      signal,
    }).catch((err: unknown) => {
      if (err instanceof NetworkError) {
        throw new TokenExchangeError(`Token exchange failed: ${err.message}`, { cause: err });
      }
      throw err;
    });

    if (!result.ok) {
      throw new TokenExchangeError(`Token exchange failed: ${describeFailure(result)}`, {
        status: result.status,
        oauthError: result.error,
      });
    }
    return tokenSetFromResponse(result.tokens, this.options.agentName, this.now());
  }
}

/** Internal signal: a reused registration was refused, so the flow may restart. */
class ReusedClientRejected extends Error {
  constructor(readonly rejection: unknown) {
    super(errorMessage(rejection));
  }
}
