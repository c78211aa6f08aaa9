/**
 * Token endpoint requests (RFC 6749 §4.1.3 and §6) shared by the
 * authorization-code exchange and the refresh grant.
 */

import {
  OAuthErrorResponseSchema,
  OAuthTokensSchema,
  type OAuthTokens,
} from '@modelcontextprotocol/sdk/shared/auth.js';

import type { HttpClient } from '../shared/http.js';
import { readJsonBody } from '../shared/http.js';
import { secondsUntilExpiry } from './jwt.js';
import type { ClientRegistration, TokenSet } from './types.js';

/** Lifetime assumed when neither `expires_in` nor a JWT `exp` is available */
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3_600;

export const AGENT_NAME_HEADER = 'X-MCP-Agent-Name';

export type TokenEndpointResult =
  | { ok: true; tokens: OAuthTokens }
  | { ok: false; status: number; error?: string; description?: string };

export interface TokenRequest {
  http: HttpClient;
  endpoint: string;
  agentName: string;
  params: Record<string, string>;
  signal?: AbortSignal;
}

/** Add client authentication (`client_secret_post`) to the form. */
export function clientCredentials(registration: ClientRegistration): Record<string, string> {
  return registration.clientSecret
    ? { client_id: registration.clientId, client_secret: registration.clientSecret }
    : { client_id: registration.clientId };
}

/**
 * POST a form-encoded grant to the token endpoint.
 * Transport failures propagate as NetworkError; server answers are returned.
 */
export async function requestTokens(request: TokenRequest): Promise<TokenEndpointResult> {
  const response = await request.http.request(request.endpoint, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
      [AGENT_NAME_HEADER]: request.agentName,
    },
    body: new URLSearchParams(request.params).toString(),
    signal: request.signal,
  });
  const body = await readJsonBody(response);

  if (!response.ok) {
    const parsed = OAuthErrorResponseSchema.safeParse(body);
    return parsed.success
      ? { ok: false, status: response.status, error: parsed.data.error, description: parsed.data.error_description }
      : { ok: false, status: response.status };
  }

  const parsed = OAuthTokensSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, status: response.status, description: 'malformed token response' };
  }
  return { ok: true, tokens: parsed.data };
}

export function describeFailure(result: { status: number; error?: string; description?: string }): string {
  const detail = [result.error, result.description].filter(Boolean).join(': ');
  return detail ? `HTTP ${result.status} ${detail}` : `HTTP ${result.status}`;
}

/**
 * Build a TokenSet from a token response.
 *
 * A refresh response without `refresh_token` keeps the previous refresh
 * token; one that carries a new value replaces it.
 */
export function tokenSetFromResponse(
  tokens: OAuthTokens,
  agentName: string,
  now: number,
  previous?: TokenSet,
): TokenSet {
  const lifetime =
    tokens.expires_in ?? secondsUntilExpiry(tokens.access_token, now) ?? DEFAULT_TOKEN_LIFETIME_SECONDS;
  return {
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token ?? previous?.refreshToken,
    tokenType: tokens.token_type,
    expiresAt: now + lifetime * 1_000,
    scope: tokens.scope ?? previous?.scope,
    agentName,
  };
}
