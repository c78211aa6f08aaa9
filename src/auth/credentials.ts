/**
 * How the agent authenticates to the backend.
 *
 * A session resolves its credential once and then uses it through
 * `credentialHeaders()` and `renewCredential()` without caring which kind
 * it holds:
 *
 *   HITL_API_KEY set          → apiKey  (X-API-Key header, cannot be renewed)
 *   tokens.json present       → oauth   (bearer from the token store, refreshable)
 *   legacy token.json present → jwt     (bearer, cannot be renewed)
 *   otherwise                 → ReauthenticationRequired
 */

import { z } from 'zod';

import { issuerOf, resolveEndpoint } from '../shared/config.js';
import type { AppContext } from '../shared/context.js';
import { ReauthenticationRequiredError } from '../shared/errors.js';
import { readJsonFile } from '../shared/fs.js';
import { createLogger, redact } from '../shared/logger.js';
import { agentIdFromToken, secondsUntilExpiry } from './jwt.js';
import { ClientRegistrar } from './registrar.js';
import { TokenStore } from './token-store.js';

const log = createLogger('credentials');

export type Credential =
  | { kind: 'oauth'; store: TokenStore }
  | { kind: 'jwt'; token: string }
  | { kind: 'apiKey'; apiKey: string };

export type CredentialKind = Credential['kind'];

export const API_KEY_HEADER = 'X-API-Key';

/** token.json written by agents that predate the OAuth login */
const LegacyTokenSchema = z.object({ access_token: z.string().min(1) });

// ── Construction ────────────────────────────────────────────────────────

export interface AuthComponents {
  registrar: ClientRegistrar;
  tokenStore: TokenStore;
}

/** Wire the registrar and token store to the context's files and endpoints. */
export function createAuthComponents(ctx: AppContext, now?: () => number): AuthComponents {
  const registrar = new ClientRegistrar({
    file: ctx.paths.clientsFile,
    registrationEndpoint: resolveEndpoint(ctx.config, 'registration'),
    issuer: issuerOf(ctx.config),
    scopes: ctx.config.scopes,
    http: ctx.http,
    now,
  });
  const tokenStore = new TokenStore({
    file: ctx.paths.tokensFile,
    tokenEndpoint: resolveEndpoint(ctx.config, 'token'),
    http: ctx.http,
    registration: (agentName) => registrar.load(agentName),
    skew: ctx.config.tokenExpirySkew,
    now,
  });
  return { registrar, tokenStore };
}

// ── Resolution ──────────────────────────────────────────────────────────

export interface ResolveCredentialOptions {
  tokenStore: TokenStore;
  legacyTokenFile: string;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
}

export async function loadLegacyToken(file: string): Promise<string | null> {
  const legacy = await readJsonFile(file, LegacyTokenSchema);
  return legacy?.access_token ?? null;
}

/**
 * Pick the credential for this session.
 *
 * @throws ReauthenticationRequiredError when no credential is available
 */
export async function resolveCredential(options: ResolveCredentialOptions): Promise<Credential> {
  const env = options.env ?? process.env;
  const apiKey = env.HITL_API_KEY?.trim();
  if (apiKey) return { kind: 'apiKey', apiKey };

  if (await options.tokenStore.load()) return { kind: 'oauth', store: options.tokenStore };

  const legacy = await loadLegacyToken(options.legacyTokenFile);
  if (legacy) {
    if (secondsUntilExpiry(legacy, (options.now ?? Date.now)()) === 0) {
      throw new ReauthenticationRequiredError(
        `The token in ${options.legacyTokenFile} has expired; run \`hitl-agent login\``,
      );
    }
    log.debug(`Using legacy bearer token ${redact(legacy)} from ${options.legacyTokenFile}`);
    return { kind: 'jwt', token: legacy };
  }

  throw new ReauthenticationRequiredError('Not logged in: run `hitl-agent login` or set HITL_API_KEY');
}

// ── Use ─────────────────────────────────────────────────────────────────

function bearer(tokenType: string, token: string): string {
  const scheme = tokenType.toLowerCase() === 'bearer' ? 'Bearer' : tokenType;
  return `${scheme} ${token}`;
}

/** Request headers that authenticate one call. */
export async function credentialHeaders(credential: Credential): Promise<Record<string, string>> {
  switch (credential.kind) {
    case 'oauth': {
      const tokens = await credential.store.getValid();
      return { Authorization: bearer(tokens.tokenType, tokens.accessToken) };
    }
    case 'jwt':
      return { Authorization: bearer('Bearer', credential.token) };
    case 'apiKey':
      return { [API_KEY_HEADER]: credential.apiKey };
  }
}

/**
 * React to the server refusing the credential (HTTP 401).
 * Only OAuth credentials can recover; the others need the user.
 */
export async function renewCredential(credential: Credential): Promise<void> {
  switch (credential.kind) {
    case 'oauth':
      await credential.store.forceRefresh();
      return;
    case 'jwt':
      throw new ReauthenticationRequiredError('The stored bearer token was rejected; run `hitl-agent login`');
    case 'apiKey':
      throw new ReauthenticationRequiredError('HITL_API_KEY was rejected by the server');
  }
}

/** The backend's agent id, when the credential carries one. */
export async function credentialAgentId(credential: Credential): Promise<string | null> {
  switch (credential.kind) {
    case 'oauth':
      return agentIdFromToken((await credential.store.getValid()).accessToken);
    case 'jwt':
      return agentIdFromToken(credential.token);
    case 'apiKey':
      return null;
  }
}
