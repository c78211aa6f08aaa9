/**
 * Unverified JWT claim reading.
 *
 * The agent only needs claims for its own bookkeeping (expiry, agent id);
 * the server that issued the token remains the one that verifies it.
 */

import { decodeJwt, type JWTPayload } from 'jose';

/** The token's claims, or null for opaque or malformed tokens. */
export function decodeJwtClaims(token: string): JWTPayload | null {
  try {
    return decodeJwt(token);
  } catch {
    return null;
  }
}

/** Seconds until the token's `exp` claim, or null when it has none. */
export function secondsUntilExpiry(token: string, now = Date.now()): number | null {
  const exp = decodeJwtClaims(token)?.exp;
  if (typeof exp !== 'number') return null;
  return Math.max(0, Math.floor(exp - now / 1000));
}

/** The `agent_id` claim the backend puts in agent access tokens. */
export function agentIdFromToken(token: string): string | null {
  const agentId = decodeJwtClaims(token)?.agent_id;
  if (typeof agentId === 'string' && agentId.length > 0) return agentId;
  if (typeof agentId === 'number') return String(agentId);
  return null;
}
