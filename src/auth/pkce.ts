/**
 * PKCE (RFC 7636) and CSRF state generation.
 *
 * Verifiers and state tokens come from the OS CSPRNG and are base64url
 * encoded without padding, so they only ever use the unreserved URI
 * characters [A-Za-z0-9-._~].
 */

import crypto from 'node:crypto';

export const MIN_VERIFIER_BYTES = 32;
export const MAX_VERIFIER_BYTES = 96;
const STATE_BYTES = 32;

const VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/;

/** Memory-only record of one authorization attempt */
export interface PkceSession {
  codeVerifier: string;
  codeChallenge: string;
  challengeMethod: 'S256';
  state: string;
  redirectUri: string;
  createdAt: number;
  expiresAt: number;
}

/**
 * Generate a code verifier from `byteLength` random bytes.
 * 32 bytes give the minimum 43 characters, 96 bytes the maximum 128.
 */
export function generateCodeVerifier(byteLength = MIN_VERIFIER_BYTES): string {
  if (!Number.isInteger(byteLength) || byteLength < MIN_VERIFIER_BYTES || byteLength > MAX_VERIFIER_BYTES) {
    throw new RangeError(`Verifier byte length must be between ${MIN_VERIFIER_BYTES} and ${MAX_VERIFIER_BYTES}`);
  }
  return crypto.randomBytes(byteLength).toString('base64url');
}

export function isValidCodeVerifier(verifier: string): boolean {
  return VERIFIER_PATTERN.test(verifier);
}

/** S256 challenge: base64url(SHA-256(verifier)). */
export function deriveCodeChallenge(verifier: string): string {
  return crypto.createHash('sha256').update(verifier, 'ascii').digest('base64url');
}

export function generateState(): string {
  return crypto.randomBytes(STATE_BYTES).toString('base64url');
}

export function createPkceSession(redirectUri: string, ttlMs: number, now = Date.now()): PkceSession {
  const codeVerifier = generateCodeVerifier();
  return {
    codeVerifier,
    codeChallenge: deriveCodeChallenge(codeVerifier),
    challengeMethod: 'S256',
    state: generateState(),
    redirectUri,
    createdAt: now,
    expiresAt: now + ttlMs,
  };
}

/** True when the session's verifier is well-formed and matches its challenge. */
export function verifyPkceSession(session: PkceSession): boolean {
  return isValidCodeVerifier(session.codeVerifier) && deriveCodeChallenge(session.codeVerifier) === session.codeChallenge;
}

export function isPkceSessionExpired(session: PkceSession, now = Date.now()): boolean {
  return now >= session.expiresAt;
}

/** Constant-time comparison of the expected and received state tokens. */
export function statesMatch(expected: string, received: string | undefined): boolean {
  if (received === undefined) return false;
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(received, 'utf8');
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(a, b);
}

/** Blank out a finished session so its secrets do not linger on the object. */
export function destroyPkceSession(session: PkceSession): void {
  session.codeVerifier = '';
  session.codeChallenge = '';
  session.state = '';
  session.expiresAt = 0;
}
