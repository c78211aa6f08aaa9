/**
 * Error taxonomy.
 *
 * Every failure the agent can surface derives from `AgentError` and carries a
 * stable `code`.  Callers branch on `instanceof` or on `code`; the message is
 * for humans only.
 */

export type AgentErrorCode =
  | 'RegistrationError'
  | 'AuthorizationDenied'
  | 'AuthorizationTimeout'
  | 'StateMismatch'
  | 'TokenExchangeError'
  | 'TokenRefreshError'
  | 'ReauthenticationRequired'
  | 'EncryptionError'
  | 'DecryptionError'
  | 'NetworkError'
  | 'PermissionError'
  | 'Cancelled'
  | 'ExchangeTimeout'
  | 'RelayError';

interface ErrorDetails {
  cause?: unknown;
}

export class AgentError extends Error {
  public readonly code: AgentErrorCode;

  constructor(code: AgentErrorCode, message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.code = code;
    this.name = code;
  }
}

/** Details of an OAuth endpoint rejection (RFC 6749 §5.2 error body). */
export interface OAuthFailure extends ErrorDetails {
  status?: number;
  oauthError?: string;
  description?: string;
}

export class RegistrationError extends AgentError {
  public readonly status?: number;

  constructor(message: string, details: OAuthFailure = {}) {
    super('RegistrationError', message, details);
    this.status = details.status;
  }
}

export class AuthorizationDeniedError extends AgentError {
  public readonly oauthError: string;

  constructor(oauthError: string, description?: string) {
    super(
      'AuthorizationDenied',
      description
        ? `Authorization denied: ${oauthError} (${description})`
        : `Authorization denied: ${oauthError}`,
    );
    this.oauthError = oauthError;
  }
}

export class AuthorizationTimeoutError extends AgentError {
  constructor(timeoutMs: number) {
    super('AuthorizationTimeout', `No authorization callback received within ${Math.round(timeoutMs / 1000)}s`);
  }
}

export class StateMismatchError extends AgentError {
  constructor() {
    super('StateMismatch', 'Callback state does not match the pending authorization request');
  }
}

export class TokenExchangeError extends AgentError {
  public readonly status?: number;
  public readonly oauthError?: string;

  constructor(message: string, details: OAuthFailure = {}) {
    super('TokenExchangeError', message, details);
    this.status = details.status;
    this.oauthError = details.oauthError;
  }
}

export class TokenRefreshError extends AgentError {
  public readonly status?: number;
  public readonly oauthError?: string;

  constructor(message: string, details: OAuthFailure = {}) {
    super('TokenRefreshError', message, details);
    this.status = details.status;
    this.oauthError = details.oauthError;
  }
}

export class ReauthenticationRequiredError extends AgentError {
  constructor(message = 'Re-authentication required: run `hitl-agent login`', details: ErrorDetails = {}) {
    super('ReauthenticationRequired', message, details);
  }
}

export class EncryptionError extends AgentError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('EncryptionError', message, details);
  }
}

export class DecryptionError extends AgentError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('DecryptionError', message, details);
  }
}

export class NetworkError extends AgentError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('NetworkError', message, details);
  }
}

export class PermissionError extends AgentError {
  public readonly path: string;

  constructor(filePath: string, message: string) {
    super('PermissionError', message);
    this.path = filePath;
  }
}

export class CancelledError extends AgentError {
  constructor(message = 'Operation cancelled') {
    super('Cancelled', message);
  }
}

export class ExchangeTimeoutError extends AgentError {
  constructor(toolName: string, timeoutMs: number) {
    super('ExchangeTimeout', `Call to ${toolName} timed out after ${Math.round(timeoutMs / 1000)}s`);
  }
}

export class RelayError extends AgentError {
  public readonly rpcCode?: number;
  public readonly status?: number;

  constructor(message: string, details: ErrorDetails & { rpcCode?: number; status?: number } = {}) {
    super('RelayError', message, details);
    this.rpcCode = details.rpcCode;
    this.status = details.status;
  }
}

/** OAuth error codes that mean the server no longer recognises our client. */
export const INVALID_CLIENT_ERRORS: ReadonlySet<string> = new Set(['invalid_client', 'unauthorized_client']);

export function isInvalidClient(err: unknown): boolean {
  if (err instanceof TokenExchangeError) return err.oauthError !== undefined && INVALID_CLIENT_ERRORS.has(err.oauthError);
  if (err instanceof AuthorizationDeniedError) return INVALID_CLIENT_ERRORS.has(err.oauthError);
  return false;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
