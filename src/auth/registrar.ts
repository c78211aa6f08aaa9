/**
 * Dynamic client registration (RFC 7591).
 *
 * Registrations are cached in clients.json, one per agent name, and reused
 * while they still fit: same issuer, same redirect URI (any port for
 * loopback redirects, RFC 8252 §7.3) and an unexpired client secret.
 */

import { OAuthClientInformationSchema, OAuthErrorResponseSchema } from '@modelcontextprotocol/sdk/shared/auth.js';
import { z } from 'zod';

import { NetworkError, RegistrationError } from '../shared/errors.js';
import { readJsonFile, removeFile, writeJsonFileAtomic } from '../shared/fs.js';
import { readJsonBody, type HttpClient } from '../shared/http.js';
import { createLogger } from '../shared/logger.js';
import { ClientRegistrationSchema, type ClientRegistration } from './types.js';

const log = createLogger('registrar');

const ClientsFileSchema = z.object({
  version: z.literal(1),
  registrations: z.record(z.string(), ClientRegistrationSchema),
});

type ClientsFile = z.infer<typeof ClientsFileSchema>;

export interface ClientRegistrarOptions {
  /** Path of clients.json */
  file: string;
  registrationEndpoint: string;
  issuer: string;
  scopes: string[];
  http: HttpClient;
  now?: () => number;
}

export interface ResolvedRegistration {
  registration: ClientRegistration;
  /** True when the registration came from the cache */
  reused: boolean;
}

const LOOPBACK_HOSTS = new Set(['127.0.0.1', '[::1]', 'localhost']);

/** Compare redirect URIs, ignoring the port of loopback redirects. */
export function redirectUrisMatch(registered: string, current: string): boolean {
  if (registered === current) return true;
  let a: URL;
  let b: URL;
  try {
    a = new URL(registered);
    b = new URL(current);
  } catch {
    return false;
  }
  return (
    a.protocol === 'http:' &&
    b.protocol === 'http:' &&
    LOOPBACK_HOSTS.has(a.hostname) &&
    a.hostname === b.hostname &&
    a.pathname === b.pathname &&
    a.search === b.search
  );
}

export class ClientRegistrar {
  private readonly now: () => number;

  constructor(private readonly options: ClientRegistrarOptions) {
    this.now = options.now ?? Date.now;
  }

  private async readFile(): Promise<ClientsFile> {
    return (await readJsonFile(this.options.file, ClientsFileSchema)) ?? { version: 1, registrations: {} };
  }

  async load(agentName: string): Promise<ClientRegistration | null> {
    const file = await this.readFile();
    return file.registrations[agentName] ?? null;
  }

  isReusable(registration: ClientRegistration, agentName: string, redirectUri: string): boolean {
    if (registration.issuer !== this.options.issuer) return false;
    if (registration.agentName !== agentName) return false;
    if (!redirectUrisMatch(registration.redirectUri, redirectUri)) return false;
    if (registration.clientSecretExpiresAt !== undefined && registration.clientSecretExpiresAt <= this.now()) {
      return false;
    }
    return true;
  }

  /** Return a usable registration for `agentName`, registering only when needed. */
  async register(agentName: string, redirectUri: string, signal?: AbortSignal): Promise<ClientRegistration> {
    return (await this.resolve(agentName, redirectUri, signal)).registration;
  }

  async resolve(agentName: string, redirectUri: string, signal?: AbortSignal): Promise<ResolvedRegistration> {
    const cached = await this.load(agentName);
    if (cached && this.isReusable(cached, agentName, redirectUri)) {
      log.debug(`Reusing client ${cached.clientId} for ${agentName}`);
      return { registration: cached, reused: true };
    }

    const registration = await this.registerNew(agentName, redirectUri, signal);
    await this.save(registration);
    return { registration, reused: false };
  }

  /** Forget a registration the authorization server rejected. */
  async discard(agentName: string): Promise<void> {
    const file = await this.readFile();
    if (!(agentName in file.registrations)) return;
    delete file.registrations[agentName];
    await writeJsonFileAtomic(this.options.file, file);
    log.info(`Discarded cached client registration for ${agentName}`);
  }

  async clear(): Promise<void> {
    await removeFile(this.options.file);
  }

  private async save(registration: ClientRegistration): Promise<void> {
    const file = await this.readFile();
    file.registrations[registration.agentName] = registration;
    await writeJsonFileAtomic(this.options.file, file);
  }

  private async registerNew(agentName: string, redirectUri: string, signal?: AbortSignal): Promise<ClientRegistration> {
    const metadata = {
      client_name: agentName,
      redirect_uris: [redirectUri],
      grant_types: ['authorization_code', 'refresh_token'],
      response_types: ['code'],
      token_endpoint_auth_method: 'client_secret_post',
      scope: this.options.scopes.join(' '),
    };

    let response: Response;
    try {
      response = await this.options.http.request(this.options.registrationEndpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify(metadata),
        signal,
      });
    } catch (err) {
      if (err instanceof NetworkError) {
        throw new RegistrationError(`Client registration failed: ${err.message}`, { cause: err });
      }
      throw err;
    }

    const body = await readJsonBody(response);
    if (!response.ok) {
      const parsed = OAuthErrorResponseSchema.safeParse(body);
      const detail = parsed.success
        ? `${parsed.data.error}${parsed.data.error_description ? `: ${parsed.data.error_description}` : ''}`
        : 'no error details';
      throw new RegistrationError(`Client registration failed (HTTP ${response.status}): ${detail}`, {
        status: response.status,
        oauthError: parsed.success ? parsed.data.error : undefined,
      });
    }

    const parsed = OAuthClientInformationSchema.safeParse(body);
    if (!parsed.success) {
      throw new RegistrationError('Client registration response did not include a client_id', {
        status: response.status,
      });
    }

    const info = parsed.data;
    const expiresAt = info.client_secret_expires_at;
    log.info(`Registered client ${info.client_id} for ${agentName}`);
    return {
      clientId: info.client_id,
      clientSecret: info.client_secret,
      clientSecretExpiresAt: expiresAt !== undefined && expiresAt > 0 ? expiresAt * 1_000 : undefined,
      redirectUri,
      issuer: this.options.issuer,
      agentName,
      registeredAt: this.now(),
    };
  }
}
