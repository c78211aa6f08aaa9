/**
 * Configuration schema and loading.
 *
 * Config directory: ~/.hitl-agent/ (override with HITL_CONFIG_DIR)
 *   config.json      optional overrides of the defaults below
 *   .env             loaded by the CLI before anything reads process.env
 *   clients.json     cached dynamic client registrations
 *   tokens.json      current OAuth token set
 *   token.json       legacy JWT written by older releases (read only)
 *   agent-key.json   the agent's X25519 keypair
 *
 * Precedence: defaults < config.json < environment (HITL_SERVER_URL, HITL_AGENT_NAME)
 *   < command-line flags (this run only).
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './http.js';

export function getConfigDir(): string {
  return process.env.HITL_CONFIG_DIR || path.join(os.homedir(), '.hitl-agent');
}

export function getConfigPath(configDir = getConfigDir()): string {
  return path.join(configDir, 'config.json');
}

export function getEnvFilePath(configDir = getConfigDir()): string {
  return path.join(configDir, '.env');
}

export interface AgentPaths {
  configDir: string;
  configFile: string;
  envFile: string;
  clientsFile: string;
  tokensFile: string;
  legacyTokenFile: string;
  keyFile: string;
}

export function resolvePaths(configDir = getConfigDir()): AgentPaths {
  return {
    configDir,
    configFile: getConfigPath(configDir),
    envFile: getEnvFilePath(configDir),
    clientsFile: path.join(configDir, 'clients.json'),
    tokensFile: path.join(configDir, 'tokens.json'),
    legacyTokenFile: path.join(configDir, 'token.json'),
    keyFile: path.join(configDir, 'agent-key.json'),
  };
}

/** A tool whose arguments must never reach the relay in plaintext */
export interface SensitiveTool {
  name: string;
  /** Whether the relay answers with an envelope sealed to the agent */
  encryptedResponse: boolean;
}

/** Endpoint locations, absolute or relative to `serverUrl` */
export interface EndpointPaths {
  registration: string;
  authorization: string;
  token: string;
  relayMcp: string;
  devicePublicKeys: string;
  keyRegistration: string;
}

export type EndpointName = keyof EndpointPaths;

export interface CallbackConfig {
  /** Loopback interface the callback listener binds to */
  host: string;
  /** 0 picks an ephemeral port */
  port: number;
  path: string;
  /** How long to wait for the browser redirect (ms) */
  timeout: number;
}

export interface AgentConfig {
  /** Base URL of the authorization server and relay */
  serverUrl: string;
  /** Display name registered for this agent */
  agentName: string;
  scopes: string[];
  endpoints: EndpointPaths;
  callback: CallbackConfig;
  /** Tokens are treated as expired this long before their real expiry (ms) */
  tokenExpirySkew: number;
  /** Timeout for auth and key endpoints (ms) */
  connectTimeout: number;
  /** Timeout for a single relay request (ms) */
  requestTimeout: number;
  /** Upper bound for one proxied exchange, including the human's reply (ms) */
  exchangeTimeout: number;
  retry: RetryPolicy;
  sensitiveTools: SensitiveTool[];
  /** Appended to a sensitive tool's name to address its encrypted variant */
  encryptedSuffix: string;
}

export function defaultConfig(): AgentConfig {
  return {
    serverUrl: 'http://127.0.0.1:8000',
    agentName: 'hitl-agent',
    scopes: ['openid', 'profile', 'email'],
    endpoints: {
      registration: '/api/v1/oauth/register',
      authorization: '/api/v1/oauth/authorize',
      token: '/api/v1/oauth/token',
      relayMcp: '/mcp-server/mcp/',
      devicePublicKeys: '/api/v1/devices/public-keys',
      keyRegistration: '/api/v1/keys/register',
    },
    callback: {
      host: '127.0.0.1',
      port: 0,
      path: '/callback',
      timeout: 300_000,
    },
    tokenExpirySkew: 60_000,
    connectTimeout: 10_000,
    requestTimeout: 900_000,
    exchangeTimeout: 900_000,
    retry: { ...DEFAULT_RETRY_POLICY },
    sensitiveTools: [
      { name: 'request_human_input', encryptedResponse: true },
      { name: 'notify_human', encryptedResponse: false },
      { name: 'notify_human_completion', encryptedResponse: true },
    ],
    encryptedSuffix: '_e2ee',
  };
}

// ── config.json schema ──────────────────────────────────────────────────

const positiveMs = z.number().int().positive();

export const ConfigFileSchema = z.object({
  serverUrl: z.string().url().optional(),
  agentName: z.string().min(1).optional(),
  scopes: z.array(z.string().min(1)).optional(),
  endpoints: z
    .object({
      registration: z.string().min(1),
      authorization: z.string().min(1),
      token: z.string().min(1),
      relayMcp: z.string().min(1),
      devicePublicKeys: z.string().min(1),
      keyRegistration: z.string().min(1),
    })
    .partial()
    .optional(),
  callback: z
    .object({
      host: z.string().min(1),
      port: z.number().int().min(0).max(65_535),
      path: z.string().startsWith('/'),
      timeout: positiveMs,
    })
    .partial()
    .optional(),
  tokenExpirySkew: z.number().int().min(0).optional(),
  connectTimeout: positiveMs.optional(),
  requestTimeout: positiveMs.optional(),
  exchangeTimeout: positiveMs.optional(),
  retry: z
    .object({
      retries: z.number().int().min(0).max(10),
      baseDelay: z.number().int().min(0),
      maxDelay: z.number().int().min(0),
    })
    .partial()
    .optional(),
  sensitiveTools: z
    .array(z.object({ name: z.string().min(1), encryptedResponse: z.boolean().default(true) }))
    .optional(),
  encryptedSuffix: z.string().min(1).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function mergeConfig(base: AgentConfig, file: ConfigFile): AgentConfig {
  return {
    ...base,
    ...(file.serverUrl !== undefined && { serverUrl: file.serverUrl }),
    ...(file.agentName !== undefined && { agentName: file.agentName }),
    ...(file.scopes !== undefined && { scopes: file.scopes }),
    ...(file.tokenExpirySkew !== undefined && { tokenExpirySkew: file.tokenExpirySkew }),
    ...(file.connectTimeout !== undefined && { connectTimeout: file.connectTimeout }),
    ...(file.requestTimeout !== undefined && { requestTimeout: file.requestTimeout }),
    ...(file.exchangeTimeout !== undefined && { exchangeTimeout: file.exchangeTimeout }),
    ...(file.sensitiveTools !== undefined && { sensitiveTools: file.sensitiveTools }),
    ...(file.encryptedSuffix !== undefined && { encryptedSuffix: file.encryptedSuffix }),
    endpoints: { ...base.endpoints, ...file.endpoints },
    callback: { ...base.callback, ...file.callback },
    retry: { ...base.retry, ...file.retry },
  };
}

export interface LoadConfigOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Command-line settings for this run; they beat the file and the environment */
  overrides?: ConfigFile;
}

export function loadAgentConfig(options: LoadConfigOptions = {}): AgentConfig {
  const env = options.env ?? process.env;
  const configPath = getConfigPath(options.configDir ?? getConfigDir());

  let config = defaultConfig();
  if (fs.existsSync(configPath)) {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new Error(`Invalid ${configPath}: not valid JSON`, { cause: err });
    }
    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Invalid ${configPath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unexpected shape'}`);
    }
    config = mergeConfig(config, parsed.data);
  }

  const serverUrl = env.HITL_SERVER_URL?.trim();
  if (serverUrl) config.serverUrl = serverUrl;
  const agentName = env.HITL_AGENT_NAME?.trim();
  if (agentName) config.agentName = agentName;

  return options.overrides ? mergeConfig(config, options.overrides) : config;
}

/** Resolve an endpoint against the server URL. */
export function resolveEndpoint(config: AgentConfig, name: EndpointName): string {
  return new URL(config.endpoints[name], config.serverUrl).toString();
}

/** The authorization server's identity, used to scope cached registrations. */
export function issuerOf(config: AgentConfig): string {
  return new URL(config.serverUrl).origin;
}
