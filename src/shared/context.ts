/**
 * Per-process application context.
 *
 * Built once by the CLI and handed to every component that needs shared
 * configuration or the HTTP edge.  Nothing in the codebase reaches for a
 * module-level singleton instead.
 */

import { loadAgentConfig, resolvePaths, type AgentConfig, type AgentPaths, type ConfigFile } from './config.js';
import { HttpClient, type FetchLike } from './http.js';
import { createLogger, type Logger } from './logger.js';

export interface AppContext {
  config: AgentConfig;
  paths: AgentPaths;
  /** Client for auth and key endpoints (connect timeout) */
  http: HttpClient;
  /** Client for relay traffic (request timeout) */
  relayHttp: HttpClient;
  logger: Logger;
}

export interface CreateContextOptions {
  configDir?: string;
  config?: AgentConfig;
  /** Applied over the loaded configuration for this process only */
  overrides?: ConfigFile;
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
}

export function createContext(options: CreateContextOptions = {}): AppContext {
  const paths = resolvePaths(options.configDir);
  const config =
    options.config ?? loadAgentConfig({ configDir: paths.configDir, env: options.env, overrides: options.overrides });
  return {
    config,
    paths,
    http: new HttpClient({ fetch: options.fetch, timeout: config.connectTimeout, retry: config.retry }),
    relayHttp: new HttpClient({ fetch: options.fetch, timeout: config.requestTimeout, retry: config.retry }),
    logger: createLogger('hitl-agent'),
  };
}
