/**
 * Library entry point for embedding the login flow or the encrypting proxy
 * in another Node.js process.
 */

export { AuthorizationFlow, buildAuthorizationUrl, type AuthorizationFlowOptions, type FlowState } from './auth/flow.js';
export { CallbackListener, withCallbackListener, type CallbackParams } from './auth/callback-listener.js';
export { ClientRegistrar, type ResolvedRegistration } from './auth/registrar.js';
export { TokenStore } from './auth/token-store.js';
export {
  createAuthComponents,
  credentialHeaders,
  resolveCredential,
  type Credential,
  type CredentialKind,
} from './auth/credentials.js';
export { registerPublicKey } from './auth/key-registration.js';
export { openInBrowser, type BrowserOpener } from './auth/browser.js';
export {
  createPkceSession,
  deriveCodeChallenge,
  generateCodeVerifier,
  generateState,
  type PkceSession,
} from './auth/pkce.js';
export type { ClientRegistration, TokenSet } from './auth/types.js';

export { EncryptingProxy, type EncryptingProxyOptions, type ProxyResult } from './proxy/encrypting-proxy.js';
export { HttpRelayClient, type HttpRelayClientOptions, type RelayTransport } from './proxy/relay-client.js';
export { createProxyServer, runStdioServer } from './mcp/server.js';

export * from './shared/crypto/index.js';
export * from './shared/errors.js';
export { defaultConfig, loadAgentConfig, resolvePaths, type AgentConfig, type AgentPaths } from './shared/config.js';
export { createContext, type AppContext } from './shared/context.js';
export { HttpClient, type FetchLike, type RetryPolicy } from './shared/http.js';
