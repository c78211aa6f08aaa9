/**
 * Publishes the agent's public key so paired devices can seal replies to it.
 * A failed publication is logged and reported, never fatal: login still
 * succeeds and `hitl-agent keys` can be retried later.
 */

import type { AgentKeyPair } from '../shared/crypto/keys.js';
import { errorMessage } from '../shared/errors.js';
import type { HttpClient } from '../shared/http.js';
import { createLogger } from '../shared/logger.js';
import { credentialAgentId, credentialHeaders, type Credential } from './credentials.js';
import { AGENT_NAME_HEADER } from './token-endpoint.js';

const log = createLogger('keys');

export interface KeyRegistrationOptions {
  http: HttpClient;
  endpoint: string;
  credential: Credential;
  keyPair: AgentKeyPair;
  agentName: string;
}

/** Returns true when the backend accepted the key. */
export async function registerPublicKey(options: KeyRegistrationOptions): Promise<boolean> {
  try {
    const agentId = await credentialAgentId(options.credential);
    if (!agentId) {
      log.warn('The current credential carries no agent id; skipping public key registration');
      return false;
    }

    const response = await options.http.request(options.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        [AGENT_NAME_HEADER]: options.agentName,
        ...(await credentialHeaders(options.credential)),
      },
      body: JSON.stringify({
        entity_type: 'agent',
        entity_id: agentId,
        public_key: options.keyPair.publicKeyBase64,
      }),
    });

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 200);
      log.error(`Public key registration failed: HTTP ${response.status}${detail ? ` ${detail}` : ''}`);
      return false;
    }

    log.info(`Public key ${options.keyPair.fingerprint} registered for agent ${agentId}`);
    return true;
  } catch (err) {
    log.error(`Public key registration failed: ${errorMessage(err)}`);
    return false;
  }
}
