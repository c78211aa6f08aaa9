export {
  AgentKeyPair,
  ensureKeyPair,
  fingerprint,
  generateKeyPair,
  loadKeyPair,
  publicKeyFromBase64,
  publicKeyToBase64,
} from './keys.js';
export {
  ENVELOPE_VERSION,
  decodeEnvelope,
  encodeEnvelope,
  openEnvelope,
  openJSON,
  openText,
  sealEnvelope,
  sealJSON,
  sealText,
  type EncryptedEnvelope,
  type OpenOptions,
  type SenderKeys,
} from './envelope.js';
