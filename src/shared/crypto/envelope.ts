/**
 * Sealed envelopes for payloads that cross the relay.
 *
 * Construction (static-static X25519, one message per envelope):
 *   shared = X25519(sender private, recipient public)
 *   key    = HKDF-SHA256(shared, salt = senderPub ‖ recipientPub, info = "hitl-agent e2ee v1")
 *   ct     = AES-256-GCM(key, nonce = 12 random bytes, aad = version ‖ senderPub ‖ recipientPub)
 *
 * The envelope names its sender so the recipient can derive the same key,
 * and callers can pin the set of senders they accept.  Every failure to
 * authenticate surfaces as DecryptionError; no partial plaintext is ever
 * returned.
 *
 * Wire form: base64 of the envelope's JSON, carried in `encrypted_payload`.
 */

import crypto from 'node:crypto';
import { z } from 'zod';

import { DecryptionError, EncryptionError } from '../errors.js';
import { RAW_KEY_LENGTH, publicKeyFromRaw, rawPublicKey } from './keys.js';

export const ENVELOPE_VERSION = 1;

const NONCE_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const HKDF_INFO = 'hitl-agent e2ee v1';
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export const EncryptedEnvelopeSchema = z.object({
  version: z.number().int(),
  senderPublicKey: z.string().regex(BASE64),
  nonce: z.string().regex(BASE64),
  ciphertext: z.string().regex(BASE64),
});

export type EncryptedEnvelope = z.infer<typeof EncryptedEnvelopeSchema>;

export interface SenderKeys {
  publicKey: crypto.KeyObject;
  privateKey: crypto.KeyObject;
}

export interface OpenOptions {
  /** Base64 raw public keys allowed to have sealed this envelope */
  expectedSenders?: readonly string[];
}

// ── Key derivation ──────────────────────────────────────────────────────

function deriveKey(
  privateKey: crypto.KeyObject,
  peerPublicKey: crypto.KeyObject,
  senderRaw: Buffer,
  recipientRaw: Buffer,
): Buffer {
  const shared = crypto.diffieHellman({ privateKey, publicKey: peerPublicKey });
  // low-order peer points yield an all-zero secret
  if (shared.every((b) => b === 0)) {
    shared.fill(0);
    throw new EncryptionError('Key agreement produced an all-zero secret');
  }
  const key = Buffer.from(
    crypto.hkdfSync('sha256', shared, Buffer.concat([senderRaw, recipientRaw]), HKDF_INFO, KEY_LENGTH),
  );
  shared.fill(0);
  return key;
}

function additionalData(senderRaw: Buffer, recipientRaw: Buffer): Buffer {
  return Buffer.concat([Buffer.from([ENVELOPE_VERSION]), senderRaw, recipientRaw]);
}

// ── Seal / open ─────────────────────────────────────────────────────────

export function sealEnvelope(
  plaintext: Uint8Array,
  recipientPublicKey: crypto.KeyObject,
  sender: SenderKeys,
): EncryptedEnvelope {
  let key: Buffer | undefined;
  try {
    const senderRaw = rawPublicKey(sender.publicKey);
    const recipientRaw = rawPublicKey(recipientPublicKey);
    key = deriveKey(sender.privateKey, recipientPublicKey, senderRaw, recipientRaw);

    const nonce = crypto.randomBytes(NONCE_LENGTH);
    const cipher = crypto.createCipheriv('aes-256-gcm', key, nonce, { authTagLength: AUTH_TAG_LENGTH });
    cipher.setAAD(additionalData(senderRaw, recipientRaw));
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final(), cipher.getAuthTag()]);

    return {
      version: ENVELOPE_VERSION,
      senderPublicKey: senderRaw.toString('base64'),
      nonce: nonce.toString('base64'),
      ciphertext: ciphertext.toString('base64'),
    };
  } catch (err) {
    if (err instanceof EncryptionError) throw err;
    throw new EncryptionError('Failed to seal payload', { cause: err });
  } finally {
    key?.fill(0);
  }
}

export function openEnvelope(
  envelope: EncryptedEnvelope,
  recipientPrivateKey: crypto.KeyObject,
  options: OpenOptions = {},
): Buffer {
  if (envelope.version !== ENVELOPE_VERSION) {
    throw new DecryptionError(`Unsupported envelope version ${envelope.version}`);
  }

  const senderRaw = Buffer.from(envelope.senderPublicKey, 'base64');
  const nonce = Buffer.from(envelope.nonce, 'base64');
  const sealed = Buffer.from(envelope.ciphertext, 'base64');

  if (senderRaw.length !== RAW_KEY_LENGTH) throw new DecryptionError('Malformed envelope: bad sender key');
  if (nonce.length !== NONCE_LENGTH) throw new DecryptionError('Malformed envelope: bad nonce');
  if (sealed.length < AUTH_TAG_LENGTH) throw new DecryptionError('Malformed envelope: ciphertext too short');

  if (options.expectedSenders) {
    const known = options.expectedSenders.some((encoded) => Buffer.from(encoded, 'base64').equals(senderRaw));
    if (!known) throw new DecryptionError('Envelope was sealed by an unknown sender');
  }

  let key: Buffer | undefined;
  try {
    const recipientRaw = rawPublicKey(crypto.createPublicKey(recipientPrivateKey));
    key = deriveKey(recipientPrivateKey, publicKeyFromRaw(senderRaw), senderRaw, recipientRaw);

    const decipher = crypto.createDecipheriv('aes-256-gcm', key, nonce, { authTagLength: AUTH_TAG_LENGTH });
    decipher.setAAD(additionalData(senderRaw, recipientRaw));
    decipher.setAuthTag(sealed.subarray(sealed.length - AUTH_TAG_LENGTH));
    return Buffer.concat([decipher.update(sealed.subarray(0, sealed.length - AUTH_TAG_LENGTH)), decipher.final()]);
  } catch (err) {
    throw new DecryptionError('Decryption failed: authentication tag mismatch (tampered or wrong key)', {
      cause: err,
    });
  } finally {
    key?.fill(0);
  }
}

// ── Wire encoding ───────────────────────────────────────────────────────

export function encodeEnvelope(envelope: EncryptedEnvelope): string {
  return Buffer.from(JSON.stringify(envelope), 'utf8').toString('base64');
}

export function decodeEnvelope(encoded: string): EncryptedEnvelope {
  const trimmed = encoded.trim();
  if (!trimmed || !BASE64.test(trimmed)) throw new DecryptionError('Malformed envelope: not base64');

  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(trimmed, 'base64').toString('utf8'));
  } catch (err) {
    throw new DecryptionError('Malformed envelope: not JSON', { cause: err });
  }
  const parsed = EncryptedEnvelopeSchema.safeParse(json);
  if (!parsed.success) throw new DecryptionError('Malformed envelope: missing fields');
  return parsed.data;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Seal a UTF-8 string and return its wire form. */
export function sealText(text: string, recipientPublicKey: crypto.KeyObject, sender: SenderKeys): string {
  return encodeEnvelope(sealEnvelope(Buffer.from(text, 'utf8'), recipientPublicKey, sender));
}

/** Open a wire-form envelope whose plaintext must be valid UTF-8. */
export function openText(encoded: string, recipientPrivateKey: crypto.KeyObject, options: OpenOptions = {}): string {
  const plaintext = openEnvelope(decodeEnvelope(encoded), recipientPrivateKey, options);
  try {
    return utf8.decode(plaintext);
  } catch (err) {
    throw new DecryptionError('Decrypted payload is not valid UTF-8', { cause: err });
  } finally {
    plaintext.fill(0);
  }
}

/** JSON convenience wrappers. */
export function sealJSON(value: unknown, recipientPublicKey: crypto.KeyObject, sender: SenderKeys): string {
  return sealText(JSON.stringify(value), recipientPublicKey, sender);
}

export function openJSON(encoded: string, recipientPrivateKey: crypto.KeyObject, options: OpenOptions = {}): unknown {
  const text = openText(encoded, recipientPrivateKey, options);
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    throw new DecryptionError('Decrypted payload is not valid JSON', { cause: err });
  }
}
