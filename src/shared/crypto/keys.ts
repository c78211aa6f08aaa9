/**
 * Agent key management.
 *
 * One long-lived X25519 keypair per agent installation, stored as PEM in
 * agent-key.json (0600).  The file is created exactly once; an existing file
 * is never replaced, and a corrupt one is reported instead of regenerated.
 *
 * On the wire public keys travel as base64 of the raw 32-byte Curve25519
 * point, the format mobile devices publish.
 */

import crypto from 'node:crypto';
import { promises as fs } from 'node:fs';
import { inspect } from 'node:util';
import { z } from 'zod';

import { EncryptionError } from '../errors.js';
import { assertOwnerOnly, createExclusive, isNodeError } from '../fs.js';
import { createLogger } from '../logger.js';

const log = createLogger('keys');

export const RAW_KEY_LENGTH = 32;

// ── Raw key conversion ──────────────────────────────────────────────────

/** Raw 32-byte form of an X25519 public key. */
export function rawPublicKey(key: crypto.KeyObject): Buffer {
  const jwk = key.export({ format: 'jwk' });
  if (jwk.crv !== 'X25519' || typeof jwk.x !== 'string') {
    throw new EncryptionError('Expected an X25519 key');
  }
  return Buffer.from(jwk.x, 'base64url');
}

export function publicKeyFromRaw(raw: Uint8Array): crypto.KeyObject {
  if (raw.length !== RAW_KEY_LENGTH) {
    throw new EncryptionError(`Invalid X25519 public key: expected ${RAW_KEY_LENGTH} bytes, got ${raw.length}`);
  }
  return crypto.createPublicKey({
    key: { kty: 'OKP', crv: 'X25519', x: Buffer.from(raw).toString('base64url') },
    format: 'jwk',
  });
}

export function publicKeyToBase64(key: crypto.KeyObject): string {
  return rawPublicKey(key).toString('base64');
}

export function publicKeyFromBase64(encoded: string): crypto.KeyObject {
  return publicKeyFromRaw(Buffer.from(encoded, 'base64'));
}

/** OpenSSH-style key fingerprint, `SHA256:` plus the unpadded base64 digest of the raw key. */
export function fingerprint(key: crypto.KeyObject): string {
  const digest = crypto.createHash('sha256').update(rawPublicKey(key)).digest('base64');
  return `SHA256:${digest.replace(/=+$/, '')}`;
}

// ── Key pair ────────────────────────────────────────────────────────────

/**
 * The agent's keypair.  The private half is an opaque `KeyObject`: it is
 * left out of JSON and inspection output and only the envelope routines
 * use it.
 */
export class AgentKeyPair {
  constructor(
    readonly publicKey: crypto.KeyObject,
    readonly privateKey: crypto.KeyObject,
    readonly createdAt: string,
  ) {}

  get publicKeyBase64(): string {
    return publicKeyToBase64(this.publicKey);
  }

  get fingerprint(): string {
    return fingerprint(this.publicKey);
  }

  toJSON(): { publicKey: string; createdAt: string } {
    return { publicKey: this.publicKeyBase64, createdAt: this.createdAt };
  }

  [inspect.custom](): string {
    return `AgentKeyPair { publicKey: '${this.publicKeyBase64}', createdAt: '${this.createdAt}' }`;
  }
}

export function generateKeyPair(now: Date = new Date()): AgentKeyPair {
  const { publicKey, privateKey } = crypto.generateKeyPairSync('x25519');
  return new AgentKeyPair(publicKey, privateKey, now.toISOString());
}

// ── Serialization ───────────────────────────────────────────────────────

export const StoredKeyPairSchema = z.object({
  version: z.literal(1),
  algorithm: z.literal('x25519'),
  publicKey: z.string().includes('PUBLIC KEY'),
  privateKey: z.string().includes('PRIVATE KEY'),
  createdAt: z.string(),
});

export type StoredKeyPair = z.infer<typeof StoredKeyPairSchema>;

export function serializeKeyPair(pair: AgentKeyPair): StoredKeyPair {
  return {
    version: 1,
    algorithm: 'x25519',
    publicKey: pair.publicKey.export({ type: 'spki', format: 'pem' }).toString(),
    privateKey: pair.privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
    createdAt: pair.createdAt,
  };
}

export function deserializeKeyPair(data: StoredKeyPair): AgentKeyPair {
  const publicKey = crypto.createPublicKey(data.publicKey);
  const privateKey = crypto.createPrivateKey(data.privateKey);
  if (publicKey.asymmetricKeyType !== 'x25519' || privateKey.asymmetricKeyType !== 'x25519') {
    throw new EncryptionError('Stored key pair is not X25519');
  }
  if (!rawPublicKey(crypto.createPublicKey(privateKey)).equals(rawPublicKey(publicKey))) {
    throw new EncryptionError('Stored public key does not belong to the stored private key');
  }
  return new AgentKeyPair(publicKey, privateKey, data.createdAt);
}

// ── Persistence ─────────────────────────────────────────────────────────

/**
 * Load the keypair from `keyFile`.
 *
 * @returns null when no key file exists
 * @throws PermissionError when the file is readable by group or others
 * @throws EncryptionError when the file exists but cannot be used
 */
export async function loadKeyPair(keyFile: string): Promise<AgentKeyPair | null> {
  let raw: string;
  try {
    raw = await fs.readFile(keyFile, 'utf8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return null;
    throw err;
  }
  await assertOwnerOnly(keyFile);

  const corrupt = (reason: string, cause?: unknown) =>
    new EncryptionError(`Key file ${keyFile} is corrupt (${reason}); move it aside to generate a new identity`, {
      cause,
    });

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw corrupt('not valid JSON', err);
  }
  const parsed = StoredKeyPairSchema.safeParse(json);
  if (!parsed.success) throw corrupt('unexpected format');

  try {
    return deserializeKeyPair(parsed.data);
  } catch (err) {
    throw corrupt(err instanceof Error ? err.message : 'unreadable key', err);
  }
}

/**
 * Return the agent's keypair, generating and persisting it on first use.
 * Repeated calls return the same keypair.
 */
export async function ensureKeyPair(keyFile: string): Promise<AgentKeyPair> {
  const existing = await loadKeyPair(keyFile);
  if (existing) return existing;

  const pair = generateKeyPair();
  const created = await createExclusive(keyFile, JSON.stringify(serializeKeyPair(pair), null, 2));
  if (created) {
    log.info(`Generated agent key pair (fingerprint ${pair.fingerprint})`);
    return pair;
  }

  // Another process created the file between our read and our write.
  const winner = await loadKeyPair(keyFile);
  if (!winner) throw new EncryptionError(`Key file ${keyFile} disappeared while it was being created`);
  return winner;
}
