/**
 * Key material: API key id/secret generation, keyed digests and verification.
 * Uses @noble/hashes for HMAC-SHA-256 and the CSPRNG.
 */

import { timingSafeEqual } from 'node:crypto';
import { hmac } from '@noble/hashes/hmac.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex, randomBytes, utf8ToBytes } from '@noble/hashes/utils.js';
import { InvalidArgumentError } from './errors.js';

export const KEY_ID_PREFIX = 'ak_';
export const SECRET_PREFIX = 'sk_';
/** Separates key id and secret in a presented credential; outside the base64url alphabet. */
export const CREDENTIAL_SEPARATOR = '.';

const KEY_ID_BYTES = 16;
const SECRET_BYTES = 32;
const KEY_ID_PATTERN = /^ak_[A-Za-z0-9_-]{20,}$/;
const SECRET_PATTERN = /^sk_[A-Za-z0-9_-]{40,}$/;
const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

/** Base64url encode (no padding) */
export function toBase64url(bytes: Uint8Array): string {
  let binary = '';
  for (let i = 0; i < bytes.length; i++) {
    binary += String.fromCharCode(bytes[i]);
  }
  return btoa(binary).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

// ── Types ──

export interface GeneratedKey {
  keyId: string;
  /** Shown to the caller once; never stored */
  secret: string;
  digest: string;
  /** `<keyId>.<secret>`, the string a client presents */
  credential: string;
}

export interface ParsedCredential {
  keyId: string;
  secret: string;
}

// ── Credential Format ──

export function formatCredential(keyId: string, secret: string): string {
  return `${keyId}${CREDENTIAL_SEPARATOR}${secret}`;
}

/** Split a presented credential. Returns null for anything not shaped like one. */
export function parseCredential(token: string): ParsedCredential | null {
  const idx = token.indexOf(CREDENTIAL_SEPARATOR);
  if (idx <= 0) return null;
  const keyId = token.slice(0, idx);
  const secret = token.slice(idx + 1);
  if (!isKeyId(keyId) || !SECRET_PATTERN.test(secret)) return null;
  return { keyId, secret };
}

export function isKeyId(value: string): boolean {
  return KEY_ID_PATTERN.test(value);
}

// ── Key Material Manager ──

export class KeyMaterialManager {
  private readonly serverKey: Uint8Array;

  constructor(serverSecret: string | Uint8Array) {
    const key = typeof serverSecret === 'string' ? utf8ToBytes(serverSecret) : serverSecret;
    if (key.length === 0) {
      throw new InvalidArgumentError('Server secret must not be empty');
    }
    this.serverKey = key;
  }

  /** Generate a fresh key id, secret and the secret's digest. */
  generateKeyPair(): GeneratedKey {
    const keyId = KEY_ID_PREFIX + toBase64url(randomBytes(KEY_ID_BYTES));
    const secret = SECRET_PREFIX + toBase64url(randomBytes(SECRET_BYTES));
    return { keyId, secret, digest: this.hash(secret), credential: formatCredential(keyId, secret) };
  }

  /** Deterministic HMAC-SHA-256 of the secret, lowercase hex. */
  hash(secret: string): string {
    if (typeof secret !== 'string' || secret.length === 0) {
      throw new InvalidArgumentError('Secret must be a non-empty string');
    }
    return bytesToHex(hmac(sha256, this.serverKey, utf8ToBytes(secret)));
  }

  /** Constant-time comparison against a stored digest. Never throws. */
  verify(secret: string, digest: string): boolean {
    if (typeof secret !== 'string' || secret.length === 0) return false;
    if (typeof digest !== 'string' || !DIGEST_PATTERN.test(digest)) return false;
    const expected = Buffer.from(this.hash(secret), 'hex');
    const actual = Buffer.from(digest, 'hex');
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }
}
