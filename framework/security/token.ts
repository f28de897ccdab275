/**
 * Token Cipher
 *
 * Authenticated symmetric encryption of opaque strings. Used to issue CSRF
 * tokens that carry their own session binding and issue time.
 *
 * Token layout (base64url): version(1) || iv(12) || tag(16) || ciphertext
 */

import {
  createCipheriv,
  createDecipheriv,
  hkdfSync,
  randomBytes,
  timingSafeEqual,
} from 'node:crypto';
import { DecryptionError } from '../errors.ts';

const ALGORITHM = 'aes-256-gcm';
const VERSION = 1;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const HEADER_LENGTH = 1 + IV_LENGTH + TAG_LENGTH;
const KDF_INFO = 'trellis:token-cipher:v1';

export type Plaintext = string | Uint8Array;

/**
 * AES-256-GCM cipher keyed by a process-wide secret
 */
export class TokenCipher {
  private readonly key: Buffer;

  constructor(secret: string | Uint8Array) {
    if (secret.length === 0) {
      throw new Error('TokenCipher requires a non-empty secret');
    }
    this.key = Buffer.from(
      hkdfSync('sha256', secret, Buffer.alloc(0), KDF_INFO, KEY_LENGTH)
    );
  }

  /**
   * Encrypt a plaintext into an opaque URL-safe token
   */
  encrypt(plaintext: Plaintext): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
    const data = typeof plaintext === 'string' ? Buffer.from(plaintext, 'utf8') : plaintext;
    const ciphertext = Buffer.concat([cipher.update(data), cipher.final()]);
    const tag = cipher.getAuthTag();

    return Buffer.concat([Buffer.from([VERSION]), iv, tag, ciphertext]).toString('base64url');
  }

  /**
   * Decrypt a token produced by encrypt()
   *
   * @throws DecryptionError when the token is not authentic under this key
   */
  decrypt(token: string): string {
    return this.decryptBytes(token).toString('utf8');
  }

  /**
   * Decrypt a token to raw bytes
   */
  decryptBytes(token: string): Buffer {
    if (!/^[A-Za-z0-9_-]+$/.test(token)) {
      throw new DecryptionError('Token is not base64url');
    }

    const raw = Buffer.from(token, 'base64url');
    if (raw.length < HEADER_LENGTH) {
      throw new DecryptionError('Token is truncated');
    }
    if (raw[0] !== VERSION) {
      throw new DecryptionError(`Unsupported token version ${raw[0]}`);
    }

    const iv = raw.subarray(1, 1 + IV_LENGTH);
    const tag = raw.subarray(1 + IV_LENGTH, HEADER_LENGTH);
    const ciphertext = raw.subarray(HEADER_LENGTH);

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch {
      throw new DecryptionError('Token failed authentication');
    }
  }
}

/**
 * Generate a random secret suitable for TokenCipher
 */
export function generateSecret(length = 32): string {
  return generateKey(length);
}

/**
 * Generate a URL-safe random key (session keys, nonces)
 */
export function generateKey(length = 32): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Constant-time string comparison
 */
export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}
