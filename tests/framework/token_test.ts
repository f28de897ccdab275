/**
 * Token Cipher Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { TokenCipher, generateKey, generateSecret, safeEqual } from '../../framework/security/token.ts';
import { DecryptionError } from '../../framework/errors.ts';

const cipher = new TokenCipher('test-secret');

test('TokenCipher - decrypts what it encrypts', () => {
  const token = cipher.encrypt('nonce::session::1700000000000');

  assert.match(token, /^[A-Za-z0-9_-]+$/);
  assert.equal(cipher.decrypt(token), 'nonce::session::1700000000000');
});

test('TokenCipher - accepts byte plaintexts', () => {
  const token = cipher.encrypt(new Uint8Array([0, 1, 254, 255]));

  assert.deepEqual([...cipher.decryptBytes(token)], [0, 1, 254, 255]);
});

test('TokenCipher - the same plaintext encrypts differently each time', () => {
  assert.notEqual(cipher.encrypt('same'), cipher.encrypt('same'));
});

test('TokenCipher - tokens from another secret are rejected', () => {
  const other = new TokenCipher('another-test-secret');
  const token = other.encrypt('payload');

  assert.throws(() => cipher.decrypt(token), DecryptionError);
});

test('TokenCipher - tampered ciphertext is rejected', () => {
  const raw = Buffer.from(cipher.encrypt('payload'), 'base64url');
  raw[raw.length - 1] ^= 0x01;

  assert.throws(() => cipher.decrypt(raw.toString('base64url')), /failed authentication/);
});

test('TokenCipher - malformed tokens are rejected', () => {
  assert.throws(() => cipher.decrypt(''), /not base64url/);
  assert.throws(() => cipher.decrypt('abc$def'), /not base64url/);
  assert.throws(() => cipher.decrypt('badtoken'), /truncated/);

  const raw = Buffer.from(cipher.encrypt('payload'), 'base64url');
  raw[0] = 9;
  assert.throws(() => cipher.decrypt(raw.toString('base64url')), /Unsupported token version 9/);
});

test('TokenCipher - an empty secret is refused', () => {
  assert.throws(() => new TokenCipher(''), /non-empty secret/);
});

test('generateKey - returns URL-safe random keys of the requested size', () => {
  const key = generateKey();

  assert.match(key, /^[A-Za-z0-9_-]{43}$/);
  assert.notEqual(generateKey(), key);
  assert.equal(Buffer.from(generateKey(16), 'base64url').length, 16);
  assert.equal(Buffer.from(generateSecret(), 'base64url').length, 32);
});

test('safeEqual - compares strings exactly', () => {
  assert.equal(safeEqual('token', 'token'), true);
  assert.equal(safeEqual('token', 'tokem'), false);
  assert.equal(safeEqual('token', 'token2'), false);
});
