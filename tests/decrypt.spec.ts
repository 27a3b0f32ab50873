import { describe, it, expect } from 'vitest';
import crypto from 'node:crypto';
import { decryptorFromEnv } from '../src/identity/decrypt.js';
import { InvalidInputError } from '../src/errors.js';

const KEY = '000102030405060708090a0b0c0d0e0f';
const IV = '0f0e0d0c0b0a09080706050403020100';

function encrypt(plain: string, iv: Buffer | null) {
  const c = crypto.createCipheriv(iv ? 'aes-128-cbc' : 'aes-128-ecb', Buffer.from(KEY, 'hex'), iv);
  return Buffer.concat([c.update(plain, 'utf8'), c.final()]).toString('base64');
}

describe('decryptorFromEnv', () => {
  it('returns stored values without a key', () => {
    expect(decryptorFromEnv({})('010-0000-1111')).toBe('010-0000-1111');
  });
  it('decrypts ECB and CBC ciphertext', () => {
    expect(decryptorFromEnv({ PII_AES_KEY: KEY })(encrypt('user@example.com', null))).toBe('user@example.com');
    expect(decryptorFromEnv({ PII_AES_KEY: KEY, PII_AES_IV: IV })(encrypt('010-0000-1111', Buffer.from(IV, 'hex')))).toBe('010-0000-1111');
  });
  it('rejects a key of the wrong size', () => {
    expect(() => decryptorFromEnv({ PII_AES_KEY: 'abcd' })).toThrow(InvalidInputError);
  });
});
