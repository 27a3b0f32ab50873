import crypto from 'node:crypto';
import { InvalidInputError } from '../errors.js';

export type Decrypt = (ciphertext: string) => string;

export const passthrough: Decrypt = (s) => s;

/**
 * Column decryptor for base64 AES ciphertext (PII_AES_KEY / PII_AES_IV hex,
 * ECB when no IV is set). Without a key the values are returned as stored.
 */
export function decryptorFromEnv(env: NodeJS.ProcessEnv = process.env): Decrypt {
  const keyHex = (env.PII_AES_KEY ?? '').trim();
  if (!keyHex) return passthrough;
  const key = Buffer.from(keyHex, 'hex');
  if (![16, 24, 32].includes(key.length)) throw new InvalidInputError('PII_AES_KEY must be 16, 24 or 32 bytes of hex');
  const ivHex = (env.PII_AES_IV ?? '').trim();
  const iv = ivHex ? Buffer.from(ivHex, 'hex') : null;
  const algo = `aes-${key.length * 8}-${iv ? 'cbc' : 'ecb'}`;
  return (ciphertext) => {
    const d = crypto.createDecipheriv(algo, key, iv);
    return Buffer.concat([d.update(ciphertext, 'base64'), d.final()]).toString('utf8');
  };
}
