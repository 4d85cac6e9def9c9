import crypto from 'node:crypto';
import { encryptionKey } from '../config/env.js';

const PREFIX = 'v1';

function resolveKey(raw = encryptionKey()): Buffer {
  if (!raw) throw new Error('ENCRYPTION_KEY is not configured');
  const candidates = [Buffer.from(raw, 'hex'), Buffer.from(raw, 'base64')];
  const key = /^[0-9a-f]{64}$/i.test(raw) ? candidates[0] : candidates[1];
  if (key.length !== 32) throw new Error('ENCRYPTION_KEY must decode to 32 bytes');
  return key;
}

/** AES-256-GCM, serialized as `v1:<iv>:<tag>:<ciphertext>` in base64url. */
export function encryptSecret(plain: string, rawKey?: string): string {
  const key = resolveKey(rawKey);
  const iv = crypto.randomBytes(12);
  const cipher = crypto.createCipheriv('aes-256-gcm', key, iv);
  const encrypted = Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();
  return [PREFIX, iv.toString('base64url'), tag.toString('base64url'), encrypted.toString('base64url')].join(':');
}

export function decryptSecret(sealed: string, rawKey?: string): string {
  const [prefix, iv, tag, data] = sealed.split(':');
  if (prefix !== PREFIX || !iv || !tag || !data) {
    throw new Error('Malformed encrypted secret');
  }
  const decipher = crypto.createDecipheriv('aes-256-gcm', resolveKey(rawKey), Buffer.from(iv, 'base64url'));
  decipher.setAuthTag(Buffer.from(tag, 'base64url'));
  return Buffer.concat([decipher.update(Buffer.from(data, 'base64url')), decipher.final()]).toString('utf8');
}

export function hmacHex(secret: string, value: string | Buffer) {
  return crypto.createHmac('sha256', secret).update(value).digest('hex');
}

export function safeEqual(a: string, b: string) {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}
