import crypto from 'node:crypto';
import type { VercelRequest } from '@vercel/node';
import { hmacHex, safeEqual } from '../utils/crypto.js';

export const STATE_COOKIE = 'ig_oauth_state';
export const STATE_TTL_SECONDS = 600;

export function buildRedirectUri(req: Pick<VercelRequest, 'headers'>) {
  const host = req.headers['x-forwarded-host'] || req.headers.host;
  const protoHeader = req.headers['x-forwarded-proto'];
  const isHttps = protoHeader ? String(protoHeader).includes('https') : Boolean(process.env.VERCEL);
  const protocol = isHttps ? 'https' : 'http';
  return `${protocol}://${host}/api/instagram/oauth/callback`;
}

/** `<userId>.<nonce>.<sig>`; the nonce also goes into the state cookie. */
export function createOAuthState(userId: string, secret: string, nonce: string = crypto.randomUUID()) {
  const body = `${userId}.${nonce}`;
  return { state: `${body}.${hmacHex(secret, body).slice(0, 32)}`, nonce };
}

export function readOAuthState(state: string, cookieNonce: string | undefined, secret: string): string | null {
  const parts = state.split('.');
  if (parts.length !== 3 || !cookieNonce) return null;
  const [userId, nonce, signature] = parts;
  if (!userId || !nonce || nonce !== cookieNonce) return null;
  const expected = hmacHex(secret, `${userId}.${nonce}`).slice(0, 32);
  return safeEqual(expected, signature) ? userId : null;
}
