import { z } from 'zod';
import { appUrl, trackingSecret } from '../config/env.js';
import { hmacHex, safeEqual } from '../utils/crypto.js';

const clickSchema = z.object({
  u: z.string().url(),
  r: z.string(),
  a: z.string(),
  o: z.string(),
  s: z.string().optional(),
});

export type TrackedClick = {
  url: string;
  ruleId: string;
  accountId: string;
  userId: string;
  senderId?: string;
};

function sign(data: string, secret: string) {
  return hmacHex(secret, data).slice(0, 32);
}

/** Wraps a reward link so the click is logged before the redirect. */
export function buildTrackedUrl(click: TrackedClick, secret = trackingSecret()): string {
  if (!secret) return click.url;
  const data = Buffer.from(
    JSON.stringify({ u: click.url, r: click.ruleId, a: click.accountId, o: click.userId, s: click.senderId }),
  ).toString('base64url');
  const params = new URLSearchParams({ d: data, sig: sign(data, secret) });
  return `${appUrl()}/api/analytics/track?${params.toString()}`;
}

export function readTrackedUrl(data: string, signature: string, secret = trackingSecret()): TrackedClick | null {
  if (!secret || !data || !signature) return null;
  if (!safeEqual(sign(data, secret), signature)) return null;
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(data, 'base64url').toString('utf8'));
  } catch {
    return null;
  }
  const parsed = clickSchema.safeParse(decoded);
  if (!parsed.success) return null;
  const { u, r, a, o, s } = parsed.data;
  return { url: u, ruleId: r, accountId: a, userId: o, senderId: s };
}
