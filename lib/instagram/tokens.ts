import { accountToken, updateAccountToken, type InstagramAccount } from '../db/accounts.js';
import { encryptSecret } from '../utils/crypto.js';
import { refreshLongLivedToken } from './graph.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Long-lived tokens last 60 days; the ops refresh renews those within this window of expiry. */
export const REFRESH_WINDOW_MS = 7 * DAY_MS;

export function refreshCutoff(now = Date.now()) {
  return new Date(now + REFRESH_WINDOW_MS).toISOString();
}

/** Swaps the stored token for a refreshed one and moves `token_expires_at` forward. */
export async function refreshAccountToken(account: InstagramAccount, now = Date.now()) {
  const refreshed = await refreshLongLivedToken(accountToken(account));
  const tokenExpiresAt = new Date(now + refreshed.expires_in * 1000).toISOString();
  const updated = await updateAccountToken(account.id, encryptSecret(refreshed.access_token), tokenExpiresAt);
  console.log('[instagram-token] token refreshed', { account: account.id, expiresAt: tokenExpiresAt });
  return { account: updated, expiresIn: refreshed.expires_in };
}
