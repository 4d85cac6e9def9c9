import type { VercelRequest, VercelResponse } from '@vercel/node';
import { parse, serialize } from 'cookie';
import { assertCanAddAccount } from '../../../lib/billing/plan-enforcement.js';
import { encryptionKey, frontendUrl, instagramEnv } from '../../../lib/config/env.js';
import { findAccountByInstagramId, upsertAccount } from '../../../lib/db/accounts.js';
import { getUser } from '../../../lib/db/users.js';
import { exchangeCode, exchangeLongLivedToken, getMe, subscribeApp } from '../../../lib/instagram/graph.js';
import { buildRedirectUri, readOAuthState, STATE_COOKIE } from '../../../lib/instagram/oauth-state.js';
import { encryptSecret } from '../../../lib/utils/crypto.js';
import { ApiError, queryParam } from '../../../lib/utils/http.js';
import { sbReady } from '../../../lib/utils/sb.js';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  const redirectBase = `${frontendUrl()}/dashboard/accounts`;
  const fail = (reason: string) => {
    res.setHeader('Set-Cookie', serialize(STATE_COOKIE, '', { path: '/', maxAge: 0 }));
    return res.redirect(302, `${redirectBase}?instagram=error&reason=${encodeURIComponent(reason)}`);
  };

  if (req.method !== 'GET') {
    return fail('method');
  }

  const { appId, appSecret } = instagramEnv();
  const secret = encryptionKey();
  if (!appId || !appSecret || !secret || !sbReady()) {
    return fail('config');
  }

  if (queryParam(req, 'error')) {
    return fail('denied');
  }

  const code = queryParam(req, 'code');
  if (!code) {
    return fail('missing_code');
  }

  const cookies = parse(req.headers.cookie || '');
  const userId = readOAuthState(queryParam(req, 'state'), cookies[STATE_COOKIE], secret);
  if (!userId) {
    return fail('state');
  }

  try {
    const user = await getUser(userId);
    if (!user) return fail('unknown_user');

    const redirectUri = buildRedirectUri(req);
    const short = await exchangeCode({ appId, appSecret, redirectUri, code });
    const long = await exchangeLongLivedToken(appSecret, short.access_token);
    const me = await getMe(long.access_token);
    const instagramUserId = me.user_id ?? me.id;

    const existing = await findAccountByInstagramId(instagramUserId);
    if (existing && existing.userId !== user.id) {
      return fail('account_owned_elsewhere');
    }
    // Reconnecting an account the user already has does not count against the plan.
    if (!existing || !existing.isActive) {
      await assertCanAddAccount(user);
    }

    const account = await upsertAccount({
      userId: user.id,
      instagramUserId,
      username: me.username,
      name: me.name ?? null,
      profilePictureUrl: me.profile_picture_url ?? null,
      accessTokenEncrypted: encryptSecret(long.access_token),
      tokenExpiresAt: new Date(Date.now() + long.expires_in * 1000).toISOString(),
    });
    await subscribeApp(long.access_token);

    console.log('[instagram-oauth] account connected', { user: user.id, account: account.id, username: me.username });
    res.setHeader('Set-Cookie', serialize(STATE_COOKIE, '', { path: '/', maxAge: 0 }));
    return res.redirect(302, `${redirectBase}?instagram=connected&account=${encodeURIComponent(account.id)}`);
  } catch (error) {
    if (error instanceof ApiError) return fail(error.code);
    console.error('[instagram-oauth] callback failed', { message: error instanceof Error ? error.message : String(error) });
    return fail('exchange_failed');
  }
}
