import type { VercelRequest, VercelResponse } from '@vercel/node';
import { serialize } from 'cookie';
import { requireUser } from '../../../lib/auth/session.js';
import { assertCanAddAccount } from '../../../lib/billing/plan-enforcement.js';
import { encryptionKey, instagramEnv } from '../../../lib/config/env.js';
import { buildAuthorizeUrl } from '../../../lib/instagram/graph.js';
import {
  buildRedirectUri,
  createOAuthState,
  STATE_COOKIE,
  STATE_TTL_SECONDS,
} from '../../../lib/instagram/oauth-state.js';
import { allowMethods, queryParam, sendError } from '../../../lib/utils/http.js';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return;

  try {
    const { appId } = instagramEnv();
    const secret = encryptionKey();
    if (!appId || !secret) {
      return res.status(503).json({ ok: false, error: 'missing_instagram_env' });
    }

    const user = await requireUser(req);
    await assertCanAddAccount(user);

    const { state, nonce } = createOAuthState(user.id, secret);
    const url = buildAuthorizeUrl({ appId, redirectUri: buildRedirectUri(req), state });

    res.setHeader(
      'Set-Cookie',
      serialize(STATE_COOKIE, nonce, {
        httpOnly: true,
        secure: true,
        sameSite: 'lax',
        path: '/',
        maxAge: STATE_TTL_SECONDS,
      }),
    );

    // The dashboard calls this with its Bearer token and navigates itself.
    if (queryParam(req, 'format') === 'json') {
      return res.status(200).json({ ok: true, url });
    }
    return res.redirect(302, url);
  } catch (error) {
    return sendError(res, 'instagram-oauth', error);
  }
}
