import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { requireUser } from '../../../lib/auth/session.js';
import { getAccount, publicAccount } from '../../../lib/db/accounts.js';
import { GraphError } from '../../../lib/instagram/graph.js';
import { refreshAccountToken } from '../../../lib/instagram/tokens.js';
import { allowMethods, ApiError, parseBody, sendError } from '../../../lib/utils/http.js';

const refreshBodySchema = z.object({ account_id: z.string().trim().min(1) });

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['POST'])) return;

  try {
    const user = await requireUser(req);
    const body = parseBody(refreshBodySchema, req.body);

    const account = await getAccount(user.id, body.account_id);
    if (!account) throw new ApiError(404, 'account_not_found');
    if (!account.isActive) throw new ApiError(409, 'account_inactive');

    try {
      const refreshed = await refreshAccountToken(account);
      return res.status(200).json({
        ok: true,
        account: publicAccount(refreshed.account),
        expires_in: refreshed.expiresIn,
      });
    } catch (error) {
      if (error instanceof GraphError) throw new ApiError(502, 'token_refresh_failed', error.message);
      throw error;
    }
  } catch (error) {
    return sendError(res, 'instagram-oauth', error);
  }
}
