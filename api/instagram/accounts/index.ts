import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireUser } from '../../../lib/auth/session.js';
import { getPlanLimits } from '../../../lib/config/plans.js';
import { listAccounts, publicAccount } from '../../../lib/db/accounts.js';
import { allowMethods, sendError } from '../../../lib/utils/http.js';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return;

  try {
    const user = await requireUser(req);
    const accounts = await listAccounts(user.id);
    return res.status(200).json({
      ok: true,
      accounts: accounts.map(publicAccount),
      limit: getPlanLimits(user.plan_tier).accounts,
    });
  } catch (error) {
    return sendError(res, 'instagram-accounts', error);
  }
}
