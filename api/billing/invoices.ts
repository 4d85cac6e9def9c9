import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireUser } from '../../lib/auth/session.js';
import { latestSubscription, listInvoices } from '../../lib/db/billing.js';
import { allowMethods, clampInt, queryParam, sendError } from '../../lib/utils/http.js';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return;

  try {
    const user = await requireUser(req);
    const limit = clampInt(queryParam(req, 'limit'), 24, 1, 100);
    const [invoices, subscription] = await Promise.all([listInvoices(user.id, limit), latestSubscription(user.id)]);
    return res.status(200).json({ ok: true, plan: user.plan_tier, subscription, invoices });
  } catch (error) {
    return sendError(res, 'billing-invoices', error);
  }
}
