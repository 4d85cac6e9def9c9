import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireUser } from '../../lib/auth/session.js';
import { countLeads } from '../../lib/db/leads.js';
import { allowMethods, queryParam, sendError } from '../../lib/utils/http.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return;

  try {
    const user = await requireUser(req);
    const scope = {
      ruleId: queryParam(req, 'rule_id') || undefined,
      accountId: queryParam(req, 'account_id') || undefined,
    };
    const now = Date.now();
    const [total, withEmail, withPhone, last7Days, last30Days] = await Promise.all([
      countLeads(user.id, scope),
      countLeads(user.id, { ...scope, has: 'email' }),
      countLeads(user.id, { ...scope, has: 'phone' }),
      countLeads(user.id, { ...scope, since: new Date(now - 7 * DAY_MS).toISOString() }),
      countLeads(user.id, { ...scope, since: new Date(now - 30 * DAY_MS).toISOString() }),
    ]);
    return res.status(200).json({
      ok: true,
      stats: { total, with_email: withEmail, with_phone: withPhone, last_7_days: last7Days, last_30_days: last30Days },
    });
  } catch (error) {
    return sendError(res, 'leads-stats', error);
  }
}
