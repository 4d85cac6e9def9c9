import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireUser } from '../../lib/auth/session.js';
import { countLeads, listLeads } from '../../lib/db/leads.js';
import { allowMethods, clampInt, queryParam, sendError } from '../../lib/utils/http.js';

const DEFAULT_LIMIT = 50;

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return;

  try {
    const user = await requireUser(req);
    const filter = {
      ruleId: queryParam(req, 'rule_id') || undefined,
      accountId: queryParam(req, 'account_id') || undefined,
      limit: clampInt(queryParam(req, 'limit'), DEFAULT_LIMIT, 1, 200),
      offset: clampInt(queryParam(req, 'offset'), 0, 0, 1_000_000),
    };
    const [leads, total] = await Promise.all([listLeads(user.id, filter), countLeads(user.id, filter)]);
    return res.status(200).json({ ok: true, leads, total, limit: filter.limit, offset: filter.offset });
  } catch (error) {
    return sendError(res, 'leads', error);
  }
}
