import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireUser } from '../../lib/auth/session.js';
import { listLeads, markLeadsExported, type Lead } from '../../lib/db/leads.js';
import { toCsv } from '../../lib/utils/csv.js';
import { allowMethods, queryParam, sendError } from '../../lib/utils/http.js';

const PAGE_SIZE = 1000;
const MAX_ROWS = 10_000;

const HEADERS = ['name', 'instagram_username', 'instagram_id', 'email', 'phone', 'source', 'rule_id', 'created_at'];

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return;

  try {
    const user = await requireUser(req);
    const scope = {
      ruleId: queryParam(req, 'rule_id') || undefined,
      accountId: queryParam(req, 'account_id') || undefined,
    };

    const leads: Lead[] = [];
    for (let offset = 0; offset < MAX_ROWS; offset += PAGE_SIZE) {
      const page = await listLeads(user.id, { ...scope, limit: PAGE_SIZE, offset });
      leads.push(...page);
      if (page.length < PAGE_SIZE) break;
    }

    const csv = toCsv(
      HEADERS,
      leads.map((lead) => [
        lead.name,
        lead.ig_username,
        lead.ig_user_id,
        lead.email,
        lead.phone,
        lead.source,
        lead.rule_id,
        lead.created_at,
      ]),
    );
    await markLeadsExported(
      user.id,
      leads.map((lead) => lead.id),
    );

    const filename = `leads-${new Date().toISOString().slice(0, 10)}.csv`;
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
    return res.status(200).send(csv);
  } catch (error) {
    return sendError(res, 'leads-export', error);
  }
}
