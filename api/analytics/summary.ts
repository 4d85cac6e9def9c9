import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireUser } from '../../lib/auth/session.js';
import { listEventTypesSince, type AnalyticsEventType } from '../../lib/db/activity.js';
import { allowMethods, clampInt, queryParam, sendError } from '../../lib/utils/http.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function emptyCounts(): Record<AnalyticsEventType, number> {
  return {
    trigger_matched: 0,
    dm_sent: 0,
    comment_replied: 0,
    link_clicked: 0,
    email_collected: 0,
    phone_collected: 0,
    follow_confirmed: 0,
  };
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return;

  try {
    const user = await requireUser(req);
    const days = clampInt(queryParam(req, 'days'), 30, 1, 90);
    const since = new Date(Date.now() - days * DAY_MS).toISOString();
    const rows = await listEventTypesSince(user.id, since, queryParam(req, 'rule_id') || undefined);

    const totals = emptyCounts();
    const byRule: Record<string, Record<AnalyticsEventType, number>> = {};
    for (const row of rows) {
      totals[row.event_type] += 1;
      if (!row.rule_id) continue;
      byRule[row.rule_id] ??= emptyCounts();
      byRule[row.rule_id][row.event_type] += 1;
    }

    const conversion = totals.trigger_matched ? totals.email_collected / totals.trigger_matched : 0;
    return res.status(200).json({
      ok: true,
      days,
      since,
      totals,
      by_rule: byRule,
      email_conversion: Math.round(conversion * 1000) / 1000,
    });
  } catch (error) {
    return sendError(res, 'analytics-summary', error);
  }
}
