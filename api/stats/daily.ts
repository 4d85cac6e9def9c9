import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireUser } from '../../lib/auth/session.js';
import { countDmsSince, listEventTypesSince } from '../../lib/db/activity.js';
import { countLeads } from '../../lib/db/leads.js';
import { allowMethods, sendError } from '../../lib/utils/http.js';

function startOfUtcDay(now = new Date()) {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate())).toISOString();
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return;

  try {
    const user = await requireUser(req);
    const since = startOfUtcDay();
    const [events, dmsSent, leads] = await Promise.all([
      listEventTypesSince(user.id, since),
      countDmsSince(user.id, since),
      countLeads(user.id, { since }),
    ]);
    const count = (type: string) => events.filter((event) => event.event_type === type).length;

    return res.status(200).json({
      ok: true,
      date: since.slice(0, 10),
      triggers: count('trigger_matched'),
      dms_sent: dmsSent,
      comment_replies: count('comment_replied'),
      link_clicks: count('link_clicked'),
      leads,
    });
  } catch (error) {
    return sendError(res, 'stats-daily', error);
  }
}
