import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireOpsToken } from '../../lib/auth/ops.js';
import { latestWebhookEvents } from '../../lib/db/webhook-events.js';
import { allowMethods, sendError } from '../../lib/utils/http.js';
import { sbReady } from '../../lib/utils/sb.js';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return;

  try {
    requireOpsToken(req);
    if (!sbReady()) {
      return res.status(503).json({ ok: false, error: 'missing_supabase_env' });
    }

    const latest = await latestWebhookEvents(20);
    const lastByStatus: Record<string, string> = {};
    for (const event of latest) {
      lastByStatus[event.status] ??= event.created_at;
    }
    return res.status(200).json({
      ok: true,
      last_event_at: latest[0]?.created_at ?? null,
      last_by_status: lastByStatus,
      latest: latest.map((event) => ({
        id: event.id,
        event_key: event.event_key,
        status: event.status,
        attempt_count: event.attempt_count,
        permanent_failed: event.permanent_failed,
        created_at: event.created_at,
      })),
    });
  } catch (error) {
    return sendError(res, 'ops-heartbeat', error);
  }
}
