import type { VercelRequest, VercelResponse } from '@vercel/node';
import { replayWebhookEvent, type ReplayOutcome } from '../../lib/app/automation-pipeline.js';
import { requireOpsToken } from '../../lib/auth/ops.js';
import { reprocessMaxAttempts } from '../../lib/config/env.js';
import { listReplayableEvents } from '../../lib/db/webhook-events.js';
import { allowMethods, clampInt, queryParam, sendError } from '../../lib/utils/http.js';
import { sbReady } from '../../lib/utils/sb.js';

const DEFAULT_LIMIT = 100;

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['POST'])) return;

  try {
    requireOpsToken(req);
    if (!sbReady()) {
      return res.status(503).json({ ok: false, error: 'missing_supabase_env' });
    }

    const limit = clampInt(queryParam(req, 'limit'), DEFAULT_LIMIT, 1, 200);
    const maxAttempts = reprocessMaxAttempts();
    const events = await listReplayableEvents(limit, maxAttempts);

    const results: ReplayOutcome[] = [];
    for (const event of events) {
      results.push(await replayWebhookEvent(event, maxAttempts));
    }

    const processed = results.filter((result) => result.status === 'PROCESSED').length;
    const failed = results.filter((result) => result.status === 'FAILED').length;
    console.log('[ops-reprocess] run finished', { checked: results.length, processed, failed });
    return res.status(200).json({
      ok: true,
      checked: results.length,
      processed,
      skipped: results.length - processed - failed,
      failed,
      results,
    });
  } catch (error) {
    return sendError(res, 'ops-reprocess', error);
  }
}
