import type { VercelRequest, VercelResponse } from '@vercel/node';
import { readTrackedUrl } from '../../lib/analytics/tracking.js';
import { logAnalyticsEvent } from '../../lib/db/activity.js';
import { allowMethods, queryParam } from '../../lib/utils/http.js';
import { sbReady } from '../../lib/utils/sb.js';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return;

  const click = readTrackedUrl(queryParam(req, 'd'), queryParam(req, 'sig'));
  if (!click) {
    return res.status(400).json({ ok: false, error: 'invalid_link' });
  }

  if (sbReady()) {
    try {
      await logAnalyticsEvent({
        userId: click.userId,
        accountId: click.accountId,
        ruleId: click.ruleId,
        type: 'link_clicked',
        senderId: click.senderId ?? null,
        metadata: { url: click.url },
      });
    } catch (error) {
      // The visitor still gets the link when the click cannot be stored.
      console.error('[analytics-track] click not recorded', {
        rule: click.ruleId,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  res.setHeader('Cache-Control', 'no-store');
  return res.redirect(302, click.url);
}
