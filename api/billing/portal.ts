import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireUser } from '../../lib/auth/session.js';
import { createPortalSession, dodoReady } from '../../lib/billing/dodo.js';
import { allowMethods, sendError } from '../../lib/utils/http.js';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['POST'])) return;

  try {
    if (!dodoReady()) {
      return res.status(503).json({ ok: false, error: 'missing_dodo_env' });
    }
    const user = await requireUser(req);
    if (!user.dodo_customer_id) {
      return res.status(400).json({ ok: false, error: 'no_billing_customer' });
    }
    const url = await createPortalSession(user.dodo_customer_id);
    return res.status(200).json({ ok: true, url });
  } catch (error) {
    return sendError(res, 'billing-portal', error);
  }
}
