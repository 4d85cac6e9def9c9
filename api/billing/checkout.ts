import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { requireUser } from '../../lib/auth/session.js';
import { createCheckoutSession, dodoReady } from '../../lib/billing/dodo.js';
import { allowMethods, parseBody, sendError } from '../../lib/utils/http.js';

const checkoutSchema = z.object({
  plan: z.enum(['basic', 'pro', 'enterprise']),
});

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['POST'])) return;

  try {
    if (!dodoReady()) {
      return res.status(503).json({ ok: false, error: 'missing_dodo_env' });
    }
    const user = await requireUser(req);
    const { plan } = parseBody(checkoutSchema, req.body);
    if (user.plan_tier === plan) {
      return res.status(409).json({ ok: false, error: 'already_on_plan', plan });
    }

    const session = await createCheckoutSession(user, plan);
    console.log('[billing] checkout created', { user: user.id, plan, session: session.sessionId });
    return res.status(200).json({ ok: true, checkout_url: session.checkoutUrl, session_id: session.sessionId });
  } catch (error) {
    return sendError(res, 'billing-checkout', error);
  }
}
