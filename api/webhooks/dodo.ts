import type { VercelRequest, VercelResponse } from '@vercel/node';
import { applyBillingEvent, billingEventSchema, verifyDodoWebhook, type BillingOutcome } from '../../lib/billing/webhook.js';
import { dodoEnv } from '../../lib/config/env.js';
import { forgetBillingEvent, recordBillingEvent } from '../../lib/db/billing.js';
import { formatAlertPayload, postAlert } from '../../lib/utils/alert.js';
import { firstHeader, getRawBody, sendError } from '../../lib/utils/http.js';
import { sbReady } from '../../lib/utils/sb.js';

export const config = {
  api: {
    bodyParser: false,
  },
};

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', ['POST']);
    return res.status(405).json({ ok: false, error: 'method_not_allowed' });
  }

  try {
    const rawBody = await getRawBody(req);
    const headers = {
      id: firstHeader(req.headers['webhook-id']),
      timestamp: firstHeader(req.headers['webhook-timestamp']),
      signature: firstHeader(req.headers['webhook-signature']),
    };
    const verification = verifyDodoWebhook({ rawBody, headers, secret: dodoEnv().webhookSecret });
    if (!verification.ok) {
      console.warn('[dodo-webhook] signature rejected', { reason: verification.reason });
      return res.status(401).json({ ok: false, error: 'invalid_signature', reason: verification.reason });
    }

    if (!sbReady()) {
      return res.status(503).json({ ok: false, error: 'missing_supabase_env' });
    }

    let body: unknown;
    try {
      body = JSON.parse(rawBody.toString('utf8'));
    } catch {
      return res.status(400).json({ ok: false, error: 'invalid_json' });
    }
    const parsed = billingEventSchema.safeParse(body);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: 'invalid_payload', detail: parsed.error.issues });
    }

    const fresh = await recordBillingEvent(headers.id, parsed.data.type, body);
    if (!fresh) {
      console.log('[dodo-webhook] duplicate delivery', { id: headers.id, type: parsed.data.type });
      return res.status(200).json({ ok: true, duplicate: true });
    }

    let outcome: BillingOutcome;
    try {
      outcome = await applyBillingEvent(parsed.data);
    } catch (error) {
      await forgetBillingEvent(headers.id);
      throw error;
    }
    console.log('[dodo-webhook] event applied', { id: headers.id, type: parsed.data.type, ...outcome });
    if (outcome.action === 'unknown_user' || outcome.action === 'unknown_product') {
      await postAlert(
        formatAlertPayload({
          title: 'Billing event not applied',
          severity: 'warn',
          message: `${parsed.data.type}: ${outcome.action}`,
          meta: { webhookId: headers.id, subscription: parsed.data.data.subscription_id },
        }),
      );
    }
    return res.status(200).json({ ok: true, ...outcome });
  } catch (error) {
    return sendError(res, 'dodo-webhook', error);
  }
}
