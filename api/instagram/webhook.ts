import type { VercelRequest, VercelResponse } from '@vercel/node';
import { processWebhookEvents } from '../../lib/app/automation-pipeline.js';
import { instagramEnv } from '../../lib/config/env.js';
import { parseWebhookPayload } from '../../lib/instagram/events.js';
import { verifyXHubSignature256 } from '../../lib/instagram/signature.js';
import { firstHeader, getRawBody, queryParam, sendError } from '../../lib/utils/http.js';
import { sbReady } from '../../lib/utils/sb.js';

export const config = {
  api: {
    bodyParser: false,
  },
};

function verifySubscription(req: VercelRequest, res: VercelResponse) {
  const { verifyToken } = instagramEnv();
  const mode = queryParam(req, 'hub.mode');
  const token = queryParam(req, 'hub.verify_token');
  const challenge = queryParam(req, 'hub.challenge');

  if (mode === 'subscribe' && verifyToken && token === verifyToken) {
    console.log('[instagram-webhook] subscription verified');
    res.setHeader('Content-Type', 'text/plain');
    return res.status(200).send(challenge);
  }
  console.warn('[instagram-webhook] verification rejected', { mode });
  return res.status(403).json({ ok: false, error: 'verification_failed' });
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method === 'GET') {
    return verifySubscription(req, res);
  }
  if (req.method !== 'POST') {
    res.setHeader('Allow', ['GET', 'POST']);
    return res.status(405).json({ ok: false, error: 'method_not_allowed' });
  }

  try {
    const rawBody = await getRawBody(req);
    const verification = verifyXHubSignature256({
      rawBody,
      header: firstHeader(req.headers['x-hub-signature-256']),
      appSecret: instagramEnv().appSecret,
    });
    if (!verification.ok) {
      console.warn('[instagram-webhook] signature rejected', { reason: verification.reason });
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

    const events = parseWebhookPayload(body);
    const summary = await processWebhookEvents(events);
    console.log('[instagram-webhook] delivery handled', summary);
    return res.status(200).json({
      ok: true,
      processed: summary.processed,
      skipped: summary.skipped + summary.duplicates,
      failed: summary.failed,
    });
  } catch (error) {
    return sendError(res, 'instagram-webhook', error);
  }
}
