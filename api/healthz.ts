import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dodoEnv, encryptionKey, instagramEnv, supabaseEnv } from '../lib/config/env.js';
import { dodoReady } from '../lib/billing/dodo.js';
import { sbReady } from '../lib/utils/sb.js';

export default function handler(_req: VercelRequest, res: VercelResponse) {
  const supabaseOk = sbReady();
  const instagram = instagramEnv();
  const dodo = dodoEnv();

  return res.status(200).json({
    ok: supabaseOk,
    supabase_ok: supabaseOk,
    supabase_anon_key_present: Boolean(supabaseEnv().anonKey),
    instagram_app_present: Boolean(instagram.appId && instagram.appSecret),
    instagram_verify_token_present: Boolean(instagram.verifyToken),
    encryption_key_present: Boolean(encryptionKey()),
    dodo_ok: dodoReady(),
    dodo_webhook_secret_present: Boolean(dodo.webhookSecret),
    dodo_products_count: Object.values(dodo.products).filter(Boolean).length,
    ts: new Date().toISOString(),
  });
}
