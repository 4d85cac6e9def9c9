import crypto from 'node:crypto';

/**
 * Verifies the X-Hub-Signature-256 header Meta attaches to webhook deliveries:
 * `sha256=` followed by the hex HMAC of the raw body keyed with the app secret.
 */
export function verifyXHubSignature256(params: {
  rawBody: Buffer | string;
  header: string | null | undefined;
  appSecret: string;
}): { ok: boolean; reason?: string } {
  const { rawBody, header, appSecret } = params;

  if (!appSecret) {
    return { ok: false, reason: 'missing_app_secret' };
  }
  if (!header) {
    return { ok: false, reason: 'missing_signature' };
  }
  if (!header.startsWith('sha256=')) {
    return { ok: false, reason: 'invalid_signature_format' };
  }

  const provided = header.slice(7);
  if (!/^[a-f0-9]{64}$/i.test(provided)) {
    return { ok: false, reason: 'invalid_signature_hex' };
  }

  const body = typeof rawBody === 'string' ? Buffer.from(rawBody, 'utf8') : rawBody;
  const expected = crypto.createHmac('sha256', appSecret).update(body).digest('hex');

  const isValid = crypto.timingSafeEqual(Buffer.from(provided.toLowerCase(), 'hex'), Buffer.from(expected, 'hex'));
  return isValid ? { ok: true } : { ok: false, reason: 'signature_mismatch' };
}
