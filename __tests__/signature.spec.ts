import crypto from 'node:crypto';
import { describe, expect, test } from 'vitest';
import { verifyXHubSignature256 } from '../lib/instagram/signature.js';

const body = JSON.stringify({ object: 'instagram', entry: [] });
const sign = (payload: string, secret = 'test-secret') =>
  `sha256=${crypto.createHmac('sha256', secret).update(payload).digest('hex')}`;

describe('verifyXHubSignature256', () => {
  test('accepts the HMAC of the raw body', () => {
    expect(verifyXHubSignature256({ rawBody: Buffer.from(body), header: sign(body), appSecret: 'test-secret' })).toEqual({
      ok: true,
    });
  });

  test('accepts upper-case hex', () => {
    const header = `sha256=${sign(body).slice(7).toUpperCase()}`;
    expect(verifyXHubSignature256({ rawBody: body, header, appSecret: 'test-secret' }).ok).toBe(true);
  });

  test.each([
    [{ header: sign(body), appSecret: '' }, 'missing_app_secret'],
    [{ header: '', appSecret: 'test-secret' }, 'missing_signature'],
    [{ header: sign(body).slice(7), appSecret: 'test-secret' }, 'invalid_signature_format'],
    [{ header: 'sha256=xyz', appSecret: 'test-secret' }, 'invalid_signature_hex'],
    [{ header: sign(body, 'other-secret'), appSecret: 'test-secret' }, 'signature_mismatch'],
  ])('rejects %o', (params, reason) => {
    expect(verifyXHubSignature256({ rawBody: body, ...params })).toEqual({ ok: false, reason });
  });

  test('rejects a body changed after signing', () => {
    const result = verifyXHubSignature256({ rawBody: `${body} `, header: sign(body), appSecret: 'test-secret' });
    expect(result.reason).toBe('signature_mismatch');
  });
});
