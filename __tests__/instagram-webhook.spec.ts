import crypto from 'node:crypto';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { createRequest, createResponse } from './helpers.js';

const processWebhookEventsMock = vi.fn();
const sbReadyMock = vi.fn(() => true);

vi.mock('../lib/app/automation-pipeline.js', () => ({
  processWebhookEvents: processWebhookEventsMock,
}));

vi.mock('../lib/utils/sb.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../lib/utils/sb.js')>()),
  sbReady: sbReadyMock,
}));

const handler = (await import('../api/instagram/webhook.js')).default;

const payload = JSON.stringify({
  object: 'instagram',
  entry: [
    {
      id: '17841400000000001',
      messaging: [
        {
          sender: { id: '9001' },
          recipient: { id: '17841400000000001' },
          timestamp: 1_700_000_000_500,
          message: { mid: 'm_1', text: 'LINK' },
        },
      ],
    },
  ],
});

const signature = (body: string) => `sha256=${crypto.createHmac('sha256', 'test-secret').update(body).digest('hex')}`;

beforeEach(() => {
  vi.stubEnv('INSTAGRAM_APP_SECRET', 'test-secret');
  vi.stubEnv('INSTAGRAM_VERIFY_TOKEN', 'verify-me');
  processWebhookEventsMock.mockReset();
  sbReadyMock.mockReturnValue(true);
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('instagram webhook handler', () => {
  test('echoes the challenge for a valid subscription check', async () => {
    const { res, result } = createResponse();

    await handler(
      createRequest({
        method: 'GET',
        query: { 'hub.mode': 'subscribe', 'hub.verify_token': 'verify-me', 'hub.challenge': '1158201444' },
      }),
      res,
    );

    expect(result.statusCode).toBe(200);
    expect(result.body).toBe('1158201444');
    expect(result.headers['content-type']).toBe('text/plain');
  });

  test('refuses a subscription check with the wrong token', async () => {
    const { res, result } = createResponse();

    await handler(
      createRequest({ method: 'GET', query: { 'hub.mode': 'subscribe', 'hub.verify_token': 'nope', 'hub.challenge': '1' } }),
      res,
    );

    expect(result.statusCode).toBe(403);
    expect(result.json).toEqual({ ok: false, error: 'verification_failed' });
  });

  test('rejects deliveries with a bad signature', async () => {
    const { res, result } = createResponse();

    await handler(
      createRequest({ method: 'POST', body: payload, headers: { 'x-hub-signature-256': signature('{}') } }),
      res,
    );

    expect(result.statusCode).toBe(401);
    expect(result.json).toEqual({ ok: false, error: 'invalid_signature', reason: 'signature_mismatch' });
    expect(processWebhookEventsMock).not.toHaveBeenCalled();
  });

  test('processes signed deliveries and reports the summary', async () => {
    processWebhookEventsMock.mockResolvedValue({ received: 1, processed: 1, skipped: 0, duplicates: 2, failed: 0 });
    const { res, result } = createResponse();

    await handler(
      createRequest({ method: 'POST', body: payload, headers: { 'x-hub-signature-256': signature(payload) } }),
      res,
    );

    expect(processWebhookEventsMock).toHaveBeenCalledTimes(1);
    expect(processWebhookEventsMock.mock.calls[0][0]).toEqual([
      expect.objectContaining({ key: 'msg:m_1', kind: 'message', senderId: '9001', text: 'LINK' }),
    ]);
    expect(result.statusCode).toBe(200);
    expect(result.json).toEqual({ ok: true, processed: 1, skipped: 2, failed: 0 });
  });

  test('answers 400 for a signed body that is not JSON', async () => {
    const { res, result } = createResponse();

    await handler(createRequest({ method: 'POST', body: 'oops', headers: { 'x-hub-signature-256': signature('oops') } }), res);

    expect(result.statusCode).toBe(400);
    expect(result.json).toEqual({ ok: false, error: 'invalid_json' });
  });

  test('only GET and POST are allowed', async () => {
    const { res, result } = createResponse();

    await handler(createRequest({ method: 'PUT' }), res);

    expect(result.statusCode).toBe(405);
    expect(result.headers.allow).toEqual(['GET', 'POST']);
  });
});
