import { beforeEach, describe, expect, test, vi } from 'vitest';
import type { AppUser } from '../lib/db/users.js';
import { createRequest, createResponse } from './helpers.js';

const requireUserMock = vi.fn();
const sbSelectMock = vi.fn();
const sbInsertMock = vi.fn();
const sbCountMock = vi.fn();

vi.mock('../lib/auth/session.js', () => ({ requireUser: requireUserMock }));

vi.mock('../lib/utils/sb.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../lib/utils/sb.js')>()),
  sbSelect: sbSelectMock,
  sbInsert: sbInsertMock,
  sbCount: sbCountMock,
}));

const handler = (await import('../api/automation/rules/index.js')).default;

const user: AppUser = {
  id: 'user-1',
  email: 'owner@example.com',
  full_name: null,
  plan_tier: 'basic',
  dodo_customer_id: null,
  created_at: '2025-01-01T00:00:00.000Z',
};

const accountRow = {
  id: 'acc-1',
  user_id: 'user-1',
  instagram_user_id: '17841400000000001',
  username: 'creator',
  access_token_encrypted: 'v1:iv:tag:data',
  is_active: true,
  created_at: '2025-01-01T00:00:00.000Z',
};

const ruleRow = {
  id: 'rule-9',
  user_id: 'user-1',
  instagram_account_id: 'acc-1',
  name: 'Guide',
  trigger_type: 'keyword',
  keywords: ['LINK'],
  media_id: null,
  is_active: true,
  config: { ask_for_email: true },
  created_at: '2025-03-01T00:00:00.000Z',
};

const post = (json: unknown) => createRequest({ method: 'POST', json, headers: { authorization: 'Bearer test-token' } });

beforeEach(() => {
  for (const mock of [requireUserMock, sbSelectMock, sbInsertMock, sbCountMock]) mock.mockReset();
  requireUserMock.mockResolvedValue(user);
  sbSelectMock.mockResolvedValue({ ok: true, status: 200, json: [accountRow] });
  sbCountMock.mockResolvedValue({ ok: true, status: 200, json: null, count: 2 });
  sbInsertMock.mockResolvedValue({ ok: true, status: 201, json: [ruleRow] });
});

describe('POST /api/automation/rules', () => {
  test('creates a rule on an owned account', async () => {
    const { res, result } = createResponse();

    await handler(
      post({ instagram_account_id: 'acc-1', name: 'Guide', trigger_type: 'keyword', keywords: ['LINK'], config: { ask_for_email: true } }),
      res,
    );

    expect(sbInsertMock).toHaveBeenCalledWith('automation_rules', {
      user_id: 'user-1',
      instagram_account_id: 'acc-1',
      name: 'Guide',
      trigger_type: 'keyword',
      keywords: ['LINK'],
      keyword: null,
      media_id: null,
      is_active: true,
      config: { ask_for_email: true },
    });
    expect(result.statusCode).toBe(201);
    expect(result.json).toEqual({
      ok: true,
      rule: {
        id: 'rule-9',
        instagram_account_id: 'acc-1',
        name: 'Guide',
        trigger_type: 'keyword',
        keywords: ['LINK'],
        media_id: null,
        is_active: true,
        config: { ask_for_email: true },
        created_at: '2025-03-01T00:00:00.000Z',
        updated_at: null,
      },
    });
  });

  test('rejects an invalid body', async () => {
    const { res, result } = createResponse();

    await handler(post({ instagram_account_id: 'acc-1', name: 'Guide', trigger_type: 'keyword' }), res);

    expect(result.statusCode).toBe(400);
    expect(result.json).toMatchObject({ ok: false, error: 'invalid_body' });
    expect(sbInsertMock).not.toHaveBeenCalled();
  });

  test('answers 404 for an account the user does not own', async () => {
    sbSelectMock.mockResolvedValue({ ok: true, status: 200, json: [] });
    const { res, result } = createResponse();

    await handler(post({ instagram_account_id: 'acc-2', name: 'Any comment', trigger_type: 'post_comment' }), res);

    expect(result.statusCode).toBe(404);
    expect(result.json).toEqual({ ok: false, error: 'account_not_found' });
  });

  test('keeps pro triggers for pro plans', async () => {
    const { res, result } = createResponse();

    await handler(post({ instagram_account_id: 'acc-1', name: 'Stories', trigger_type: 'story_reply' }), res);

    expect(result.statusCode).toBe(403);
    expect(result.json).toEqual({
      ok: false,
      error: 'pro_feature_required',
      detail: { trigger: 'story_reply', plan: 'basic' },
    });
  });

  test('enforces the rule limit of the plan', async () => {
    sbCountMock.mockResolvedValue({ ok: true, status: 200, json: null, count: 10 });
    const { res, result } = createResponse();

    await handler(post({ instagram_account_id: 'acc-1', name: 'Any comment', trigger_type: 'post_comment' }), res);

    expect(result.statusCode).toBe(403);
    expect(result.json).toEqual({
      ok: false,
      error: 'rule_limit_reached',
      detail: { limit: 10, used: 10, plan: 'basic' },
    });
  });
});
