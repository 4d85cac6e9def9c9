import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

const sbCountMock = vi.fn();

vi.mock('../lib/utils/sb.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../lib/utils/sb.js')>()),
  sbCount: sbCountMock,
}));

const plans = await import('../lib/config/plans.js');
const enforcement = await import('../lib/billing/plan-enforcement.js');
const { ApiError } = await import('../lib/utils/http.js');

beforeEach(() => {
  sbCountMock.mockReset();
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('plan limits', () => {
  test('unknown plans fall back to free', () => {
    expect(plans.getPlanLimits('platinum')).toEqual({ accounts: 1, dmsPerMonth: 50, rules: 3 });
    expect(plans.getPlanLimits('PRO')).toEqual({ accounts: 10, dmsPerMonth: 5000, rules: 50 });
  });

  test('pro triggers need pro or enterprise', () => {
    expect(plans.canUseTrigger('basic', 'story_reply')).toBe(false);
    expect(plans.canUseTrigger('enterprise', 'new_message')).toBe(true);
    expect(plans.canUseTrigger('free', 'keyword')).toBe(true);
  });

  test('maps Dodo products to plans', () => {
    vi.stubEnv('DODO_PRODUCT_BASIC', 'prod_basic');
    vi.stubEnv('DODO_PRODUCT_PRO', 'prod_pro');
    expect(plans.planForProduct('prod_pro')).toBe('pro');
    expect(plans.planForProduct('prod_other')).toBeNull();
    expect(plans.productForPlan('basic')).toBe('prod_basic');
  });

  test('monthStartIso is the first of the month in UTC', () => {
    expect(plans.monthStartIso(new Date('2025-03-15T10:00:00.000Z'))).toBe('2025-03-01T00:00:00.000Z');
  });
});

describe('plan enforcement', () => {
  test('counts private messages sent since the start of the month', async () => {
    sbCountMock.mockResolvedValue({ ok: true, status: 200, json: null, count: 50 });

    const allowance = await enforcement.dmAllowance({ id: 'user-1', plan_tier: 'free' }, new Date('2025-03-15T10:00:00.000Z'));

    expect(allowance).toEqual({ allowed: false, used: 50, limit: 50 });
    expect(sbCountMock.mock.calls[0][0]).toBe(
      'dm_logs?select=id&user_id=eq.user-1&status=eq.sent&delivery=in.(dm,private_reply)&sent_at=gte.2025-03-01T00%3A00%3A00.000Z',
    );
  });

  test('blocks a second account on the free plan', async () => {
    sbCountMock.mockResolvedValue({ ok: true, status: 200, json: null, count: 1 });

    const error = await enforcement.assertCanAddAccount({ id: 'user-1', plan_tier: 'free' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ status: 403, code: 'account_limit_reached' });
  });

  test('allows rules below the limit and rejects pro triggers on basic', async () => {
    sbCountMock.mockResolvedValue({ ok: true, status: 200, json: null, count: 9 });

    await expect(enforcement.assertCanCreateRule({ id: 'user-1', plan_tier: 'basic' })).resolves.toBeUndefined();
    expect(() => enforcement.assertTriggerAllowed({ plan_tier: 'basic' }, 'live_comment')).toThrow('pro_feature_required');
  });
});
