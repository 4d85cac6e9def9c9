import crypto from 'node:crypto';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

const getUserMock = vi.fn();
const findUserByCustomerMock = vi.fn();
const updateUserMock = vi.fn();
const findSubscriptionMock = vi.fn();
const upsertSubscriptionMock = vi.fn();
const upsertInvoiceMock = vi.fn();

vi.mock('../lib/db/users.js', () => ({
  getUser: getUserMock,
  findUserByCustomer: findUserByCustomerMock,
  updateUser: updateUserMock,
}));

vi.mock('../lib/db/billing.js', () => ({
  findSubscription: findSubscriptionMock,
  upsertSubscription: upsertSubscriptionMock,
  upsertInvoice: upsertInvoiceMock,
}));

const { applyBillingEvent, billingEventSchema, verifyDodoWebhook } = await import('../lib/billing/webhook.js');

const SECRET = `whsec_${Buffer.from('test-secret').toString('base64')}`;
const NOW = 1_740_000_000_000;

function sign(id: string, timestamp: string, body: string) {
  return crypto.createHmac('sha256', 'test-secret').update(`${id}.${timestamp}.${body}`).digest('base64');
}

beforeEach(() => {
  for (const mock of [
    getUserMock,
    findUserByCustomerMock,
    updateUserMock,
    findSubscriptionMock,
    upsertSubscriptionMock,
    upsertInvoiceMock,
  ]) {
    mock.mockReset();
  }
  getUserMock.mockResolvedValue(null);
  findUserByCustomerMock.mockResolvedValue(null);
  findSubscriptionMock.mockResolvedValue(null);
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('verifyDodoWebhook', () => {
  const body = '{"type":"payment.succeeded"}';
  const timestamp = String(NOW / 1000);

  test('accepts any v1 signature in the header', () => {
    const headers = { id: 'msg_1', timestamp, signature: `v1,bm9wZQ== v1,${sign('msg_1', timestamp, body)}` };
    expect(verifyDodoWebhook({ rawBody: body, headers, secret: SECRET, now: NOW })).toEqual({ ok: true });
  });

  test.each([
    [{ id: 'msg_1', timestamp, signature: 'v1,bm9wZQ==' }, SECRET, 'signature_mismatch'],
    [{ id: 'msg_1', timestamp: String(NOW / 1000 - 301), signature: 'v1,x' }, SECRET, 'timestamp_out_of_tolerance'],
    [{ id: 'msg_1', timestamp: 'soon', signature: 'v1,x' }, SECRET, 'invalid_timestamp'],
    [{ id: '', timestamp, signature: 'v1,x' }, SECRET, 'missing_headers'],
    [{ id: 'msg_1', timestamp, signature: 'v1,x' }, '', 'missing_secret'],
  ])('rejects %j', (headers, secret, reason) => {
    expect(verifyDodoWebhook({ rawBody: body, headers, secret, now: NOW })).toEqual({ ok: false, reason });
  });
});

describe('applyBillingEvent', () => {
  test('activates the plan for the product and stores the customer', async () => {
    vi.stubEnv('DODO_PRODUCT_PRO', 'prod_pro');
    getUserMock.mockResolvedValue({ id: 'user-1', plan_tier: 'free' });

    const outcome = await applyBillingEvent(
      billingEventSchema.parse({
        type: 'subscription.active',
        data: {
          subscription_id: 'sub_1',
          product_id: 'prod_pro',
          customer: { customer_id: 'cus_1', email: 'ana@example.com' },
          next_billing_date: '2025-04-01T00:00:00Z',
          metadata: { user_id: 'user-1' },
        },
      }),
    );

    expect(outcome).toEqual({ handled: true, action: 'plan_pro', userId: 'user-1' });
    expect(upsertSubscriptionMock).toHaveBeenCalledWith({
      userId: 'user-1',
      dodoSubscriptionId: 'sub_1',
      dodoCustomerId: 'cus_1',
      productId: 'prod_pro',
      planTier: 'pro',
      status: 'active',
      currentPeriodEnd: '2025-04-01T00:00:00Z',
      cancelAtPeriodEnd: false,
    });
    expect(updateUserMock).toHaveBeenCalledWith('user-1', { plan_tier: 'pro', dodo_customer_id: 'cus_1' });
  });

  test('downgrades to free when the subscription expires', async () => {
    findSubscriptionMock.mockResolvedValue({ user_id: 'user-2', plan_tier: 'pro' });

    const outcome = await applyBillingEvent(
      billingEventSchema.parse({ type: 'subscription.expired', data: { subscription_id: 'sub_2' } }),
    );

    expect(outcome).toEqual({ handled: true, action: 'downgraded', userId: 'user-2' });
    expect(upsertSubscriptionMock.mock.calls[0][0]).toMatchObject({ planTier: 'free', status: 'expired' });
    expect(updateUserMock).toHaveBeenCalledWith('user-2', { plan_tier: 'free' });
  });

  test('keeps the stored plan when a subscription is cancelled', async () => {
    findSubscriptionMock.mockResolvedValue({ user_id: 'user-2', plan_tier: 'basic' });

    const outcome = await applyBillingEvent(
      billingEventSchema.parse({ type: 'subscription.cancelled', data: { subscription_id: 'sub_2' } }),
    );

    expect(outcome.action).toBe('cancelled');
    expect(upsertSubscriptionMock.mock.calls[0][0]).toMatchObject({
      planTier: 'basic',
      status: 'cancelled',
      cancelAtPeriodEnd: true,
    });
    expect(updateUserMock).not.toHaveBeenCalled();
  });

  test('records paid invoices in major units', async () => {
    findUserByCustomerMock.mockResolvedValue({ id: 'user-3' });

    const outcome = await applyBillingEvent(
      billingEventSchema.parse({
        type: 'payment.succeeded',
        data: { payment_id: 'pay_1', customer_id: 'cus_3', total_amount: 2900, created_at: '2025-03-01T00:00:00Z' },
      }),
    );

    expect(outcome).toEqual({ handled: true, action: 'invoice_paid', userId: 'user-3' });
    expect(upsertInvoiceMock).toHaveBeenCalledWith({
      userId: 'user-3',
      dodoPaymentId: 'pay_1',
      dodoSubscriptionId: null,
      amount: 29,
      currency: 'USD',
      status: 'paid',
      invoiceUrl: null,
      paidAt: '2025-03-01T00:00:00Z',
    });
  });

  test('reports events it cannot place', async () => {
    const unknownUser = await applyBillingEvent(
      billingEventSchema.parse({ type: 'subscription.active', data: { product_id: 'prod_pro' } }),
    );
    expect(unknownUser).toEqual({ handled: false, action: 'unknown_user' });

    getUserMock.mockResolvedValue({ id: 'user-1', plan_tier: 'free' });
    const unknownProduct = await applyBillingEvent(
      billingEventSchema.parse({
        type: 'subscription.renewed',
        data: { product_id: 'prod_other', metadata: { user_id: 'user-1' } },
      }),
    );
    expect(unknownProduct).toEqual({ handled: false, action: 'unknown_product', userId: 'user-1' });
    expect(upsertSubscriptionMock).not.toHaveBeenCalled();
  });
});
