import crypto from 'node:crypto';
import { z } from 'zod';
import { planForProduct, type PlanType } from '../config/plans.js';
import { findSubscription, upsertInvoice, upsertSubscription } from '../db/billing.js';
import { findUserByCustomer, getUser, updateUser } from '../db/users.js';

export const WEBHOOK_TOLERANCE_SECONDS = 5 * 60;

export type WebhookHeaders = {
  id: string;
  timestamp: string;
  signature: string;
};

function secretKey(secret: string) {
  const encoded = secret.startsWith('whsec_') ? secret.slice(6) : secret;
  return Buffer.from(encoded, 'base64');
}

/**
 * Standard Webhooks verification: HMAC-SHA256 over `id.timestamp.body`, base64-encoded,
 * matched against any `v1,<sig>` entry of the space-separated signature header.
 */
export function verifyDodoWebhook(params: {
  rawBody: Buffer | string;
  headers: WebhookHeaders;
  secret: string;
  now?: number;
}): { ok: boolean; reason?: string } {
  const { headers, secret } = params;
  if (!secret) return { ok: false, reason: 'missing_secret' };
  if (!headers.id || !headers.timestamp || !headers.signature) return { ok: false, reason: 'missing_headers' };

  const timestamp = Number(headers.timestamp);
  if (!Number.isFinite(timestamp)) return { ok: false, reason: 'invalid_timestamp' };
  const nowSeconds = Math.floor((params.now ?? Date.now()) / 1000);
  if (Math.abs(nowSeconds - timestamp) > WEBHOOK_TOLERANCE_SECONDS) {
    return { ok: false, reason: 'timestamp_out_of_tolerance' };
  }

  const body = typeof params.rawBody === 'string' ? params.rawBody : params.rawBody.toString('utf8');
  const expected = crypto
    .createHmac('sha256', secretKey(secret))
    .update(`${headers.id}.${headers.timestamp}.${body}`)
    .digest();

  for (const entry of headers.signature.split(' ')) {
    const [version, signature] = entry.split(',');
    if (version !== 'v1' || !signature) continue;
    const provided = Buffer.from(signature, 'base64');
    if (provided.length === expected.length && crypto.timingSafeEqual(provided, expected)) {
      return { ok: true };
    }
  }
  return { ok: false, reason: 'signature_mismatch' };
}

const customerSchema = z.object({ customer_id: z.string().optional(), email: z.string().optional() });

const eventDataSchema = z
  .object({
    subscription_id: z.string().optional(),
    payment_id: z.string().optional(),
    product_id: z.string().optional(),
    status: z.string().optional(),
    customer_id: z.string().optional(),
    customer: customerSchema.optional(),
    next_billing_date: z.string().optional(),
    cancel_at_next_billing_date: z.boolean().optional(),
    total_amount: z.number().optional(),
    currency: z.string().optional(),
    invoice_url: z.string().optional(),
    created_at: z.string().optional(),
    metadata: z.record(z.string(), z.unknown()).optional(),
  })
  .transform((data) => ({
    ...data,
    customerId: data.customer_id ?? data.customer?.customer_id ?? null,
    userId: typeof data.metadata?.user_id === 'string' ? data.metadata.user_id : null,
  }));

export const billingEventSchema = z.object({
  type: z.string(),
  business_id: z.string().optional(),
  timestamp: z.string().optional(),
  data: eventDataSchema,
});

export type BillingEvent = z.infer<typeof billingEventSchema>;
type EventData = BillingEvent['data'];

export type BillingOutcome = { handled: boolean; action: string; userId?: string };

async function resolveUserId(data: EventData): Promise<string | null> {
  if (data.userId) {
    const user = await getUser(data.userId);
    if (user) return user.id;
  }
  if (data.subscription_id) {
    const subscription = await findSubscription(data.subscription_id);
    if (subscription) return subscription.user_id;
  }
  if (data.customerId) {
    const user = await findUserByCustomer(data.customerId);
    if (user) return user.id;
  }
  return null;
}

async function saveSubscription(userId: string, data: EventData, planTier: PlanType, status: string) {
  if (!data.subscription_id) return;
  await upsertSubscription({
    userId,
    dodoSubscriptionId: data.subscription_id,
    dodoCustomerId: data.customerId,
    productId: data.product_id ?? null,
    planTier,
    status,
    currentPeriodEnd: data.next_billing_date ?? null,
    cancelAtPeriodEnd: status === 'cancelled' || Boolean(data.cancel_at_next_billing_date),
  });
}

async function currentPlan(userId: string, data: EventData): Promise<PlanType> {
  const fromProduct = planForProduct(data.product_id);
  if (fromProduct) return fromProduct;
  const existing = data.subscription_id ? await findSubscription(data.subscription_id) : null;
  const stored = existing?.plan_tier;
  if (stored === 'basic' || stored === 'pro' || stored === 'enterprise') return stored;
  const user = await getUser(userId);
  return user?.plan_tier ?? 'free';
}

export async function applyBillingEvent(event: BillingEvent): Promise<BillingOutcome> {
  const { type, data } = event;
  const userId = await resolveUserId(data);
  if (!userId) {
    console.warn('[dodo-webhook] no user for event', { type, subscription: data.subscription_id });
    return { handled: false, action: 'unknown_user' };
  }

  switch (type) {
    case 'subscription.active':
    case 'subscription.renewed':
    case 'subscription.plan_changed': {
      const plan = planForProduct(data.product_id);
      if (!plan) {
        console.warn('[dodo-webhook] unknown product', { type, product: data.product_id });
        return { handled: false, action: 'unknown_product', userId };
      }
      await saveSubscription(userId, data, plan, 'active');
      const patch: Parameters<typeof updateUser>[1] = { plan_tier: plan };
      if (data.customerId) patch.dodo_customer_id = data.customerId;
      await updateUser(userId, patch);
      return { handled: true, action: `plan_${plan}`, userId };
    }
    case 'subscription.on_hold':
    case 'subscription.failed': {
      await saveSubscription(userId, data, await currentPlan(userId, data), 'past_due');
      return { handled: true, action: 'past_due', userId };
    }
    case 'subscription.cancelled': {
      await saveSubscription(userId, data, await currentPlan(userId, data), 'cancelled');
      return { handled: true, action: 'cancelled', userId };
    }
    case 'subscription.expired': {
      await saveSubscription(userId, data, 'free', 'expired');
      await updateUser(userId, { plan_tier: 'free' });
      return { handled: true, action: 'downgraded', userId };
    }
    case 'payment.succeeded':
    case 'payment.failed': {
      if (!data.payment_id) return { handled: false, action: 'missing_payment_id', userId };
      const succeeded = type === 'payment.succeeded';
      await upsertInvoice({
        userId,
        dodoPaymentId: data.payment_id,
        dodoSubscriptionId: data.subscription_id ?? null,
        amount: (data.total_amount ?? 0) / 100,
        currency: data.currency ?? 'USD',
        status: succeeded ? 'paid' : 'failed',
        invoiceUrl: data.invoice_url ?? null,
        paidAt: succeeded ? data.created_at ?? new Date().toISOString() : null,
      });
      return { handled: true, action: succeeded ? 'invoice_paid' : 'invoice_failed', userId };
    }
    default:
      return { handled: false, action: 'ignored', userId };
  }
}
