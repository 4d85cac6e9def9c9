import { z } from 'zod';
import type { PlanType } from '../config/plans.js';
import { eq, sbDelete, sbInsert, sbSelect, sbUpsert } from '../utils/sb.js';
import { expectOk, firstRow, parseRows } from './rows.js';

const text = z.string().nullable().default(null);

const subscriptionRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  dodo_subscription_id: z.string(),
  dodo_customer_id: text,
  product_id: text,
  plan_tier: z.string(),
  status: z.string(),
  current_period_end: text,
  cancel_at_period_end: z.boolean().default(false),
});

export type SubscriptionRecord = z.output<typeof subscriptionRowSchema>;

const invoiceRowSchema = z.object({
  id: z.string(),
  dodo_payment_id: z.string(),
  dodo_subscription_id: text,
  amount: z.coerce.number(),
  currency: z.string(),
  status: z.string(),
  invoice_url: text,
  paid_at: text,
  created_at: z.string(),
});

export type InvoiceRecord = z.output<typeof invoiceRowSchema>;

export async function findSubscription(dodoSubscriptionId: string) {
  return firstRow(
    subscriptionRowSchema,
    await sbSelect(`subscriptions?select=*&dodo_subscription_id=${eq(dodoSubscriptionId)}&limit=1`),
    'select subscriptions',
  );
}

export async function latestSubscription(userId: string) {
  return firstRow(
    subscriptionRowSchema,
    await sbSelect(`subscriptions?select=*&user_id=${eq(userId)}&order=updated_at.desc&limit=1`),
    'select subscriptions',
  );
}

export async function upsertSubscription(row: {
  userId: string;
  dodoSubscriptionId: string;
  dodoCustomerId: string | null;
  productId: string | null;
  planTier: PlanType;
  status: string;
  currentPeriodEnd: string | null;
  cancelAtPeriodEnd: boolean;
}) {
  const result = await sbUpsert(
    'subscriptions',
    {
      user_id: row.userId,
      dodo_subscription_id: row.dodoSubscriptionId,
      dodo_customer_id: row.dodoCustomerId,
      product_id: row.productId,
      plan_tier: row.planTier,
      status: row.status,
      current_period_end: row.currentPeriodEnd,
      cancel_at_period_end: row.cancelAtPeriodEnd,
    },
    'dodo_subscription_id',
  );
  expectOk('upsert subscriptions', result);
}

export async function upsertInvoice(row: {
  userId: string;
  dodoPaymentId: string;
  dodoSubscriptionId: string | null;
  amount: number;
  currency: string;
  status: string;
  invoiceUrl: string | null;
  paidAt: string | null;
}) {
  const result = await sbUpsert(
    'invoices',
    {
      user_id: row.userId,
      dodo_payment_id: row.dodoPaymentId,
      dodo_subscription_id: row.dodoSubscriptionId,
      amount: row.amount,
      currency: row.currency,
      status: row.status,
      invoice_url: row.invoiceUrl,
      paid_at: row.paidAt,
    },
    'dodo_payment_id',
  );
  expectOk('upsert invoices', result);
}

export async function listInvoices(userId: string, limit: number) {
  return parseRows(
    invoiceRowSchema,
    await sbSelect(`invoices?select=*&user_id=${eq(userId)}&order=created_at.desc&limit=${limit}`),
    'select invoices',
  );
}

/** Returns false when the webhook id was already recorded. */
export async function recordBillingEvent(webhookId: string, eventType: string, payload: unknown) {
  const result = await sbInsert('billing_events', { webhook_id: webhookId, event_type: eventType, payload });
  if (result.status === 409) return false;
  expectOk('insert billing_events', result);
  return true;
}

/** Drops the dedupe record so the provider's retry is applied again. */
export async function forgetBillingEvent(webhookId: string) {
  expectOk('delete billing_events', await sbDelete(`billing_events?webhook_id=${eq(webhookId)}`));
}
