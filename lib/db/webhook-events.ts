import { z } from 'zod';
import { eq, sbInsert, sbPatch, sbSelect } from '../utils/sb.js';
import { expectOk, firstRow, parseRows } from './rows.js';

export type WebhookEventStatus = 'NEW' | 'PROCESSED' | 'SKIPPED' | 'FAILED';

const webhookEventRowSchema = z.object({
  id: z.string(),
  instagram_account_id: z.string(),
  event_key: z.string(),
  raw_payload: z.unknown(),
  status: z.enum(['NEW', 'PROCESSED', 'SKIPPED', 'FAILED']),
  attempt_count: z.number().int().default(0),
  permanent_failed: z.boolean().default(false),
  error: z.string().nullable().default(null),
  created_at: z.string(),
});

export type WebhookEventRecord = z.output<typeof webhookEventRowSchema>;

/** Stores the event once per account; a redelivery comes back as `{ duplicate: true }`. */
export async function recordWebhookEvent(accountId: string, eventKey: string, rawPayload: unknown) {
  const result = await sbInsert('webhook_events', {
    instagram_account_id: accountId,
    event_key: eventKey,
    raw_payload: rawPayload,
    status: 'NEW',
  });
  if (result.status === 409) return { duplicate: true as const, id: null };
  const row = firstRow(webhookEventRowSchema, result, 'insert webhook_events');
  return { duplicate: false as const, id: row?.id ?? null };
}

export async function markWebhookEvent(
  id: string,
  patch: { status: WebhookEventStatus; error?: string | null; attemptCount?: number; permanentFailed?: boolean },
) {
  const body: Record<string, unknown> = {
    status: patch.status,
    error: patch.error ?? null,
    last_attempt_at: new Date().toISOString(),
  };
  if (patch.attemptCount !== undefined) body.attempt_count = patch.attemptCount;
  if (patch.permanentFailed !== undefined) body.permanent_failed = patch.permanentFailed;
  expectOk('update webhook_events', await sbPatch(`webhook_events?id=${eq(id)}`, body));
}

export async function listReplayableEvents(limit: number, maxAttempts: number) {
  const query = [
    'webhook_events?select=*',
    'status=eq.FAILED',
    'permanent_failed=is.false',
    `attempt_count=lt.${maxAttempts}`,
    'order=created_at.asc',
    `limit=${limit}`,
  ].join('&');
  return parseRows(webhookEventRowSchema, await sbSelect(query), 'select webhook_events');
}

export async function latestWebhookEvents(limit: number) {
  return parseRows(
    webhookEventRowSchema,
    await sbSelect(`webhook_events?select=*&order=created_at.desc&limit=${limit}`),
    'select webhook_events',
  );
}
