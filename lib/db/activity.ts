import { z } from 'zod';
import { eq, sbCount, sbInsert, sbRpc, sbSelect } from '../utils/sb.js';
import { expectOk, parseRows } from './rows.js';

export const ANALYTICS_EVENT_TYPES = [
  'trigger_matched',
  'dm_sent',
  'comment_replied',
  'link_clicked',
  'email_collected',
  'phone_collected',
  'follow_confirmed',
] as const;
export type AnalyticsEventType = (typeof ANALYTICS_EVENT_TYPES)[number];

export type RuleStatField = 'triggered' | 'dm_sent' | 'comment_replied' | 'lead_captured';

export type DmLog = {
  userId: string;
  accountId: string;
  ruleId: string | null;
  recipientId: string;
  commentId: string | null;
  delivery: 'dm' | 'private_reply' | 'public_reply';
  message: string;
  status: 'sent' | 'failed';
  error?: string | null;
};

export async function logDm(entry: DmLog) {
  const result = await sbInsert('dm_logs', {
    user_id: entry.userId,
    instagram_account_id: entry.accountId,
    rule_id: entry.ruleId,
    recipient_id: entry.recipientId,
    comment_id: entry.commentId,
    delivery: entry.delivery,
    message: entry.message,
    status: entry.status,
    error: entry.error ?? null,
  });
  expectOk('insert dm_logs', result);
}

/** Messages that count against the monthly allowance: anything sent privately, not public replies. */
export async function countDmsSince(userId: string, sinceIso: string) {
  const result = await sbCount(
    `dm_logs?select=id&user_id=${eq(userId)}&status=eq.sent&delivery=in.(dm,private_reply)&sent_at=gte.${encodeURIComponent(sinceIso)}`,
  );
  expectOk('count dm_logs', result);
  return result.count;
}

export async function logAnalyticsEvent(entry: {
  userId: string;
  accountId: string | null;
  ruleId: string | null;
  type: AnalyticsEventType;
  senderId?: string | null;
  metadata?: Record<string, unknown>;
}) {
  const result = await sbInsert('analytics_events', {
    user_id: entry.userId,
    instagram_account_id: entry.accountId,
    rule_id: entry.ruleId,
    event_type: entry.type,
    sender_id: entry.senderId ?? null,
    metadata: entry.metadata ?? {},
  });
  expectOk('insert analytics_events', result);
}

export async function incrementRuleStat(ruleId: string, field: RuleStatField, amount = 1) {
  expectOk(
    'rpc increment_rule_stat',
    await sbRpc('increment_rule_stat', { p_rule_id: ruleId, p_field: field, p_amount: amount }),
  );
}

const eventTypeRowSchema = z.object({
  event_type: z.enum(ANALYTICS_EVENT_TYPES),
  rule_id: z.string().nullable().default(null),
});

export async function listEventTypesSince(userId: string, sinceIso: string, ruleId?: string) {
  let qs = `analytics_events?select=event_type,rule_id&user_id=${eq(userId)}&created_at=gte.${encodeURIComponent(sinceIso)}`;
  if (ruleId) qs += `&rule_id=${eq(ruleId)}`;
  return parseRows(eventTypeRowSchema, await sbSelect(`${qs}&limit=10000`), 'select analytics_events');
}

const ruleStatsRowSchema = z.object({
  rule_id: z.string(),
  triggered: z.number().default(0),
  dm_sent: z.number().default(0),
  comment_replied: z.number().default(0),
  lead_captured: z.number().default(0),
  last_triggered_at: z.string().nullable().default(null),
});

export type RuleStats = z.output<typeof ruleStatsRowSchema>;

export async function listRuleStats(ruleIds: string[]) {
  if (!ruleIds.length) return [];
  const ids = ruleIds.map((id) => encodeURIComponent(id)).join(',');
  return parseRows(
    ruleStatsRowSchema,
    await sbSelect(`automation_rule_stats?select=*&rule_id=in.(${ids})`),
    'select automation_rule_stats',
  );
}
