import { buildTrackedUrl } from '../analytics/tracking.js';
import { dmAllowance } from '../billing/plan-enforcement.js';
import { canUseTrigger } from '../config/plans.js';
import { accountToken, findAccountByRecipient, getAccountById, type InstagramAccount } from '../db/accounts.js';
import { incrementRuleStat, logAnalyticsEvent, logDm, type AnalyticsEventType, type DmLog } from '../db/activity.js';
import { getAudienceMember, toLeadProfile, touchAudienceMember } from '../db/audience.js';
import { getFlowState, listSenderStates, saveFlowState, toStateRef } from '../db/flow-states.js';
import { upsertLead } from '../db/leads.js';
import { listActiveRulesForAccount, type AutomationRule } from '../db/rules.js';
import { getUser, type AppUser } from '../db/users.js';
import { markWebhookEvent, recordWebhookEvent, type WebhookEventRecord } from '../db/webhook-events.js';
import { parseRuleConfig } from '../flow/config.js';
import { decide, isCommentEvent, shouldCheckFollow } from '../flow/engine.js';
import { matchCommentRules, matchMessageRule, type RuleMatch } from '../flow/routing.js';
import type { FlowDecision, FlowEvent, LeadProfile } from '../flow/types.js';
import { inboundEventSchema, type InboundEvent } from '../instagram/events.js';
import {
  checkFollowsBusiness,
  getUserProfile,
  GraphError,
  replyToComment,
  sendDirectMessage,
  sendPrivateReply,
} from '../instagram/graph.js';
import { bestName } from '../names.js';
import { formatAlertPayload, postAlert } from '../utils/alert.js';

export type RuleOutcome = {
  ruleId: string;
  action: FlowDecision['action'] | 'skip';
  reason: string;
  sent: number;
};

export type EventOutcome = {
  status: 'processed' | 'skipped' | 'failed' | 'duplicate';
  reason?: string;
  rules: RuleOutcome[];
};

export type DeliverySummary = {
  received: number;
  processed: number;
  skipped: number;
  duplicates: number;
  failed: number;
};

type RuleContext = {
  account: InstagramAccount;
  user: AppUser;
  token: string;
  event: InboundEvent;
  match: RuleMatch<AutomationRule>;
  now: number;
};

const skip = (reason: string): EventOutcome => ({ status: 'skipped', reason, rules: [] });

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

/** Echoes of our own sends and comments written by the account itself. */
export function isOwnEvent(event: InboundEvent, account: InstagramAccount) {
  if (event.isEcho) return true;
  if (event.senderId === account.instagramUserId || event.senderId === account.pageId) return true;
  return Boolean(event.username && account.username && event.username.toLowerCase() === account.username.toLowerCase());
}

function toFlowEvent(event: InboundEvent, match: Pick<RuleMatch<AutomationRule>, 'isTrigger' | 'keyword'> | null): FlowEvent {
  return {
    kind: event.kind,
    senderId: event.senderId,
    username: event.username,
    text: event.text,
    payload: event.payload,
    commentId: event.commentId,
    mediaId: event.mediaId,
    timestamp: event.timestamp,
    isTrigger: match?.isTrigger ?? false,
    keyword: match?.keyword ?? null,
  };
}

async function routeEvent(account: InstagramAccount, event: InboundEvent) {
  const rules = await listActiveRulesForAccount(account.id);
  if (!rules.length) return [];
  if (isCommentEvent(event)) {
    return matchCommentRules(rules, toFlowEvent(event, { isTrigger: true, keyword: null }));
  }
  const states = await listSenderStates(
    rules.map((rule) => rule.id),
    event.senderId,
  );
  const match = matchMessageRule(rules, toFlowEvent(event, null), states.map(toStateRef));
  return match ? [match] : [];
}

async function track(ctx: RuleContext, type: AnalyticsEventType, metadata?: Record<string, unknown>) {
  await logAnalyticsEvent({
    userId: ctx.user.id,
    accountId: ctx.account.id,
    ruleId: ctx.match.rule.id,
    type,
    senderId: ctx.event.senderId,
    metadata,
  });
}

type DeliveryResult = { sent: number; publicReplied: boolean; windowClosed: boolean };

async function deliver(ctx: RuleContext, decision: FlowDecision): Promise<DeliveryResult> {
  const { event, token } = ctx;
  const result: DeliveryResult = { sent: 0, publicReplied: false, windowClosed: false };
  const base: Omit<DmLog, 'delivery' | 'message' | 'status'> = {
    userId: ctx.user.id,
    accountId: ctx.account.id,
    ruleId: ctx.match.rule.id,
    recipientId: event.senderId,
    commentId: event.commentId,
  };

  for (const message of decision.messages) {
    try {
      if (decision.delivery === 'private_reply') {
        if (!event.commentId) throw new Error('private reply requires a comment id');
        await sendPrivateReply(token, event.commentId, message);
      } else {
        await sendDirectMessage(token, event.senderId, message);
      }
      await logDm({ ...base, delivery: decision.delivery, message: message.text, status: 'sent' });
      result.sent += 1;
    } catch (error) {
      if (!(error instanceof GraphError)) throw error;
      await logDm({ ...base, delivery: decision.delivery, message: message.text, status: 'failed', error: error.message });
      if (!error.outsideWindow) throw error;
      console.warn('[automation] messaging window closed', { rule: ctx.match.rule.id, sender: event.senderId });
      result.windowClosed = true;
      return result;
    }
  }

  if (decision.publicReply && event.commentId) {
    try {
      await replyToComment(token, event.commentId, decision.publicReply);
      await logDm({ ...base, delivery: 'public_reply', message: decision.publicReply, status: 'sent' });
      result.publicReplied = true;
    } catch (error) {
      if (!(error instanceof GraphError)) throw error;
      // The private message already went out; a failed public reply does not fail the event.
      console.warn('[automation] comment reply failed', { comment: event.commentId, code: error.code });
      await logDm({ ...base, delivery: 'public_reply', message: decision.publicReply, status: 'failed', error: error.message });
    }
  }
  return result;
}

async function resolveName(ctx: RuleContext, lead: LeadProfile, email: string | null) {
  let fullName = lead.name ?? null;
  let username = lead.username ?? ctx.event.username;
  if (!fullName && !username) {
    try {
      const profile = await getUserProfile(ctx.token, ctx.event.senderId);
      fullName = profile.name;
      username = profile.username;
    } catch (error) {
      if (!(error instanceof GraphError)) throw error;
      console.warn('[automation] profile lookup failed', { sender: ctx.event.senderId, code: error.code });
    }
  }
  return { ...bestName({ fullName, username, email }), username: username ?? null, fullName };
}

async function runRule(ctx: RuleContext): Promise<RuleOutcome> {
  const { account, event, match, user, now } = ctx;
  const rule = match.rule;
  const outcome = (action: RuleOutcome['action'], reason: string, sent = 0): RuleOutcome => ({
    ruleId: rule.id,
    action,
    reason,
    sent,
  });

  const parsed = parseRuleConfig(rule.rawConfig);
  if (!parsed.ok) {
    console.warn('[automation] invalid rule config', { rule: rule.id, issues: parsed.issues.length });
    return outcome('skip', 'invalid_config');
  }
  if (!canUseTrigger(user.plan_tier, rule.triggerType)) {
    return outcome('skip', 'plan_restricted');
  }

  if (match.isTrigger) {
    await incrementRuleStat(rule.id, 'triggered');
    await track(ctx, 'trigger_matched', { keyword: match.keyword, kind: event.kind });
  }

  const allowance = await dmAllowance(user, new Date(now));
  if (!allowance.allowed) {
    console.warn('[automation] monthly DM limit reached', { user: user.id, used: allowance.used, limit: allowance.limit });
    return outcome('skip', 'dm_limit_reached');
  }

  const state = await getFlowState(rule.id, event.senderId);
  const member = await getAudienceMember(account.id, event.senderId);
  const lead = toLeadProfile(member);
  const isFollowing = shouldCheckFollow(parsed.config, lead)
    ? await checkFollowsBusiness(ctx.token, event.senderId)
    : null;

  const decision = decide({
    rule: { id: rule.id, triggerType: rule.triggerType, config: parsed.config },
    event: toFlowEvent(event, match),
    state,
    lead,
    isFollowing,
    accountUsername: account.username,
    now,
    wrapLink: (url) =>
      buildTrackedUrl({ url, ruleId: rule.id, accountId: account.id, userId: user.id, senderId: event.senderId }),
  });

  if (decision.action === 'ignore') {
    if (decision.next) await saveFlowState(rule.id, event.senderId, decision.next);
    return outcome('ignore', decision.reason);
  }

  const delivered = await deliver(ctx, decision);
  if (delivered.windowClosed && delivered.sent === 0) {
    return outcome('ignore', 'window_closed');
  }
  if (decision.next) await saveFlowState(rule.id, event.senderId, decision.next);

  const { captured } = decision;
  const followConfirmed = captured.followConfirmed || isFollowing === true;
  await touchAudienceMember(account.id, event.senderId, {
    username: event.username,
    email: captured.email ?? null,
    phone: captured.phone ?? null,
    is_following: followConfirmed ? true : null,
  });

  if (delivered.sent) {
    await incrementRuleStat(rule.id, 'dm_sent', delivered.sent);
    await track(ctx, 'dm_sent', { reason: decision.reason, delivery: decision.delivery, count: delivered.sent });
  }
  if (delivered.publicReplied) {
    await incrementRuleStat(rule.id, 'comment_replied');
    await track(ctx, 'comment_replied');
  }
  if (captured.followConfirmed) await track(ctx, 'follow_confirmed');
  if (captured.email) await track(ctx, 'email_collected');
  if (captured.phone) await track(ctx, 'phone_collected');

  if (captured.email || captured.phone) {
    const email = captured.email ?? decision.next?.email ?? lead.email;
    const phone = captured.phone ?? decision.next?.phone ?? lead.phone;
    const name = await resolveName(ctx, lead, email);
    const { created } = await upsertLead({
      userId: user.id,
      accountId: account.id,
      ruleId: rule.id,
      igUserId: event.senderId,
      igUsername: name.username,
      name: name.name,
      email,
      phone,
      source: rule.triggerType,
    });
    if (created) await incrementRuleStat(rule.id, 'lead_captured');
    if (name.fullName && !member?.name) {
      await touchAudienceMember(account.id, event.senderId, { name: name.fullName });
    }
  }

  console.log('[automation] decision', {
    rule: rule.id,
    sender: event.senderId,
    reason: decision.reason,
    delivery: decision.delivery,
    sent: delivered.sent,
  });
  return outcome('send', decision.reason, delivered.sent);
}

/** Routes one event of a known account through its rules and delivers the replies. */
export async function handleAccountEvent(
  account: InstagramAccount,
  event: InboundEvent,
  now = Date.now(),
): Promise<EventOutcome> {
  const user = await getUser(account.userId);
  if (!user) return skip('unknown_owner');

  const matches = await routeEvent(account, event);
  if (!matches.length) return skip('no_rule');

  const token = accountToken(account);
  const rules: RuleOutcome[] = [];
  for (const match of matches) {
    rules.push(await runRule({ account, user, token, event, match, now }));
  }
  const sent = rules.some((rule) => rule.action === 'send');
  return { status: sent ? 'processed' : 'skipped', reason: sent ? undefined : rules[0]?.reason, rules };
}

/**
 * Stores, dedupes and processes one webhook event. Failures are recorded on the stored
 * event for a later replay and never thrown to the webhook caller.
 */
export async function processInboundEvent(event: InboundEvent, now = Date.now()): Promise<EventOutcome> {
  const account = await findAccountByRecipient(event.recipientId);
  if (!account) {
    console.warn('[automation] no account for recipient', { recipient: event.recipientId, key: event.key });
    return skip('unknown_account');
  }
  if (isOwnEvent(event, account)) return skip('own_event');

  const record = await recordWebhookEvent(account.id, event.key, event);
  if (record.duplicate) return { status: 'duplicate', rules: [] };

  try {
    const outcome = await handleAccountEvent(account, event, now);
    if (record.id) {
      await markWebhookEvent(record.id, {
        status: outcome.status === 'processed' ? 'PROCESSED' : 'SKIPPED',
        error: outcome.reason ?? null,
        attemptCount: 1,
      });
    }
    return outcome;
  } catch (error) {
    const message = errorMessage(error);
    console.error('[automation] event failed', { key: event.key, account: account.id, error: message });
    if (record.id) {
      await markWebhookEvent(record.id, { status: 'FAILED', error: message, attemptCount: 1 });
    }
    await postAlert(
      formatAlertPayload({
        title: 'Instagram event failed',
        severity: 'error',
        message,
        meta: { key: event.key, account: account.id, kind: event.kind },
      }),
    );
    return { status: 'failed', reason: message, rules: [] };
  }
}

export async function processWebhookEvents(events: InboundEvent[], now = Date.now()): Promise<DeliverySummary> {
  const summary: DeliverySummary = { received: events.length, processed: 0, skipped: 0, duplicates: 0, failed: 0 };
  for (const event of events) {
    const outcome = await processInboundEvent(event, now);
    if (outcome.status === 'processed') summary.processed += 1;
    else if (outcome.status === 'duplicate') summary.duplicates += 1;
    else if (outcome.status === 'failed') summary.failed += 1;
    else summary.skipped += 1;
  }
  return summary;
}

export type ReplayOutcome = { id: string; status: 'PROCESSED' | 'SKIPPED' | 'FAILED'; error?: string };

/** Re-runs a stored FAILED event; the attempt that reaches `maxAttempts` marks it permanent. */
export async function replayWebhookEvent(
  record: WebhookEventRecord,
  maxAttempts: number,
  now = Date.now(),
): Promise<ReplayOutcome> {
  const attemptCount = record.attempt_count + 1;
  const fail = async (error: string): Promise<ReplayOutcome> => {
    const permanent = attemptCount >= maxAttempts;
    await markWebhookEvent(record.id, { status: 'FAILED', error, attemptCount, permanentFailed: permanent });
    return { id: record.id, status: 'FAILED', error };
  };

  const parsed = inboundEventSchema.safeParse(record.raw_payload);
  if (!parsed.success) {
    await markWebhookEvent(record.id, {
      status: 'FAILED',
      error: 'unreadable_payload',
      attemptCount,
      permanentFailed: true,
    });
    return { id: record.id, status: 'FAILED', error: 'unreadable_payload' };
  }

  const account = await getAccountById(record.instagram_account_id);
  if (!account || !account.isActive) {
    await markWebhookEvent(record.id, { status: 'SKIPPED', error: 'account_inactive', attemptCount });
    return { id: record.id, status: 'SKIPPED', error: 'account_inactive' };
  }

  try {
    const outcome = await handleAccountEvent(account, parsed.data, now);
    const status = outcome.status === 'processed' ? 'PROCESSED' : 'SKIPPED';
    await markWebhookEvent(record.id, { status, error: outcome.reason ?? null, attemptCount, permanentFailed: false });
    return { id: record.id, status };
  } catch (error) {
    const message = errorMessage(error);
    console.error('[automation] replay failed', { id: record.id, attempt: attemptCount, error: message });
    return fail(message);
  }
}
