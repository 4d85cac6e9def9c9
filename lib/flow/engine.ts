import { isDisposableEmail } from '../utils/disposable-email.js';
import { extractEmail, extractPhone } from '../utils/extract.js';
import { phoneCountry, renderTemplate, type RuleConfig } from './config.js';
import { isFollowConfirmation } from './confirmations.js';
import { buildPayload, parsePayload, type PayloadAction } from './payloads.js';
import { mergeForPrivateReply } from './render.js';
import type {
  Captured,
  DecideInput,
  DecisionReason,
  Delivery,
  FlowDecision,
  FlowEvent,
  FlowState,
  LeadProfile,
  OutgoingMessage,
} from './types.js';

export const MESSAGING_WINDOW_MS = 24 * 60 * 60 * 1000;

const IN_PROGRESS = new Set<FlowState['step']>(['awaiting_follow', 'awaiting_email', 'awaiting_phone']);

type Ctx = {
  input: DecideInput;
  config: RuleConfig;
  event: FlowEvent;
  delivery: Delivery;
  pick: <T>(items: readonly T[]) => T;
  wrapLink: (url: string) => string;
  isDisposable: (email: string) => boolean;
};

type SendExtras = { captured?: Captured; rewardDelivered?: boolean; vip?: boolean };

const randomPick = <T>(items: readonly T[]): T => items[Math.floor(Math.random() * items.length)];

export function initialFlowState(): FlowState {
  return {
    step: 'idle',
    email: null,
    phone: null,
    followConfirmed: false,
    attempts: 0,
    lastInboundAt: null,
    updatedAt: null,
  };
}

export function isCommentEvent(event: Pick<FlowEvent, 'kind'>) {
  return event.kind === 'comment' || event.kind === 'live_comment';
}

export function withinMessagingWindow(lastInboundAt: string | null, now: number) {
  if (!lastInboundAt) return false;
  const at = Date.parse(lastInboundAt);
  return Number.isFinite(at) && now - at < MESSAGING_WINDOW_MS;
}

/** Whether the caller should look up the follow status before calling `decide`. */
export function shouldCheckFollow(config: RuleConfig, lead: LeadProfile) {
  return config.flow_mode === 'standard' && config.ask_to_follow && config.verify_follow && !lead.followConfirmed;
}

function render(ctx: Ctx, text: string, state: FlowState) {
  const { event, input } = ctx;
  return renderTemplate(text, {
    username: event.username ?? input.lead.username,
    name: input.lead.name,
    email: state.email ?? input.lead.email,
    phone: state.phone ?? input.lead.phone,
    keyword: event.keyword,
  });
}

function ignore(delivery: Delivery, reason: DecisionReason, next: FlowState | null = null): FlowDecision {
  return {
    action: 'ignore',
    reason,
    delivery,
    messages: [],
    publicReply: null,
    next,
    captured: {},
    rewardDelivered: false,
    vip: false,
  };
}

function send(
  ctx: Ctx,
  messages: OutgoingMessage[],
  reason: DecisionReason,
  next: FlowState,
  extras: SendExtras = {},
): FlowDecision {
  const { config, event } = ctx;
  let publicReply: string | null = null;
  if (isCommentEvent(event) && event.isTrigger && config.auto_reply_to_comments && config.comment_replies.length) {
    publicReply = render(ctx, ctx.pick(config.comment_replies), next);
  }
  return {
    action: 'send',
    reason,
    delivery: ctx.delivery,
    messages: ctx.delivery === 'private_reply' ? mergeForPrivateReply(messages) : messages,
    publicReply,
    next,
    captured: extras.captured ?? {},
    rewardDelivered: extras.rewardDelivered ?? false,
    vip: extras.vip ?? false,
  };
}

/**
 * Re-asks within the current step; past `max_retries` the visitor leaves the flow and
 * whatever this reply carried (`next`, `captured`) is dropped.
 */
function retry(
  ctx: Ctx,
  state: FlowState,
  reason: DecisionReason,
  message: OutgoingMessage,
  extras: SendExtras & { next?: FlowState } = {},
): FlowDecision {
  const attempts = state.attempts + 1;
  if (attempts > ctx.config.max_retries) {
    return ignore(ctx.delivery, 'retries_exhausted', { ...state, step: 'idle', attempts: 0 });
  }
  const { next = state, ...rest } = extras;
  return send(ctx, [message], reason, { ...next, attempts }, rest);
}

function followPrompt(ctx: Ctx, state: FlowState, text: string): OutgoingMessage {
  const { config, input } = ctx;
  const message: OutgoingMessage = {
    text: render(ctx, text, state),
    quickReplies: [{ title: config.follow_button_text, payload: buildPayload(input.rule.id, 'FOLLOW') }],
  };
  if (input.accountUsername) {
    message.buttons = [{ text: 'Visit profile', url: `https://www.instagram.com/${input.accountUsername}/` }];
  }
  return message;
}

function stepPrompt(ctx: Ctx, state: FlowState): OutgoingMessage | null {
  const { config } = ctx;
  const simple = config.flow_mode === 'simple';
  switch (state.step) {
    case 'awaiting_follow':
      return followPrompt(ctx, state, config.ask_to_follow_message);
    case 'awaiting_email':
      return { text: render(ctx, simple ? config.simple_flow_message : config.ask_for_email_message, state) };
    case 'awaiting_phone':
      return {
        text: render(ctx, simple ? config.simple_flow_phone_message : config.ask_for_phone_message, state),
      };
    default:
      return null;
  }
}

function reward(
  ctx: Ctx,
  state: FlowState,
  reason: DecisionReason,
  prefix: OutgoingMessage[] = [],
  extras: SendExtras = {},
): FlowDecision {
  const { config } = ctx;
  const template = config.message_variations.length ? ctx.pick(config.message_variations) : config.message_template;
  const message: OutgoingMessage = { text: render(ctx, template, state) };
  if (config.buttons.length) {
    message.buttons = config.buttons.map((button) => ({ text: button.text, url: ctx.wrapLink(button.url) }));
  }
  const next: FlowState = { ...state, step: 'completed', attempts: 0 };
  return send(ctx, [...prefix, message], reason, next, { ...extras, rewardDelivered: true });
}

/** Moves to the first step still pending, or delivers the reward when none is. */
function advance(ctx: Ctx, state: FlowState, prefix: OutgoingMessage[], captured: Captured = {}): FlowDecision {
  const { config } = ctx;
  const steps: Array<[boolean, FlowState['step'], DecisionReason]> = [
    [config.ask_to_follow && !state.followConfirmed, 'awaiting_follow', 'prompt_follow'],
    [config.ask_for_email && !state.email, 'awaiting_email', 'prompt_email'],
    [config.ask_for_phone && !state.phone, 'awaiting_phone', 'prompt_phone'],
  ];
  for (const [pending, step, reason] of steps) {
    if (!pending) continue;
    const next: FlowState = { ...state, step, attempts: 0 };
    const prompt = stepPrompt(ctx, next);
    return send(ctx, prompt ? [...prefix, prompt] : prefix, reason, next, { captured });
  }
  return reward(ctx, state, 'reward_sent', prefix, { captured });
}

function startFlow(ctx: Ctx, base: FlowState): FlowDecision {
  const { config, input } = ctx;
  const skip = config.skip_known_steps;
  const seeded: FlowState = {
    ...base,
    step: 'idle',
    attempts: 0,
    followConfirmed: skip ? input.lead.followConfirmed || input.isFollowing === true : false,
    email: skip ? input.lead.email : null,
    phone: skip ? input.lead.phone : null,
  };

  if (config.flow_mode === 'simple') {
    if (config.ask_for_phone) {
      if (seeded.phone) return reward(ctx, seeded, 'vip_reward', [], { vip: true });
      const next: FlowState = { ...seeded, step: 'awaiting_phone' };
      return send(ctx, [{ text: render(ctx, config.simple_flow_phone_message, next) }], 'prompt_phone', next);
    }
    if (config.ask_for_email) {
      if (seeded.email) return reward(ctx, seeded, 'vip_reward', [], { vip: true });
      const next: FlowState = { ...seeded, step: 'awaiting_email' };
      return send(ctx, [{ text: render(ctx, config.simple_flow_message, next) }], 'prompt_email', next);
    }
    return reward(ctx, seeded, 'reward_sent');
  }

  const requested = config.ask_to_follow || config.ask_for_email || config.ask_for_phone;
  const vip =
    requested &&
    (!config.ask_to_follow || seeded.followConfirmed) &&
    (!config.ask_for_email || Boolean(seeded.email)) &&
    (!config.ask_for_phone || Boolean(seeded.phone));
  if (vip) return reward(ctx, seeded, 'vip_reward', [], { vip: true });

  return advance(ctx, seeded, []);
}

function onTrigger(ctx: Ctx, base: FlowState): FlowDecision {
  if (IN_PROGRESS.has(base.step)) {
    const prompt = stepPrompt(ctx, base);
    return send(ctx, prompt ? [prompt] : [], 'repeat_prompt', base);
  }
  if (base.step === 'completed') {
    return reward(ctx, base, 'repeat_trigger');
  }
  const { config, event, input } = ctx;
  if (isCommentEvent(event) && ctx.delivery === 'private_reply' && config.opening_message) {
    const next: FlowState = { ...base, step: 'awaiting_open', attempts: 0 };
    const opening: OutgoingMessage = {
      text: render(ctx, config.opening_message, next),
      quickReplies: [{ title: config.opening_button_text, payload: buildPayload(input.rule.id, 'OPEN') }],
    };
    return send(ctx, [opening], 'opening_sent', next);
  }
  return startFlow(ctx, base);
}

function onFollowInput(ctx: Ctx, state: FlowState, action: PayloadAction | null): FlowDecision {
  const { config, event, input } = ctx;
  const confirmed = action === 'FOLLOW' || isFollowConfirmation(event.text);
  if (!confirmed) {
    if (!config.follow_no_exit) return ignore(ctx.delivery, 'not_in_flow_input', state);
    return retry(ctx, state, 'follow_no_exit', followPrompt(ctx, state, config.follow_no_exit_message));
  }
  if (config.verify_follow && input.isFollowing === false) {
    return retry(ctx, state, 'follow_recheck', followPrompt(ctx, state, config.follow_recheck_message));
  }
  return advance(ctx, { ...state, followConfirmed: true, attempts: 0 }, [], { followConfirmed: true });
}

function onEmailInput(ctx: Ctx, state: FlowState, action: PayloadAction | null): FlowDecision {
  const { config, event } = ctx;
  const simple = config.flow_mode === 'simple';
  const email = extractEmail(event.text)?.email;

  if (email) {
    if (config.block_disposable_emails && ctx.isDisposable(email)) {
      return retry(ctx, state, 'email_disposable', { text: render(ctx, config.email_disposable_message, state) });
    }
    const next: FlowState = { ...state, email, attempts: 0 };
    if (simple) return reward(ctx, next, 'reward_sent', [], { captured: { email } });
    const prefix = config.send_email_success ? [{ text: render(ctx, config.email_success_message, next) }] : [];
    return advance(ctx, next, prefix, { email });
  }

  if (simple) {
    return retry(ctx, state, 'email_retry', { text: render(ctx, config.simple_flow_email_question, state) });
  }
  if (action === 'FOLLOW' || isFollowConfirmation(event.text)) {
    return retry(ctx, state, 'email_reminder', { text: render(ctx, config.email_friendly_reminder, state) });
  }
  return retry(ctx, state, 'email_retry', { text: render(ctx, config.email_retry_message, state) });
}

function onPhoneInput(ctx: Ctx, state: FlowState): FlowDecision {
  const { config, event } = ctx;
  const simple = config.flow_mode === 'simple';
  const phone = extractPhone(event.text, phoneCountry(config));

  if (phone) {
    const next: FlowState = { ...state, phone, attempts: 0 };
    if (simple) return reward(ctx, next, 'reward_sent', [], { captured: { phone } });
    return advance(ctx, next, [], { phone });
  }

  const email = simple ? undefined : extractEmail(event.text)?.email;
  if (email && !(config.block_disposable_emails && ctx.isDisposable(email))) {
    const next: FlowState = { ...state, email: state.email ?? email };
    const captured: Captured = state.email ? {} : { email };
    return retry(ctx, state, 'phone_got_email', { text: render(ctx, config.phone_got_email_message, next) }, {
      next,
      captured,
    });
  }

  const question = simple ? config.simple_flow_phone_question : config.phone_invalid_retry_message;
  return retry(ctx, state, 'phone_retry', { text: render(ctx, question, state) });
}

/**
 * Decides the reply to one inbound comment, DM or postback for a single rule.
 * Pure: all lookups (stored state, lead profile, follow status) are resolved by the caller.
 */
export function decide(input: DecideInput): FlowDecision {
  const { event, now } = input;
  const config = input.rule.config;
  const prior = input.state ?? initialFlowState();
  const inboundDm = !isCommentEvent(event);

  if (inboundDm && now - event.timestamp > MESSAGING_WINDOW_MS) {
    return ignore('dm', 'window_closed');
  }

  const base: FlowState = {
    ...prior,
    lastInboundAt: inboundDm ? new Date(event.timestamp).toISOString() : prior.lastInboundAt,
    updatedAt: new Date(now).toISOString(),
  };

  const ctx: Ctx = {
    input,
    config,
    event,
    delivery: inboundDm || withinMessagingWindow(base.lastInboundAt, now) ? 'dm' : 'private_reply',
    pick: input.pick ?? randomPick,
    wrapLink: input.wrapLink ?? ((url) => url),
    isDisposable: input.isDisposable ?? isDisposableEmail,
  };

  const payload = parsePayload(event.payload);
  const action = payload && payload.ruleId === input.rule.id ? payload.action : null;

  if (action === 'OPEN') {
    if (IN_PROGRESS.has(base.step)) return onTrigger(ctx, base);
    return startFlow(ctx, base);
  }
  if (event.isTrigger) return onTrigger(ctx, base);

  switch (base.step) {
    case 'awaiting_open':
      return startFlow(ctx, base);
    case 'awaiting_follow':
      return onFollowInput(ctx, base, action);
    case 'awaiting_email':
      return onEmailInput(ctx, base, action);
    case 'awaiting_phone':
      return onPhoneInput(ctx, base);
    default:
      return ignore(ctx.delivery, 'not_in_flow', input.state ? base : null);
  }
}
