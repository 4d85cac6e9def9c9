import type { RuleConfig } from './config.js';

export const TRIGGER_TYPES = ['keyword', 'post_comment', 'live_comment', 'story_reply', 'new_message'] as const;
export type TriggerType = (typeof TRIGGER_TYPES)[number];

export const FLOW_STEPS = [
  'idle',
  'awaiting_open',
  'awaiting_follow',
  'awaiting_email',
  'awaiting_phone',
  'completed',
] as const;
export type FlowStep = (typeof FLOW_STEPS)[number];

export type FlowState = {
  step: FlowStep;
  email: string | null;
  phone: string | null;
  followConfirmed: boolean;
  attempts: number;
  /** Last DM or postback from the visitor; comments do not open the messaging window. */
  lastInboundAt: string | null;
  updatedAt: string | null;
};

export type EventKind = 'comment' | 'live_comment' | 'message' | 'postback' | 'story_reply';

export type FlowEvent = {
  kind: EventKind;
  senderId: string;
  username?: string | null;
  text: string;
  payload?: string | null;
  commentId?: string | null;
  mediaId?: string | null;
  /** Epoch milliseconds. */
  timestamp: number;
  /** The event matched the rule's trigger (keyword, comment, story reply or first DM). */
  isTrigger: boolean;
  keyword?: string | null;
};

export type LeadProfile = {
  email: string | null;
  phone: string | null;
  followConfirmed: boolean;
  username?: string | null;
  name?: string | null;
};

export type FlowRule = {
  id: string;
  triggerType: TriggerType;
  config: RuleConfig;
};

export type QuickReply = { title: string; payload: string };
export type LinkButton = { text: string; url: string };

export type OutgoingMessage = {
  text: string;
  quickReplies?: QuickReply[];
  buttons?: LinkButton[];
};

export type Delivery = 'private_reply' | 'dm';

export type DecisionReason =
  | 'opening_sent'
  | 'prompt_follow'
  | 'prompt_email'
  | 'prompt_phone'
  | 'reward_sent'
  | 'vip_reward'
  | 'repeat_prompt'
  | 'repeat_trigger'
  | 'follow_recheck'
  | 'follow_no_exit'
  | 'email_retry'
  | 'email_disposable'
  | 'email_reminder'
  | 'phone_retry'
  | 'phone_got_email'
  | 'window_closed'
  | 'not_in_flow'
  | 'not_in_flow_input'
  | 'retries_exhausted';

export type Captured = { email?: string; phone?: string; followConfirmed?: boolean };

export type FlowDecision = {
  action: 'send' | 'ignore';
  reason: DecisionReason;
  delivery: Delivery;
  messages: OutgoingMessage[];
  publicReply: string | null;
  /** State to persist; null leaves the stored state untouched. */
  next: FlowState | null;
  captured: Captured;
  rewardDelivered: boolean;
  vip: boolean;
};

export type DecideInput = {
  rule: FlowRule;
  event: FlowEvent;
  state: FlowState | null;
  lead: LeadProfile;
  /** Result of the follow lookup; null when it was not or could not be checked. */
  isFollowing: boolean | null;
  accountUsername?: string | null;
  now: number;
  pick?: <T>(items: readonly T[]) => T;
  wrapLink?: (url: string) => string;
  isDisposable?: (email: string) => boolean;
};
