import { parsePayload } from './payloads.js';
import type { FlowEvent, FlowStep, TriggerType } from './types.js';

export type RoutableRule = {
  id: string;
  triggerType: TriggerType;
  keywords: string[];
  mediaId: string | null;
  isActive: boolean;
  deletedAt: string | null;
  createdAt: string;
};

export type StateRef = { ruleId: string; step: FlowStep; updatedAt: string | null };

export type RuleMatch<R extends RoutableRule> = {
  rule: R;
  isTrigger: boolean;
  keyword: string | null;
};

const IN_PROGRESS: ReadonlySet<FlowStep> = new Set<FlowStep>([
  'awaiting_open',
  'awaiting_follow',
  'awaiting_email',
  'awaiting_phone',
]);

export function normalizeKeyword(value: string) {
  return value.trim().toLowerCase();
}

function live<R extends RoutableRule>(rules: R[]): R[] {
  return rules
    .filter((rule) => rule.isActive && !rule.deletedAt)
    .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

/** Returns the keyword the text matches exactly, ignoring case and surrounding whitespace. */
export function matchKeyword(rule: RoutableRule, text: string): string | null {
  const normalized = normalizeKeyword(text);
  if (!normalized) return null;
  const hit = rule.keywords.find((keyword) => normalizeKeyword(keyword) === normalized);
  return hit ?? null;
}

function firstKeywordMatch<R extends RoutableRule>(rules: R[], text: string): RuleMatch<R> | null {
  for (const rule of rules) {
    if (rule.triggerType !== 'keyword') continue;
    const keyword = matchKeyword(rule, text);
    if (keyword) return { rule, isTrigger: true, keyword };
  }
  return null;
}

/**
 * A keyword rule wins on its own; otherwise every comment rule scoped to the media
 * (or to no media) fires.
 */
export function matchCommentRules<R extends RoutableRule>(rules: R[], event: FlowEvent): RuleMatch<R>[] {
  const candidates = live(rules).filter((rule) => rule.mediaId === null || rule.mediaId === event.mediaId);
  const byKeyword = firstKeywordMatch(candidates, event.text);
  if (byKeyword) return [byKeyword];

  const wanted: TriggerType = event.kind === 'live_comment' ? 'live_comment' : 'post_comment';
  return candidates
    .filter((rule) => rule.triggerType === wanted)
    .map((rule) => ({ rule, isTrigger: true, keyword: null }));
}

export function matchMessageRule<R extends RoutableRule>(
  rules: R[],
  event: FlowEvent,
  states: StateRef[],
): RuleMatch<R> | null {
  const active = live(rules);
  const byId = new Map(active.map((rule) => [rule.id, rule]));

  const payload = parsePayload(event.payload);
  if (payload) {
    const rule = byId.get(payload.ruleId);
    if (rule) return { rule, isTrigger: false, keyword: null };
  }

  const byKeyword = firstKeywordMatch(active, event.text);
  if (byKeyword) return byKeyword;

  const inProgress = states
    .filter((state) => IN_PROGRESS.has(state.step) && byId.has(state.ruleId))
    .sort((a, b) => (b.updatedAt ?? '').localeCompare(a.updatedAt ?? ''));
  for (const state of inProgress) {
    const rule = byId.get(state.ruleId);
    if (rule) return { rule, isTrigger: false, keyword: null };
  }

  if (event.kind === 'story_reply') {
    const rule = active.find((candidate) => candidate.triggerType === 'story_reply');
    if (rule) return { rule, isTrigger: true, keyword: null };
  }

  if (event.kind === 'message') {
    const rule = active.find((candidate) => candidate.triggerType === 'new_message');
    if (rule) {
      // A finished conversation is not restarted by every later DM.
      const seen = states.some((state) => state.ruleId === rule.id && state.step !== 'idle');
      return { rule, isTrigger: !seen, keyword: null };
    }
  }

  return null;
}
