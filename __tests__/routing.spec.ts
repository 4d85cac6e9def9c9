import { describe, expect, test } from 'vitest';
import { matchCommentRules, matchKeyword, matchMessageRule, type RoutableRule, type StateRef } from '../lib/flow/routing.js';
import type { FlowEvent, TriggerType } from '../lib/flow/types.js';

function rule(id: string, triggerType: TriggerType, overrides: Partial<RoutableRule> = {}): RoutableRule {
  return {
    id,
    triggerType,
    keywords: [],
    mediaId: null,
    isActive: true,
    deletedAt: null,
    createdAt: '2025-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function event(overrides: Partial<FlowEvent>): FlowEvent {
  return { kind: 'comment', senderId: 'ig-1', text: '', timestamp: 0, isTrigger: true, ...overrides };
}

const rules = [
  rule('kw', 'keyword', { keywords: ['LINK', 'guide'], createdAt: '2025-01-02T00:00:00.000Z' }),
  rule('post-m1', 'post_comment', { mediaId: 'm-1', createdAt: '2025-01-01T00:00:00.000Z' }),
  rule('post-any', 'post_comment', { createdAt: '2025-01-03T00:00:00.000Z' }),
  rule('live', 'live_comment'),
  rule('story', 'story_reply'),
  rule('welcome', 'new_message'),
  rule('paused', 'post_comment', { isActive: false }),
  rule('deleted', 'keyword', { keywords: ['promo'], deletedAt: '2025-02-01T00:00:00.000Z' }),
];

describe('matchKeyword', () => {
  test('matches the whole text ignoring case and surrounding spaces', () => {
    expect(matchKeyword(rules[0], '  link ')).toBe('LINK');
    expect(matchKeyword(rules[0], 'send me the link')).toBeNull();
  });
});

describe('matchCommentRules', () => {
  test('a keyword rule wins on its own', () => {
    const matches = matchCommentRules(rules, event({ text: 'Guide', mediaId: 'm-1' }));
    expect(matches.map((match) => [match.rule.id, match.keyword])).toEqual([['kw', 'guide']]);
  });

  test('otherwise every post comment rule for the media fires, oldest first', () => {
    const matches = matchCommentRules(rules, event({ text: 'love this', mediaId: 'm-1' }));
    expect(matches.map((match) => match.rule.id)).toEqual(['post-m1', 'post-any']);
    expect(matches.every((match) => match.isTrigger)).toBe(true);
  });

  test('rules scoped to another media are skipped', () => {
    const matches = matchCommentRules(rules, event({ text: 'love this', mediaId: 'm-2' }));
    expect(matches.map((match) => match.rule.id)).toEqual(['post-any']);
  });

  test('live comments go to live comment rules', () => {
    const matches = matchCommentRules(rules, event({ kind: 'live_comment', text: 'hi' }));
    expect(matches.map((match) => match.rule.id)).toEqual(['live']);
  });

  test('inactive and deleted rules never match', () => {
    expect(matchCommentRules([rules[6], rules[7]], event({ text: 'promo' }))).toEqual([]);
  });
});

describe('matchMessageRule', () => {
  const dm = (overrides: Partial<FlowEvent>) => event({ kind: 'message', isTrigger: false, ...overrides });

  test('a quick reply payload selects its rule', () => {
    const match = matchMessageRule(rules, dm({ text: 'Send me the link', payload: 'RULE:welcome:OPEN' }), []);
    expect(match?.rule.id).toBe('welcome');
    expect(match?.isTrigger).toBe(false);
  });

  test('keywords come before conversations in progress', () => {
    const states: StateRef[] = [{ ruleId: 'post-any', step: 'awaiting_email', updatedAt: '2025-02-01T00:00:00.000Z' }];
    const match = matchMessageRule(rules, dm({ text: 'LINK' }), states);
    expect(match).toEqual({ rule: rules[0], isTrigger: true, keyword: 'LINK' });
  });

  test('the most recently updated conversation receives free text', () => {
    const states: StateRef[] = [
      { ruleId: 'kw', step: 'awaiting_email', updatedAt: '2025-02-01T00:00:00.000Z' },
      { ruleId: 'post-any', step: 'awaiting_phone', updatedAt: '2025-02-03T00:00:00.000Z' },
      { ruleId: 'post-m1', step: 'completed', updatedAt: '2025-02-05T00:00:00.000Z' },
    ];
    const match = matchMessageRule(rules, dm({ text: 'ana@example.com' }), states);
    expect(match?.rule.id).toBe('post-any');
    expect(match?.isTrigger).toBe(false);
  });

  test('story replies go to the story rule', () => {
    const match = matchMessageRule(rules, dm({ kind: 'story_reply', text: '🔥' }), []);
    expect(match).toEqual({ rule: rules[4], isTrigger: true, keyword: null });
  });

  test('a first DM triggers the welcome rule, later ones do not', () => {
    expect(matchMessageRule(rules, dm({ text: 'hello' }), [])?.isTrigger).toBe(true);

    const seen: StateRef[] = [{ ruleId: 'welcome', step: 'completed', updatedAt: null }];
    const later = matchMessageRule(rules, dm({ text: 'hello again' }), seen);
    expect(later?.rule.id).toBe('welcome');
    expect(later?.isTrigger).toBe(false);
  });

  test('returns null when nothing applies', () => {
    expect(matchMessageRule([rules[0], rules[1]], dm({ text: 'hello' }), [])).toBeNull();
  });
});
