import { z } from 'zod';
import { KEYWORD_LENGTH_MAX, KEYWORDS_MAX, parseRuleConfig } from './config.js';
import { normalizeKeyword } from './routing.js';
import { TRIGGER_TYPES } from './types.js';

const keywordsSchema = z
  .array(z.string().trim().min(1).max(KEYWORD_LENGTH_MAX))
  .max(KEYWORDS_MAX)
  .transform((keywords) => {
    const seen = new Set<string>();
    return keywords.filter((keyword) => {
      const key = normalizeKeyword(keyword);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  });

const ruleFields = {
  instagram_account_id: z.string().trim().min(1),
  name: z.string().trim().min(1).max(120),
  trigger_type: z.enum(TRIGGER_TYPES),
  keywords: keywordsSchema,
  media_id: z.preprocess((value) => (value === '' ? null : value), z.string().trim().min(1).nullable()),
  is_active: z.boolean(),
  config: z.record(z.string(), z.unknown()),
};

const withValidConfig = <T extends { config?: Record<string, unknown> }>(value: T, ctx: z.RefinementCtx) => {
  if (value.config === undefined) return;
  const parsed = parseRuleConfig(value.config);
  if (parsed.ok) return;
  for (const issue of parsed.issues) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['config', ...issue.path], message: issue.message });
  }
};

export const ruleCreateSchema = z
  .object({
    ...ruleFields,
    keywords: ruleFields.keywords.default([]),
    media_id: ruleFields.media_id.default(null),
    is_active: ruleFields.is_active.default(true),
    config: ruleFields.config.default({}),
  })
  .superRefine((value, ctx) => {
    if (value.trigger_type === 'keyword' && !value.keywords.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['keywords'], message: 'Keyword rules need at least one keyword' });
    }
    withValidConfig(value, ctx);
  });

export type RuleCreateInput = z.output<typeof ruleCreateSchema>;

/** Partial update; the account a rule belongs to cannot change. */
export const ruleUpdateSchema = z
  .object(ruleFields)
  .omit({ instagram_account_id: true })
  .partial()
  .superRefine(withValidConfig);

export type RuleUpdateInput = z.output<typeof ruleUpdateSchema>;
