import { z } from 'zod';
import { TRIGGER_TYPES, type TriggerType } from '../flow/types.js';
import { eq, sbCount, sbInsert, sbPatch, sbSelect } from '../utils/sb.js';
import { expectOk, firstRow, parseRows } from './rows.js';

const text = z.string().nullable().default(null);

const ruleRowSchema = z
  .object({
    id: z.string(),
    user_id: z.string(),
    instagram_account_id: z.string(),
    name: z.string(),
    trigger_type: z.enum(TRIGGER_TYPES),
    keywords: z.array(z.string()).nullable().default(null),
    keyword: text,
    media_id: text,
    is_active: z.boolean().default(true),
    config: z.unknown(),
    deleted_at: text,
    created_at: z.string(),
    updated_at: text,
  })
  .transform((row) => {
    // Rules created before multi-keyword support keep a single `keyword` column.
    const keywords = [...(row.keywords ?? [])];
    if (row.keyword && !keywords.includes(row.keyword)) keywords.push(row.keyword);
    return {
      id: row.id,
      userId: row.user_id,
      accountId: row.instagram_account_id,
      name: row.name,
      triggerType: row.trigger_type,
      keywords,
      mediaId: row.media_id,
      isActive: row.is_active,
      rawConfig: row.config ?? {},
      deletedAt: row.deleted_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  });

export type AutomationRule = z.output<typeof ruleRowSchema>;

export type RuleInsert = {
  instagramAccountId: string;
  name: string;
  triggerType: TriggerType;
  keywords: string[];
  mediaId: string | null;
  isActive: boolean;
  config: Record<string, unknown>;
};

export type RuleWrite = Partial<RuleInsert>;

function toRow(write: RuleWrite): Record<string, unknown> {
  const row: Record<string, unknown> = {};
  if (write.instagramAccountId !== undefined) row.instagram_account_id = write.instagramAccountId;
  if (write.name !== undefined) row.name = write.name;
  if (write.triggerType !== undefined) row.trigger_type = write.triggerType;
  if (write.keywords !== undefined) {
    row.keywords = write.keywords;
    row.keyword = null;
  }
  if (write.mediaId !== undefined) row.media_id = write.mediaId;
  if (write.isActive !== undefined) row.is_active = write.isActive;
  if (write.config !== undefined) row.config = write.config;
  return row;
}

export function publicRule(rule: AutomationRule, config: unknown = rule.rawConfig) {
  return {
    id: rule.id,
    instagram_account_id: rule.accountId,
    name: rule.name,
    trigger_type: rule.triggerType,
    keywords: rule.keywords,
    media_id: rule.mediaId,
    is_active: rule.isActive,
    config,
    created_at: rule.createdAt,
    updated_at: rule.updatedAt,
  };
}

export async function listActiveRulesForAccount(accountId: string) {
  const result = await sbSelect(
    `automation_rules?select=*&instagram_account_id=${eq(accountId)}&is_active=is.true&deleted_at=is.null&order=created_at.asc`,
  );
  return parseRows(ruleRowSchema, result, 'select automation_rules');
}

export async function listRules(userId: string, accountId?: string) {
  const filters = [`user_id=${eq(userId)}`, 'deleted_at=is.null'];
  if (accountId) filters.push(`instagram_account_id=${eq(accountId)}`);
  const result = await sbSelect(`automation_rules?select=*&${filters.join('&')}&order=created_at.desc`);
  return parseRows(ruleRowSchema, result, 'select automation_rules');
}

export async function getRule(userId: string, ruleId: string) {
  const result = await sbSelect(
    `automation_rules?select=*&user_id=${eq(userId)}&id=${eq(ruleId)}&deleted_at=is.null&limit=1`,
  );
  return firstRow(ruleRowSchema, result, 'select automation_rules');
}

export async function countRules(userId: string) {
  const result = await sbCount(`automation_rules?select=id&user_id=${eq(userId)}&deleted_at=is.null`);
  expectOk('count automation_rules', result);
  return result.count;
}

export async function insertRule(userId: string, write: RuleInsert) {
  const result = await sbInsert('automation_rules', { user_id: userId, ...toRow(write) });
  const rule = firstRow(ruleRowSchema, result, 'insert automation_rules');
  if (!rule) throw new Error('Supabase returned no rule row');
  return rule;
}

export async function updateRule(userId: string, ruleId: string, write: RuleWrite) {
  const result = await sbPatch(
    `automation_rules?user_id=${eq(userId)}&id=${eq(ruleId)}&deleted_at=is.null`,
    toRow(write),
  );
  return firstRow(ruleRowSchema, result, 'update automation_rules');
}

export async function softDeleteRule(userId: string, ruleId: string) {
  const result = await sbPatch(`automation_rules?user_id=${eq(userId)}&id=${eq(ruleId)}&deleted_at=is.null`, {
    deleted_at: new Date().toISOString(),
    is_active: false,
  });
  return firstRow(ruleRowSchema, result, 'delete automation_rules');
}
