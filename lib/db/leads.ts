import { z } from 'zod';
import { eq, sbCount, sbDelete, sbPatch, sbSelect, sbUpsert } from '../utils/sb.js';
import { expectOk, firstRow, parseRows } from './rows.js';

const text = z.string().nullable().default(null);

const leadRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  instagram_account_id: text,
  rule_id: text,
  ig_user_id: z.coerce.string(),
  ig_username: text,
  name: text,
  email: text,
  phone: text,
  source: text,
  exported_at: text,
  created_at: z.string(),
});

export type Lead = z.output<typeof leadRowSchema>;

export type LeadFilter = { ruleId?: string; accountId?: string; limit: number; offset: number };

function filters(userId: string, filter: Partial<LeadFilter>) {
  const parts = [`user_id=${eq(userId)}`];
  if (filter.ruleId) parts.push(`rule_id=${eq(filter.ruleId)}`);
  if (filter.accountId) parts.push(`instagram_account_id=${eq(filter.accountId)}`);
  return parts.join('&');
}

export async function listLeads(userId: string, filter: LeadFilter) {
  const result = await sbSelect(
    `leads?select=*&${filters(userId, filter)}&order=created_at.desc&limit=${filter.limit}&offset=${filter.offset}`,
  );
  return parseRows(leadRowSchema, result, 'select leads');
}

export async function countLeads(userId: string, filter: Partial<LeadFilter> & { since?: string; has?: 'email' | 'phone' } = {}) {
  let qs = `leads?select=id&${filters(userId, filter)}`;
  if (filter.since) qs += `&created_at=gte.${encodeURIComponent(filter.since)}`;
  if (filter.has) qs += `&${filter.has}=not.is.null`;
  const result = await sbCount(qs);
  expectOk('count leads', result);
  return result.count;
}

/** Upserts on `(rule_id, ig_user_id)`; `created` is true only for the first row of that visitor. */
export async function upsertLead(row: {
  userId: string;
  accountId: string;
  ruleId: string;
  igUserId: string;
  igUsername: string | null;
  name: string | null;
  email: string | null;
  phone: string | null;
  source: string;
}) {
  const payload: Record<string, unknown> = {
    user_id: row.userId,
    instagram_account_id: row.accountId,
    rule_id: row.ruleId,
    ig_user_id: row.igUserId,
    source: row.source,
  };
  if (row.igUsername) payload.ig_username = row.igUsername;
  if (row.name) payload.name = row.name;
  if (row.email) payload.email = row.email;
  if (row.phone) payload.phone = row.phone;
  const existing = await sbSelect(
    `leads?select=id&rule_id=${eq(row.ruleId)}&ig_user_id=${eq(row.igUserId)}&limit=1`,
  );
  expectOk('select leads', existing);
  const created = !(Array.isArray(existing.json) && existing.json.length > 0);
  const result = await sbUpsert('leads', payload, 'rule_id,ig_user_id');
  return { lead: firstRow(leadRowSchema, result, 'upsert leads'), created };
}

export async function deleteLead(userId: string, leadId: string) {
  const result = await sbDelete(`leads?user_id=${eq(userId)}&id=${eq(leadId)}`);
  return parseRows(leadRowSchema, result, 'delete leads').length > 0;
}

export async function markLeadsExported(userId: string, ids: string[]) {
  if (!ids.length) return;
  const list = ids.map((id) => encodeURIComponent(id)).join(',');
  expectOk(
    'update leads',
    await sbPatch(`leads?user_id=${eq(userId)}&id=in.(${list})`, { exported_at: new Date().toISOString() }),
  );
}
