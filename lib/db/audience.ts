import { z } from 'zod';
import type { LeadProfile } from '../flow/types.js';
import { eq, sbSelect, sbUpsert } from '../utils/sb.js';
import { expectOk, firstRow } from './rows.js';

const text = z.string().nullable().default(null);

const audienceRowSchema = z.object({
  instagram_account_id: z.string(),
  sender_id: z.coerce.string(),
  username: text,
  name: text,
  email: text,
  phone: text,
  is_following: z.boolean().default(false),
  last_interaction_at: text,
});

export type AudienceMember = z.output<typeof audienceRowSchema>;

export type AudiencePatch = {
  [K in 'username' | 'name' | 'email' | 'phone' | 'is_following']?: AudienceMember[K] | null;
};

export function toLeadProfile(member: AudienceMember | null): LeadProfile {
  return {
    email: member?.email ?? null,
    phone: member?.phone ?? null,
    followConfirmed: member?.is_following ?? false,
    username: member?.username ?? null,
    name: member?.name ?? null,
  };
}

export async function getAudienceMember(accountId: string, senderId: string) {
  const result = await sbSelect(
    `instagram_audience?select=*&instagram_account_id=${eq(accountId)}&sender_id=${eq(senderId)}&limit=1`,
  );
  return firstRow(audienceRowSchema, result, 'select instagram_audience');
}

/** Records the interaction; null or absent fields in the patch keep what is stored. */
export async function touchAudienceMember(accountId: string, senderId: string, patch: AudiencePatch) {
  const row: Record<string, unknown> = {
    instagram_account_id: accountId,
    sender_id: senderId,
    last_interaction_at: new Date().toISOString(),
  };
  for (const [key, value] of Object.entries(patch)) {
    if (value !== null && value !== undefined) row[key] = value;
  }
  expectOk('upsert instagram_audience', await sbUpsert('instagram_audience', row, 'instagram_account_id,sender_id'));
}
