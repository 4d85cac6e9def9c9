import { z } from 'zod';
import { PLAN_TYPES, type PlanType } from '../config/plans.js';
import { eq, sbPatch, sbSelect, sbUpsert } from '../utils/sb.js';
import { firstRow } from './rows.js';

const text = z.string().nullable().default(null);

const userRowSchema = z.object({
  id: z.string(),
  email: text,
  full_name: text,
  plan_tier: z.enum(PLAN_TYPES).catch('free'),
  dodo_customer_id: text,
  created_at: z.string(),
});

export type AppUser = z.output<typeof userRowSchema>;

export async function getUser(userId: string) {
  return firstRow(userRowSchema, await sbSelect(`users?select=*&id=${eq(userId)}&limit=1`), 'select users');
}

/** Creates the profile row on first sight of an auth user; existing rows keep their plan. */
export async function ensureUser(authUser: { id: string; email: string | null; fullName: string | null }) {
  const existing = await getUser(authUser.id);
  if (existing) return existing;
  const result = await sbUpsert(
    'users',
    { id: authUser.id, email: authUser.email, full_name: authUser.fullName, plan_tier: 'free' },
    'id',
  );
  const created = firstRow(userRowSchema, result, 'upsert users');
  if (!created) throw new Error('Supabase returned no user row');
  return created;
}

export async function updateUser(
  userId: string,
  patch: Partial<{ full_name: string; plan_tier: PlanType; dodo_customer_id: string }>,
) {
  return firstRow(userRowSchema, await sbPatch(`users?id=${eq(userId)}`, patch), 'update users');
}

export async function findUserByCustomer(customerId: string) {
  return firstRow(
    userRowSchema,
    await sbSelect(`users?select=*&dodo_customer_id=${eq(customerId)}&limit=1`),
    'select users',
  );
}
