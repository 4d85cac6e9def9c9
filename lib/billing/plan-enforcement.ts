import { canUseTrigger, getPlanLimits, monthStartIso } from '../config/plans.js';
import { countActiveAccounts } from '../db/accounts.js';
import { countDmsSince } from '../db/activity.js';
import { countRules } from '../db/rules.js';
import type { AppUser } from '../db/users.js';
import { ApiError } from '../utils/http.js';

export type Allowance = { allowed: boolean; used: number; limit: number };

export async function dmAllowance(user: Pick<AppUser, 'id' | 'plan_tier'>, now = new Date()): Promise<Allowance> {
  const limit = getPlanLimits(user.plan_tier).dmsPerMonth;
  const used = await countDmsSince(user.id, monthStartIso(now));
  return { allowed: used < limit, used, limit };
}

export async function assertCanAddAccount(user: Pick<AppUser, 'id' | 'plan_tier'>) {
  const limit = getPlanLimits(user.plan_tier).accounts;
  const used = await countActiveAccounts(user.id);
  if (used >= limit) {
    throw new ApiError(403, 'account_limit_reached', { limit, used, plan: user.plan_tier });
  }
}

export async function assertCanCreateRule(user: Pick<AppUser, 'id' | 'plan_tier'>) {
  const limit = getPlanLimits(user.plan_tier).rules;
  const used = await countRules(user.id);
  if (used >= limit) {
    throw new ApiError(403, 'rule_limit_reached', { limit, used, plan: user.plan_tier });
  }
}

export function assertTriggerAllowed(user: Pick<AppUser, 'plan_tier'>, trigger: string) {
  if (!canUseTrigger(user.plan_tier, trigger)) {
    throw new ApiError(403, 'pro_feature_required', { trigger, plan: user.plan_tier });
  }
}
