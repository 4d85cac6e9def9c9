import { dodoEnv } from './env.js';

export const PLAN_TYPES = ['free', 'basic', 'pro', 'enterprise'] as const;
export type PlanType = (typeof PLAN_TYPES)[number];
export type PaidPlan = Exclude<PlanType, 'free'>;

export type PlanLimits = {
  accounts: number;
  dmsPerMonth: number;
  rules: number;
};

export const PLAN_LIMITS: Record<PlanType, PlanLimits> = {
  free: { accounts: 1, dmsPerMonth: 50, rules: 3 },
  basic: { accounts: 3, dmsPerMonth: 500, rules: 10 },
  pro: { accounts: 10, dmsPerMonth: 5000, rules: 50 },
  enterprise: { accounts: 50, dmsPerMonth: 10000, rules: 100 },
};

// Triggers only available on pro and above.
export const PRO_TRIGGERS = new Set(['story_reply', 'new_message', 'live_comment']);

export function isPlanType(value: unknown): value is PlanType {
  return typeof value === 'string' && (PLAN_TYPES as readonly string[]).includes(value);
}

export function normalizePlan(value: unknown): PlanType {
  const lowered = typeof value === 'string' ? value.trim().toLowerCase() : '';
  return isPlanType(lowered) ? lowered : 'free';
}

export function getPlanLimits(plan: unknown): PlanLimits {
  return PLAN_LIMITS[normalizePlan(plan)];
}

export function canUseTrigger(plan: unknown, trigger: string) {
  if (!PRO_TRIGGERS.has(trigger)) return true;
  const normalized = normalizePlan(plan);
  return normalized === 'pro' || normalized === 'enterprise';
}

export function productForPlan(plan: PaidPlan): string {
  return dodoEnv().products[plan];
}

export function planForProduct(productId: string | null | undefined): PaidPlan | null {
  if (!productId) return null;
  const { products } = dodoEnv();
  if (products.basic && productId === products.basic) return 'basic';
  if (products.pro && productId === products.pro) return 'pro';
  if (products.enterprise && productId === products.enterprise) return 'enterprise';
  return null;
}

export function monthStartIso(now = new Date()) {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1)).toISOString();
}
