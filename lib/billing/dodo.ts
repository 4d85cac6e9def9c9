import { z } from 'zod';
import { dodoEnv, frontendUrl } from '../config/env.js';
import { productForPlan, type PaidPlan } from '../config/plans.js';
import type { AppUser } from '../db/users.js';
import { ApiError } from '../utils/http.js';

export function dodoReady() {
  const { apiKey, baseUrl } = dodoEnv();
  return Boolean(apiKey && baseUrl);
}

async function dodoPost(path: string, body: Record<string, unknown>): Promise<unknown> {
  const { apiKey, baseUrl } = dodoEnv();
  const response = await fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { Authorization: `Bearer ${apiKey}`, 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  const data: unknown = await response.json().catch(() => ({}));
  if (!response.ok) {
    console.error('[dodo] request failed', { path, status: response.status });
    throw new ApiError(502, 'billing_provider_error', { status: response.status, body: data });
  }
  return data;
}

const checkoutResponseSchema = z
  .object({
    checkout_url: z.string().optional(),
    url: z.string().optional(),
    session_id: z.coerce.string().optional(),
    id: z.coerce.string().optional(),
  })
  .transform((data) => ({ checkoutUrl: data.checkout_url ?? data.url, sessionId: data.session_id ?? data.id }));

export async function createCheckoutSession(user: Pick<AppUser, 'id' | 'email' | 'full_name'>, plan: PaidPlan) {
  const productId = productForPlan(plan);
  if (!productId) throw new ApiError(503, 'missing_dodo_env', { plan });

  const data = await dodoPost('/checkouts', {
    product_cart: [{ product_id: productId, quantity: 1 }],
    customer: { email: user.email ?? undefined, name: user.full_name ?? user.email ?? undefined },
    return_url: `${frontendUrl()}/dashboard/subscription`,
    metadata: { user_id: user.id, plan },
  });
  const parsed = checkoutResponseSchema.safeParse(data);
  if (!parsed.success || !parsed.data.checkoutUrl || !parsed.data.sessionId) {
    throw new ApiError(502, 'billing_provider_error', { reason: 'missing_checkout_url' });
  }
  return { checkoutUrl: parsed.data.checkoutUrl, sessionId: parsed.data.sessionId };
}

const portalResponseSchema = z
  .object({ link: z.string().optional(), portal_url: z.string().optional(), url: z.string().optional() })
  .transform((data) => data.link ?? data.portal_url ?? data.url);

export async function createPortalSession(customerId: string) {
  const data = await dodoPost(`/customers/${encodeURIComponent(customerId)}/customer-portal/session`, {
    return_url: `${frontendUrl()}/dashboard/settings`,
  });
  const parsed = portalResponseSchema.safeParse(data);
  if (!parsed.success || !parsed.data) {
    throw new ApiError(502, 'billing_provider_error', { reason: 'missing_portal_url' });
  }
  return parsed.data;
}
