import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { requireUser } from '../../lib/auth/session.js';
import { getPlanLimits, monthStartIso } from '../../lib/config/plans.js';
import { countActiveAccounts } from '../../lib/db/accounts.js';
import { countDmsSince } from '../../lib/db/activity.js';
import { countRules } from '../../lib/db/rules.js';
import { updateUser, type AppUser } from '../../lib/db/users.js';
import { allowMethods, parseBody, sendError } from '../../lib/utils/http.js';

const patchSchema = z.object({
  full_name: z.string().trim().min(1).max(120),
});

async function profile(user: AppUser) {
  const [dmsThisMonth, accounts, rules] = await Promise.all([
    countDmsSince(user.id, monthStartIso()),
    countActiveAccounts(user.id),
    countRules(user.id),
  ]);
  return {
    id: user.id,
    email: user.email,
    full_name: user.full_name,
    plan: user.plan_tier,
    limits: getPlanLimits(user.plan_tier),
    usage: { dms_this_month: dmsThisMonth, accounts, rules },
    created_at: user.created_at,
  };
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET', 'PATCH'])) return;

  try {
    const user = await requireUser(req);
    if (req.method === 'GET') {
      return res.status(200).json({ ok: true, user: await profile(user) });
    }

    const patch = parseBody(patchSchema, req.body);
    const updated = await updateUser(user.id, patch);
    return res.status(200).json({ ok: true, user: await profile(updated ?? user) });
  } catch (error) {
    return sendError(res, 'users-me', error);
  }
}
