import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireUser } from '../../../lib/auth/session.js';
import { assertCanCreateRule, assertTriggerAllowed } from '../../../lib/billing/plan-enforcement.js';
import { getAccount } from '../../../lib/db/accounts.js';
import { listRuleStats } from '../../../lib/db/activity.js';
import { insertRule, listRules, publicRule } from '../../../lib/db/rules.js';
import { ruleCreateSchema } from '../../../lib/flow/rule-input.js';
import { allowMethods, ApiError, parseBody, queryParam, sendError } from '../../../lib/utils/http.js';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET', 'POST'])) return;

  try {
    const user = await requireUser(req);

    if (req.method === 'GET') {
      const rules = await listRules(user.id, queryParam(req, 'account_id') || undefined);
      const stats = await listRuleStats(rules.map((rule) => rule.id));
      const byRule = new Map(stats.map((row) => [row.rule_id, row]));
      return res.status(200).json({
        ok: true,
        rules: rules.map((rule) => ({ ...publicRule(rule), stats: byRule.get(rule.id) ?? null })),
      });
    }

    const input = parseBody(ruleCreateSchema, req.body);
    const account = await getAccount(user.id, input.instagram_account_id);
    if (!account || !account.isActive) throw new ApiError(404, 'account_not_found');
    assertTriggerAllowed(user, input.trigger_type);
    await assertCanCreateRule(user);

    const rule = await insertRule(user.id, {
      instagramAccountId: account.id,
      name: input.name,
      triggerType: input.trigger_type,
      keywords: input.keywords,
      mediaId: input.media_id,
      isActive: input.is_active,
      config: input.config,
    });
    console.log('[automation-rules] rule created', { user: user.id, rule: rule.id, trigger: rule.triggerType });
    return res.status(201).json({ ok: true, rule: publicRule(rule) });
  } catch (error) {
    return sendError(res, 'automation-rules', error);
  }
}
