import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireOpsToken } from '../../lib/auth/ops.js';
import { listAccountsExpiringBefore } from '../../lib/db/accounts.js';
import { GraphError } from '../../lib/instagram/graph.js';
import { refreshAccountToken, refreshCutoff } from '../../lib/instagram/tokens.js';
import { formatAlertPayload, postAlert } from '../../lib/utils/alert.js';
import { allowMethods, clampInt, queryParam, sendError } from '../../lib/utils/http.js';
import { sbReady } from '../../lib/utils/sb.js';

const DEFAULT_LIMIT = 50;

type RefreshResult = { id: string; status: 'REFRESHED' | 'FAILED'; expires_at?: string; error?: string };

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['POST'])) return;

  try {
    requireOpsToken(req);
    if (!sbReady()) {
      return res.status(503).json({ ok: false, error: 'missing_supabase_env' });
    }

    const limit = clampInt(queryParam(req, 'limit'), DEFAULT_LIMIT, 1, 200);
    const accounts = await listAccountsExpiringBefore(refreshCutoff(), limit);

    const results: RefreshResult[] = [];
    for (const account of accounts) {
      try {
        const refreshed = await refreshAccountToken(account);
        results.push({ id: account.id, status: 'REFRESHED', expires_at: refreshed.account.tokenExpiresAt ?? undefined });
      } catch (error) {
        // An expired or revoked token needs the owner to reconnect; the rest of the batch still runs.
        if (!(error instanceof GraphError)) throw error;
        console.warn('[ops-refresh-tokens] refresh failed', { account: account.id, code: error.code });
        results.push({ id: account.id, status: 'FAILED', error: error.message });
      }
    }

    const failed = results.filter((result) => result.status === 'FAILED');
    if (failed.length) {
      await postAlert(
        formatAlertPayload({
          title: 'Instagram token refresh failed',
          severity: 'warn',
          message: `${failed.length} of ${results.length} accounts could not be refreshed`,
          meta: { accounts: failed.map((result) => result.id).join(',') },
        }),
      );
    }

    console.log('[ops-refresh-tokens] run finished', { checked: results.length, failed: failed.length });
    return res.status(200).json({
      ok: true,
      checked: results.length,
      refreshed: results.length - failed.length,
      failed: failed.length,
      results,
    });
  } catch (error) {
    return sendError(res, 'ops-refresh-tokens', error);
  }
}
