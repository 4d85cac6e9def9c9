import type { VercelRequest } from '@vercel/node';
import { opsToken } from '../config/env.js';
import { safeEqual } from '../utils/crypto.js';
import { ApiError, firstHeader } from '../utils/http.js';

/** Ops endpoints are called by cron and operators with the shared API_TOKEN. */
export function requireOpsToken(req: Pick<VercelRequest, 'headers'>) {
  const expected = opsToken();
  if (!expected) throw new ApiError(503, 'missing_ops_env');
  const provided = firstHeader(req.headers['x-api-token']);
  if (!provided || !safeEqual(provided, expected)) {
    throw new ApiError(401, 'unauthorized');
  }
}
