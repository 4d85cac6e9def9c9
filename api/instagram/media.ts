import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireUser } from '../../lib/auth/session.js';
import { accountToken, getAccount } from '../../lib/db/accounts.js';
import { GraphError, listMedia, type InstagramMedia } from '../../lib/instagram/graph.js';
import { allowMethods, ApiError, clampInt, queryParam, sendError } from '../../lib/utils/http.js';

const MEDIA_FILTERS: Record<string, (item: InstagramMedia) => boolean> = {
  posts: (item) => item.media_product_type !== 'STORY',
  reels: (item) => item.media_product_type === 'REELS',
  all: () => true,
};

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return;

  try {
    const user = await requireUser(req);
    const accountId = queryParam(req, 'account_id');
    if (!accountId) throw new ApiError(400, 'missing_account_id');

    const type = queryParam(req, 'type') || 'posts';
    const filter = MEDIA_FILTERS[type];
    if (!filter) throw new ApiError(400, 'invalid_media_type', { allowed: Object.keys(MEDIA_FILTERS) });

    const account = await getAccount(user.id, accountId);
    if (!account || !account.isActive) throw new ApiError(404, 'account_not_found');

    const limit = clampInt(queryParam(req, 'limit'), 25, 1, 100);
    const after = queryParam(req, 'after') || undefined;
    try {
      const page = await listMedia(accountToken(account), { limit, after });
      return res.status(200).json({ ok: true, media: page.media.filter(filter), next_cursor: page.nextCursor });
    } catch (error) {
      if (error instanceof GraphError) throw new ApiError(502, 'instagram_error', error.message);
      throw error;
    }
  } catch (error) {
    return sendError(res, 'instagram-media', error);
  }
}
