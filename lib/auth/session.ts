import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { VercelRequest } from '@vercel/node';
import { supabaseEnv } from '../config/env.js';
import { ensureUser, type AppUser } from '../db/users.js';
import { ApiError, firstHeader } from '../utils/http.js';
import { sbReady } from '../utils/sb.js';

let authClient: SupabaseClient | null = null;

function getAuthClient(): SupabaseClient {
  if (authClient) return authClient;
  const { url, anonKey, serviceRole } = supabaseEnv();
  authClient = createClient(url, anonKey || serviceRole, {
    auth: { autoRefreshToken: false, persistSession: false },
  });
  return authClient;
}

export function bearerToken(req: Pick<VercelRequest, 'headers'>): string | null {
  const header = firstHeader(req.headers.authorization);
  const match = header.match(/^Bearer\s+(.+)$/i);
  return match ? match[1].trim() : null;
}

/** Resolves the Supabase user behind the request's Bearer token and its profile row. */
export async function requireUser(req: Pick<VercelRequest, 'headers'>): Promise<AppUser> {
  if (!sbReady()) throw new ApiError(503, 'missing_supabase_env');
  const token = bearerToken(req);
  if (!token) throw new ApiError(401, 'missing_token');

  const { data, error } = await getAuthClient().auth.getUser(token);
  if (error || !data.user) {
    throw new ApiError(401, 'invalid_token');
  }

  const metadata = data.user.user_metadata;
  const fullName = typeof metadata?.full_name === 'string' ? metadata.full_name : null;
  return ensureUser({ id: data.user.id, email: data.user.email ?? null, fullName });
}
