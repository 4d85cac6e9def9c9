import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { InstagramAccount } from '../lib/db/accounts.js';
import type { AppUser } from '../lib/db/users.js';
import { createOAuthState } from '../lib/instagram/oauth-state.js';
import { decryptSecret } from '../lib/utils/crypto.js';
import { ApiError } from '../lib/utils/http.js';
import { createRequest, createResponse } from './helpers.js';

const getUserMock = vi.fn();
const findAccountByInstagramIdMock = vi.fn();
const upsertAccountMock = vi.fn();
const assertCanAddAccountMock = vi.fn();
const exchangeCodeMock = vi.fn();
const exchangeLongLivedTokenMock = vi.fn();
const getMeMock = vi.fn();
const subscribeAppMock = vi.fn();

vi.mock('../lib/db/users.js', () => ({ getUser: getUserMock }));

vi.mock('../lib/db/accounts.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../lib/db/accounts.js')>()),
  findAccountByInstagramId: findAccountByInstagramIdMock,
  upsertAccount: upsertAccountMock,
}));

vi.mock('../lib/billing/plan-enforcement.js', () => ({ assertCanAddAccount: assertCanAddAccountMock }));

vi.mock('../lib/instagram/graph.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../lib/instagram/graph.js')>()),
  exchangeCode: exchangeCodeMock,
  exchangeLongLivedToken: exchangeLongLivedTokenMock,
  getMe: getMeMock,
  subscribeApp: subscribeAppMock,
}));

const handler = (await import('../api/instagram/oauth/callback.js')).default;

const KEY = 'ab'.repeat(32);
const DASHBOARD = 'https://app.example.com/dashboard/accounts';

const owner: AppUser = {
  id: 'user-1',
  email: 'owner@example.com',
  full_name: null,
  plan_tier: 'free',
  dodo_customer_id: null,
  created_at: '2025-01-01T00:00:00.000Z',
};

const connected: InstagramAccount = {
  id: 'acc-7',
  userId: 'user-1',
  instagramUserId: '17841400000000001',
  pageId: null,
  username: 'creator',
  name: null,
  profilePictureUrl: null,
  accessTokenEncrypted: 'v1:iv:tag:data',
  tokenExpiresAt: null,
  isActive: true,
  createdAt: '2025-01-01T00:00:00.000Z',
};

function callback(cookieNonce = 'nonce-1') {
  const { state } = createOAuthState('user-1', KEY, 'nonce-1');
  return createRequest({
    method: 'GET',
    query: { code: 'code-1', state },
    headers: { host: 'api.example.com', cookie: `ig_oauth_state=${cookieNonce}` },
  });
}

const allMocks = [
  getUserMock,
  findAccountByInstagramIdMock,
  upsertAccountMock,
  assertCanAddAccountMock,
  exchangeCodeMock,
  exchangeLongLivedTokenMock,
  getMeMock,
  subscribeAppMock,
];

beforeEach(() => {
  vi.stubEnv('INSTAGRAM_APP_ID', 'app-1');
  vi.stubEnv('INSTAGRAM_APP_SECRET', 'test-secret');
  vi.stubEnv('ENCRYPTION_KEY', KEY);
  vi.stubEnv('SUPABASE_URL', 'https://db.example.com');
  vi.stubEnv('SUPABASE_SERVICE_ROLE', 'test-service-role');
  vi.stubEnv('FRONTEND_URL', 'https://app.example.com');
  vi.stubEnv('VERCEL', '');
  for (const mock of allMocks) mock.mockReset();
  getUserMock.mockResolvedValue(owner);
  findAccountByInstagramIdMock.mockResolvedValue(null);
  assertCanAddAccountMock.mockResolvedValue(undefined);
  exchangeCodeMock.mockResolvedValue({ access_token: 'short-token', user_id: '17841400000000001' });
  exchangeLongLivedTokenMock.mockResolvedValue({ access_token: 'long-token', expires_in: 5184000 });
  getMeMock.mockResolvedValue({ id: '17841400000000001', username: 'creator' });
  upsertAccountMock.mockResolvedValue(connected);
  subscribeAppMock.mockResolvedValue({ success: true });
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('GET /api/instagram/oauth/callback', () => {
  test('connects the account and stores its long-lived token encrypted', async () => {
    const { res, result } = createResponse();

    await handler(callback(), res);

    expect(exchangeCodeMock).toHaveBeenCalledWith({
      appId: 'app-1',
      appSecret: 'test-secret',
      redirectUri: 'http://api.example.com/api/instagram/oauth/callback',
      code: 'code-1',
    });
    expect(exchangeLongLivedTokenMock).toHaveBeenCalledWith('test-secret', 'short-token');
    expect(assertCanAddAccountMock).toHaveBeenCalledWith(owner);
    const saved = upsertAccountMock.mock.calls[0][0];
    expect(saved).toMatchObject({ userId: 'user-1', instagramUserId: '17841400000000001', username: 'creator' });
    expect(decryptSecret(saved.accessTokenEncrypted, KEY)).toBe('long-token');
    expect(subscribeAppMock).toHaveBeenCalledWith('long-token');
    expect(result.statusCode).toBe(302);
    expect(result.redirect).toBe(`${DASHBOARD}?instagram=connected&account=acc-7`);
    expect(String(result.headers['set-cookie']).startsWith('ig_oauth_state=;')).toBe(true);
  });

  test('refuses a state that does not match the cookie', async () => {
    const { res, result } = createResponse();

    await handler(callback('nonce-2'), res);

    expect(result.redirect).toBe(`${DASHBOARD}?instagram=error&reason=state`);
    expect(exchangeCodeMock).not.toHaveBeenCalled();
  });

  test('redirects with the plan error once the account limit is reached', async () => {
    assertCanAddAccountMock.mockRejectedValue(
      new ApiError(403, 'account_limit_reached', { limit: 1, used: 1, plan: 'free' }),
    );
    const { res, result } = createResponse();

    await handler(callback(), res);

    expect(result.statusCode).toBe(302);
    expect(result.redirect).toBe(`${DASHBOARD}?instagram=error&reason=account_limit_reached`);
    expect(upsertAccountMock).not.toHaveBeenCalled();
    expect(subscribeAppMock).not.toHaveBeenCalled();
  });

  test('lets the owner reconnect an active account without a limit check', async () => {
    findAccountByInstagramIdMock.mockResolvedValue(connected);
    assertCanAddAccountMock.mockRejectedValue(new ApiError(403, 'account_limit_reached'));
    const { res, result } = createResponse();

    await handler(callback(), res);

    expect(assertCanAddAccountMock).not.toHaveBeenCalled();
    expect(upsertAccountMock).toHaveBeenCalledTimes(1);
    expect(result.redirect).toBe(`${DASHBOARD}?instagram=connected&account=acc-7`);
  });

  test('will not move an account connected by another user', async () => {
    findAccountByInstagramIdMock.mockResolvedValue({ ...connected, userId: 'user-2' });
    const { res, result } = createResponse();

    await handler(callback(), res);

    expect(result.redirect).toBe(`${DASHBOARD}?instagram=error&reason=account_owned_elsewhere`);
    expect(upsertAccountMock).not.toHaveBeenCalled();
  });
});
