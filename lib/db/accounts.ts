import { z } from 'zod';
import { decryptSecret } from '../utils/crypto.js';
import { eq, sbCount, sbPatch, sbSelect, sbUpsert } from '../utils/sb.js';
import { expectOk, firstRow, parseRows } from './rows.js';

const text = z.string().nullable().default(null);

const accountRowSchema = z
  .object({
    id: z.string(),
    user_id: z.string(),
    instagram_user_id: z.coerce.string(),
    page_id: text,
    username: text,
    name: text,
    profile_picture_url: text,
    access_token_encrypted: z.string(),
    token_expires_at: text,
    is_active: z.boolean().default(true),
    created_at: z.string(),
  })
  .transform((row) => ({
    id: row.id,
    userId: row.user_id,
    instagramUserId: row.instagram_user_id,
    pageId: row.page_id,
    username: row.username,
    name: row.name,
    profilePictureUrl: row.profile_picture_url,
    accessTokenEncrypted: row.access_token_encrypted,
    tokenExpiresAt: row.token_expires_at,
    isActive: row.is_active,
    createdAt: row.created_at,
  }));

export type InstagramAccount = z.output<typeof accountRowSchema>;

export function publicAccount(account: InstagramAccount) {
  return {
    id: account.id,
    instagram_user_id: account.instagramUserId,
    username: account.username,
    name: account.name,
    profile_picture_url: account.profilePictureUrl,
    token_expires_at: account.tokenExpiresAt,
    is_active: account.isActive,
    created_at: account.createdAt,
  };
}

export function accountToken(account: InstagramAccount) {
  return decryptSecret(account.accessTokenEncrypted);
}

/** Webhook entries carry the IG professional account id, or the linked page id for older setups. */
export async function findAccountByRecipient(recipientId: string) {
  const id = encodeURIComponent(recipientId);
  const result = await sbSelect(
    `instagram_accounts?select=*&is_active=is.true&or=(instagram_user_id.eq.${id},page_id.eq.${id})&limit=1`,
  );
  return firstRow(accountRowSchema, result, 'select instagram_accounts');
}

export async function listAccounts(userId: string) {
  const result = await sbSelect(`instagram_accounts?select=*&user_id=${eq(userId)}&order=created_at.asc`);
  return parseRows(accountRowSchema, result, 'select instagram_accounts');
}

export async function getAccount(userId: string, accountId: string) {
  const result = await sbSelect(`instagram_accounts?select=*&user_id=${eq(userId)}&id=${eq(accountId)}&limit=1`);
  return firstRow(accountRowSchema, result, 'select instagram_accounts');
}

export async function findAccountByInstagramId(instagramUserId: string) {
  const result = await sbSelect(`instagram_accounts?select=*&instagram_user_id=${eq(instagramUserId)}&limit=1`);
  return firstRow(accountRowSchema, result, 'select instagram_accounts');
}

export async function countActiveAccounts(userId: string) {
  const result = await sbCount(`instagram_accounts?select=id&user_id=${eq(userId)}&is_active=is.true`);
  expectOk('count instagram_accounts', result);
  return result.count;
}

export async function upsertAccount(row: {
  userId: string;
  instagramUserId: string;
  username: string;
  name: string | null;
  profilePictureUrl: string | null;
  accessTokenEncrypted: string;
  tokenExpiresAt: string;
}) {
  const result = await sbUpsert(
    'instagram_accounts',
    {
      user_id: row.userId,
      instagram_user_id: row.instagramUserId,
      username: row.username,
      name: row.name,
      profile_picture_url: row.profilePictureUrl,
      access_token_encrypted: row.accessTokenEncrypted,
      token_expires_at: row.tokenExpiresAt,
      is_active: true,
    },
    'instagram_user_id',
  );
  const account = firstRow(accountRowSchema, result, 'upsert instagram_accounts');
  if (!account) throw new Error('Supabase returned no account row');
  return account;
}

export async function deactivateAccount(userId: string, accountId: string) {
  const result = await sbPatch(`instagram_accounts?user_id=${eq(userId)}&id=${eq(accountId)}`, { is_active: false });
  return firstRow(accountRowSchema, result, 'deactivate instagram_accounts');
}

export async function getAccountById(accountId: string) {
  const result = await sbSelect(`instagram_accounts?select=*&id=${eq(accountId)}&limit=1`);
  return firstRow(accountRowSchema, result, 'select instagram_accounts');
}

export async function updateAccountToken(accountId: string, accessTokenEncrypted: string, tokenExpiresAt: string) {
  const result = await sbPatch(`instagram_accounts?id=${eq(accountId)}`, {
    access_token_encrypted: accessTokenEncrypted,
    token_expires_at: tokenExpiresAt,
  });
  const account = firstRow(accountRowSchema, result, 'update instagram_accounts');
  if (!account) throw new Error('Supabase returned no account row');
  return account;
}

/** Active accounts whose token expires before `before`, soonest first. */
export async function listAccountsExpiringBefore(before: string, limit: number) {
  const result = await sbSelect(
    `instagram_accounts?select=*&is_active=is.true&token_expires_at=lt.${encodeURIComponent(before)}` +
      `&order=token_expires_at.asc&limit=${limit}`,
  );
  return parseRows(accountRowSchema, result, 'select instagram_accounts');
}
