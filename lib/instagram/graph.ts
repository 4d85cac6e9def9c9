import { z } from 'zod';
import { instagramEnv } from '../config/env.js';
import { BUTTON_TEMPLATE_TEXT_MAX } from '../flow/config.js';
import { inlineButtons } from '../flow/render.js';
import type { OutgoingMessage } from '../flow/types.js';

const GRAPH_HOST = 'https://graph.instagram.com';
const OAUTH_HOST = 'https://api.instagram.com';
const AUTHORIZE_URL = 'https://www.instagram.com/oauth/authorize';

export const OAUTH_SCOPES = [
  'instagram_business_basic',
  'instagram_business_manage_messages',
  'instagram_business_manage_comments',
];

export const WEBHOOK_FIELDS = ['comments', 'live_comments', 'messages', 'messaging_postbacks'];

const graphErrorSchema = z.object({
  error: z.object({
    message: z.string().default('Unknown error'),
    type: z.string().optional(),
    code: z.number().optional(),
    error_subcode: z.number().optional(),
  }),
});

export class GraphError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: number,
    readonly subcode?: number,
  ) {
    super(message);
    this.name = 'GraphError';
  }

  /** Meta refuses DMs outside the 24h window with code 10 / subcode 2534022. */
  get outsideWindow() {
    return this.code === 10 || this.subcode === 2534022;
  }
}

type GraphRequest = {
  method?: 'GET' | 'POST' | 'DELETE';
  token?: string;
  query?: Record<string, string>;
  json?: unknown;
  form?: Record<string, string>;
};

async function graphRequest(url: string, request: GraphRequest = {}): Promise<unknown> {
  const target = new URL(url);
  for (const [key, value] of Object.entries(request.query ?? {})) {
    target.searchParams.set(key, value);
  }
  const headers: Record<string, string> = { Accept: 'application/json' };
  if (request.token) headers.Authorization = `Bearer ${request.token}`;

  let body: string | undefined;
  if (request.json !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(request.json);
  } else if (request.form) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    body = new URLSearchParams(request.form).toString();
  }

  const response = await fetch(target.toString(), { method: request.method ?? 'GET', headers, body });
  const data: unknown = await response.json().catch(() => ({}));
  if (!response.ok) {
    const parsed = graphErrorSchema.safeParse(data);
    const error = parsed.success ? parsed.data.error : undefined;
    throw new GraphError(
      `Instagram API error: ${error?.message ?? `HTTP ${response.status}`}`,
      response.status,
      error?.code,
      error?.error_subcode,
    );
  }
  return data;
}

function apiUrl(path: string) {
  return `${GRAPH_HOST}/${instagramEnv().graphVersion}/${path.replace(/^\/+/, '')}`;
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new GraphError(`Unexpected Instagram response for ${what}`, 502);
  }
  return parsed.data;
}

export function toGraphMessage(message: OutgoingMessage): Record<string, unknown> {
  const quickReplies = message.quickReplies?.map((reply) => ({
    content_type: 'text',
    title: reply.title,
    payload: reply.payload,
  }));
  const buttons = message.buttons ?? [];

  let payload: Record<string, unknown>;
  if (buttons.length && message.text.length <= BUTTON_TEMPLATE_TEXT_MAX) {
    payload = {
      attachment: {
        type: 'template',
        payload: {
          template_type: 'button',
          text: message.text,
          buttons: buttons.map((button) => ({ type: 'web_url', url: button.url, title: button.text })),
        },
      },
    };
  } else {
    payload = { text: inlineButtons(message).text };
  }
  if (quickReplies?.length) payload.quick_replies = quickReplies;
  return payload;
}

const sendResultSchema = z.object({
  recipient_id: z.coerce.string().optional(),
  message_id: z.string().optional(),
});

export type SendResult = z.infer<typeof sendResultSchema>;

export async function sendDirectMessage(token: string, recipientId: string, message: OutgoingMessage) {
  const data = await graphRequest(apiUrl('me/messages'), {
    method: 'POST',
    token,
    json: { recipient: { id: recipientId }, message: toGraphMessage(message) },
  });
  return parseResponse(sendResultSchema, data, 'send message');
}

/** Private reply: a DM tied to a comment, allowed once per comment even outside the messaging window. */
export async function sendPrivateReply(token: string, commentId: string, message: OutgoingMessage) {
  const data = await graphRequest(apiUrl('me/messages'), {
    method: 'POST',
    token,
    json: { recipient: { comment_id: commentId }, message: toGraphMessage(message) },
  });
  return parseResponse(sendResultSchema, data, 'private reply');
}

export async function replyToComment(token: string, commentId: string, text: string) {
  const data = await graphRequest(apiUrl(`${encodeURIComponent(commentId)}/replies`), {
    method: 'POST',
    token,
    form: { message: text },
  });
  return parseResponse(z.object({ id: z.coerce.string() }), data, 'comment reply');
}

/** Returns null when Instagram does not expose the follow status for this user. */
export async function checkFollowsBusiness(token: string, igsid: string): Promise<boolean | null> {
  try {
    const data = await graphRequest(apiUrl(encodeURIComponent(igsid)), {
      token,
      query: { fields: 'is_user_follow_business' },
    });
    const parsed = z.object({ is_user_follow_business: z.boolean().optional() }).safeParse(data);
    return parsed.success && parsed.data.is_user_follow_business !== undefined
      ? parsed.data.is_user_follow_business
      : null;
  } catch (error) {
    if (!(error instanceof GraphError)) throw error;
    console.warn('[instagram-graph] follow check failed', { igsid, code: error.code, status: error.status });
    return null;
  }
}

const profileSchema = z.object({
  name: z.string().optional(),
  username: z.string().optional(),
});

export async function getUserProfile(token: string, igsid: string) {
  const data = await graphRequest(apiUrl(encodeURIComponent(igsid)), {
    token,
    query: { fields: 'name,username' },
  });
  const profile = parseResponse(profileSchema, data, 'user profile');
  return { name: profile.name ?? null, username: profile.username ?? null };
}

export function buildAuthorizeUrl(params: { appId: string; redirectUri: string; state: string }) {
  const url = new URL(AUTHORIZE_URL);
  url.searchParams.set('client_id', params.appId);
  url.searchParams.set('redirect_uri', params.redirectUri);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('scope', OAUTH_SCOPES.join(','));
  url.searchParams.set('state', params.state);
  return url.toString();
}

const shortTokenSchema = z.object({
  access_token: z.string(),
  user_id: z.coerce.string(),
});

export async function exchangeCode(params: { appId: string; appSecret: string; redirectUri: string; code: string }) {
  const data = await graphRequest(`${OAUTH_HOST}/oauth/access_token`, {
    method: 'POST',
    form: {
      client_id: params.appId,
      client_secret: params.appSecret,
      grant_type: 'authorization_code',
      redirect_uri: params.redirectUri,
      code: params.code,
    },
  });
  return parseResponse(shortTokenSchema, data, 'code exchange');
}

const longTokenSchema = z.object({
  access_token: z.string(),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().default(60 * 24 * 60 * 60),
});

export async function exchangeLongLivedToken(appSecret: string, shortToken: string) {
  const data = await graphRequest(`${GRAPH_HOST}/access_token`, {
    query: { grant_type: 'ig_exchange_token', client_secret: appSecret, access_token: shortToken },
  });
  return parseResponse(longTokenSchema, data, 'long-lived token');
}

export async function refreshLongLivedToken(token: string) {
  const data = await graphRequest(`${GRAPH_HOST}/refresh_access_token`, {
    query: { grant_type: 'ig_refresh_token', access_token: token },
  });
  return parseResponse(longTokenSchema, data, 'token refresh');
}

const mediaPageSchema = z.object({
  data: z
    .array(
      z.object({
        id: z.coerce.string(),
        caption: z.string().default(''),
        media_type: z.string().nullable().default(null),
        media_product_type: z.string().nullable().default(null),
        media_url: z.string().nullable().default(null),
        thumbnail_url: z.string().nullable().default(null),
        permalink: z.string().nullable().default(null),
        timestamp: z.string().nullable().default(null),
        like_count: z.number().nullable().default(null),
        comments_count: z.number().nullable().default(null),
      }),
    )
    .default([]),
  paging: z
    .object({ cursors: z.object({ after: z.string().optional() }).optional(), next: z.string().optional() })
    .optional(),
});

export type InstagramMedia = z.infer<typeof mediaPageSchema>['data'][number];

const MEDIA_FIELDS =
  'id,caption,media_type,media_product_type,media_url,thumbnail_url,permalink,timestamp,like_count,comments_count';

/** One page of the account's posts and reels, newest first. */
export async function listMedia(token: string, options: { limit: number; after?: string }) {
  const query: Record<string, string> = { fields: MEDIA_FIELDS, limit: String(options.limit) };
  if (options.after) query.after = options.after;
  const data = await graphRequest(apiUrl('me/media'), { token, query });
  const page = parseResponse(mediaPageSchema, data, 'media list');
  return { media: page.data, nextCursor: page.paging?.next ? page.paging.cursors?.after ?? null : null };
}

const meSchema = z.object({
  id: z.coerce.string(),
  user_id: z.coerce.string().optional(),
  username: z.string(),
  name: z.string().optional(),
  profile_picture_url: z.string().optional(),
  account_type: z.string().optional(),
});

export type InstagramMe = z.infer<typeof meSchema>;

export async function getMe(token: string) {
  const data = await graphRequest(apiUrl('me'), {
    token,
    query: { fields: 'id,user_id,username,name,profile_picture_url,account_type' },
  });
  return parseResponse(meSchema, data, 'profile');
}

export async function subscribeApp(token: string) {
  const data = await graphRequest(apiUrl('me/subscribed_apps'), {
    method: 'POST',
    token,
    query: { subscribed_fields: WEBHOOK_FIELDS.join(',') },
  });
  return parseResponse(z.object({ success: z.boolean().default(false) }), data, 'webhook subscription');
}
