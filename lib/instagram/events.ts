import { z } from 'zod';

const idRef = z.object({ id: z.coerce.string() });

const messagingSchema = z.object({
  sender: idRef,
  recipient: idRef,
  timestamp: z.coerce.number().optional(),
  message: z
    .object({
      mid: z.string(),
      text: z.string().optional(),
      is_echo: z.boolean().optional(),
      is_deleted: z.boolean().optional(),
      quick_reply: z.object({ payload: z.string() }).optional(),
      reply_to: z
        .object({
          mid: z.string().optional(),
          story: z.object({ id: z.coerce.string(), url: z.string().optional() }).optional(),
        })
        .optional(),
    })
    .optional(),
  postback: z
    .object({
      mid: z.string().optional(),
      title: z.string().optional(),
      payload: z.string(),
    })
    .optional(),
});

const commentValueSchema = z.object({
  id: z.coerce.string(),
  text: z.string().default(''),
  parent_id: z.coerce.string().optional(),
  from: z.object({ id: z.coerce.string(), username: z.string().optional() }),
  media: z.object({ id: z.coerce.string(), media_product_type: z.string().optional() }).optional(),
});

const changeSchema = z.object({
  field: z.string(),
  value: z.unknown(),
});

const entrySchema = z.object({
  id: z.coerce.string(),
  time: z.coerce.number().optional(),
  messaging: z.array(z.unknown()).optional(),
  changes: z.array(changeSchema).optional(),
});

export const webhookPayloadSchema = z.object({
  object: z.string(),
  entry: z.array(entrySchema).default([]),
});

export type WebhookPayload = z.infer<typeof webhookPayloadSchema>;

export const inboundEventSchema = z.object({
  /** Stable id used to dedupe redeliveries. */
  key: z.string(),
  /** The connected account the event was delivered for (entry id). */
  recipientId: z.string(),
  kind: z.enum(['comment', 'live_comment', 'message', 'postback', 'story_reply']),
  senderId: z.string(),
  username: z.string().nullable(),
  text: z.string(),
  payload: z.string().nullable(),
  commentId: z.string().nullable(),
  mediaId: z.string().nullable(),
  /** Epoch milliseconds. */
  timestamp: z.number(),
  isEcho: z.boolean(),
});

export type InboundEvent = z.infer<typeof inboundEventSchema>;

function toMillis(value: number | undefined, fallback: number) {
  if (!value || !Number.isFinite(value)) return fallback;
  return value < 1e12 ? value * 1000 : value;
}

function fromMessaging(entryId: string, raw: unknown, fallbackTs: number): InboundEvent | null {
  const parsed = messagingSchema.safeParse(raw);
  if (!parsed.success) return null;
  const item = parsed.data;
  const timestamp = toMillis(item.timestamp, fallbackTs);

  if (item.postback) {
    return {
      key: `pb:${item.postback.mid ?? `${item.sender.id}:${timestamp}`}`,
      recipientId: entryId,
      kind: 'postback',
      senderId: item.sender.id,
      username: null,
      text: item.postback.title ?? '',
      payload: item.postback.payload,
      commentId: null,
      mediaId: null,
      timestamp,
      isEcho: false,
    };
  }

  const message = item.message;
  if (!message || message.is_deleted) return null;
  return {
    key: `msg:${message.mid}`,
    recipientId: entryId,
    kind: message.reply_to?.story ? 'story_reply' : 'message',
    senderId: item.sender.id,
    username: null,
    text: message.text ?? '',
    payload: message.quick_reply?.payload ?? null,
    commentId: null,
    mediaId: message.reply_to?.story?.id ?? null,
    timestamp,
    isEcho: Boolean(message.is_echo),
  };
}

function fromChange(entryId: string, field: string, raw: unknown, timestamp: number): InboundEvent | null {
  if (field !== 'comments' && field !== 'live_comments') return null;
  const parsed = commentValueSchema.safeParse(raw);
  if (!parsed.success) return null;
  const value = parsed.data;
  return {
    key: `cmt:${value.id}`,
    recipientId: entryId,
    kind: field === 'live_comments' ? 'live_comment' : 'comment',
    senderId: value.from.id,
    username: value.from.username ?? null,
    text: value.text,
    payload: null,
    commentId: value.id,
    mediaId: value.media?.id ?? null,
    timestamp,
    isEcho: false,
  };
}

/**
 * Flattens an Instagram webhook delivery into comment, DM and postback events.
 * Receipts, reactions and unknown change fields are dropped.
 */
export function parseWebhookPayload(body: unknown, now = Date.now()): InboundEvent[] {
  const parsed = webhookPayloadSchema.safeParse(body);
  if (!parsed.success || parsed.data.object !== 'instagram') return [];

  const events: InboundEvent[] = [];
  for (const entry of parsed.data.entry) {
    const entryTs = toMillis(entry.time, now);
    for (const item of entry.messaging ?? []) {
      const event = fromMessaging(entry.id, item, entryTs);
      if (event) events.push(event);
    }
    for (const change of entry.changes ?? []) {
      const event = fromChange(entry.id, change.field, change.value, entryTs);
      if (event) events.push(event);
    }
  }
  return events;
}
