import { hmacHex } from '../lib/utils/crypto.js';

// Posts a signed comment and DM delivery to a running webhook, the way Meta would.
const target = process.env.WEBHOOK_URL || 'http://localhost:3000/api/instagram/webhook';
const appSecret = process.env.INSTAGRAM_APP_SECRET || '';
const accountId = process.env.TEST_IG_ACCOUNT_ID || '17841400000000001';
const senderId = process.env.TEST_IG_SENDER_ID || '9001';
const keyword = process.env.TEST_KEYWORD || 'LINK';

if (!appSecret) {
  console.error('INSTAGRAM_APP_SECRET is required to sign the delivery');
  process.exit(1);
}

const now = Date.now();

const variants = [
  {
    label: 'Keyword comment',
    payload: {
      object: 'instagram',
      entry: [
        {
          id: accountId,
          time: Math.floor(now / 1000),
          changes: [
            {
              field: 'comments',
              value: {
                id: `test-comment-${now}`,
                text: keyword,
                from: { id: senderId, username: 'test_prospect' },
                media: { id: 'test-media' },
              },
            },
          ],
        },
      ],
    },
  },
  {
    label: 'DM with email',
    payload: {
      object: 'instagram',
      entry: [
        {
          id: accountId,
          time: Math.floor(now / 1000),
          messaging: [
            {
              sender: { id: senderId },
              recipient: { id: accountId },
              timestamp: now,
              message: { mid: `test-mid-${now}`, text: 'my email is prospect@example.com' },
            },
          ],
        },
      ],
    },
  },
];

async function send(label: string, payload: unknown) {
  const body = JSON.stringify(payload);
  const response = await fetch(target, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'X-Hub-Signature-256': `sha256=${hmacHex(appSecret, body)}`,
    },
    body,
  });
  const text = await response.text();
  console.log(`- ${label}: HTTP ${response.status}`);
  console.log(`  Response: ${text}`);
}

try {
  for (const variant of variants) {
    await send(variant.label, variant.payload);
  }
} catch (error) {
  console.error('Delivery failed', error);
  process.exit(1);
}
