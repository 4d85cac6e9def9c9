import { readFileSync } from 'node:fs';
import { z } from 'zod';

const confirmationListSchema = z.object({
  phrases: z.array(z.string()),
  exact: z.array(z.string()),
  symbols: z.array(z.string()),
});

type ConfirmationList = z.infer<typeof confirmationListSchema>;

let cached: ConfirmationList | null = null;

function load(): ConfirmationList {
  if (cached) return cached;
  const raw: unknown = JSON.parse(readFileSync(new URL('../data/follow-confirmations.json', import.meta.url), 'utf8'));
  cached = confirmationListSchema.parse(raw);
  return cached;
}

function normalize(text: string) {
  return text
    .toLowerCase()
    .replace(/[’`]/g, "'")
    .replace(/[^\p{L}\p{N}'\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** True when a DM reads like "I'm following" / "done" in answer to a follow prompt. */
export function isFollowConfirmation(text?: string | null): boolean {
  if (!text) return false;
  const list = load();
  if (list.symbols.some((symbol) => text.includes(symbol))) return true;

  const normalized = normalize(text);
  if (!normalized) return false;
  if (list.exact.includes(normalized)) return true;

  const padded = ` ${normalized} `;
  return list.phrases.some((phrase) => padded.includes(` ${phrase} `));
}
