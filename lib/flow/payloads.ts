export const PAYLOAD_ACTIONS = ['OPEN', 'FOLLOW'] as const;
export type PayloadAction = (typeof PAYLOAD_ACTIONS)[number];

export type RulePayload = { ruleId: string; action: PayloadAction };

const PAYLOAD_RE = /^RULE:([^:]+):([A-Z_]+)$/;

export function buildPayload(ruleId: string, action: PayloadAction) {
  return `RULE:${ruleId}:${action}`;
}

function isPayloadAction(value: string): value is PayloadAction {
  return (PAYLOAD_ACTIONS as readonly string[]).includes(value);
}

export function parsePayload(raw?: string | null): RulePayload | null {
  if (!raw) return null;
  const match = raw.trim().match(PAYLOAD_RE);
  if (!match) return null;
  const [, ruleId, action] = match;
  if (!isPayloadAction(action)) return null;
  return { ruleId, action };
}
