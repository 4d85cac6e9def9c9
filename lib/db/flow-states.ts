import { z } from 'zod';
import type { StateRef } from '../flow/routing.js';
import { FLOW_STEPS, type FlowState } from '../flow/types.js';
import { eq, sbDelete, sbSelect, sbUpsert } from '../utils/sb.js';
import { expectOk, firstRow, parseRows } from './rows.js';

const text = z.string().nullable().default(null);

const stateRowSchema = z
  .object({
    rule_id: z.string(),
    sender_id: z.coerce.string(),
    step: z.enum(FLOW_STEPS),
    email: text,
    phone: text,
    follow_confirmed: z.boolean().default(false),
    attempts: z.number().int().default(0),
    last_inbound_at: text,
    updated_at: text,
  })
  .transform((row) => ({
    ruleId: row.rule_id,
    senderId: row.sender_id,
    state: {
      step: row.step,
      email: row.email,
      phone: row.phone,
      followConfirmed: row.follow_confirmed,
      attempts: row.attempts,
      lastInboundAt: row.last_inbound_at,
      updatedAt: row.updated_at,
    } satisfies FlowState,
  }));

export type StoredFlowState = z.output<typeof stateRowSchema>;

export function toStateRef(stored: StoredFlowState): StateRef {
  return { ruleId: stored.ruleId, step: stored.state.step, updatedAt: stored.state.updatedAt };
}

export async function getFlowState(ruleId: string, senderId: string): Promise<FlowState | null> {
  const result = await sbSelect(`flow_states?select=*&rule_id=${eq(ruleId)}&sender_id=${eq(senderId)}&limit=1`);
  return firstRow(stateRowSchema, result, 'select flow_states')?.state ?? null;
}

/** Every stored conversation the sender has with the given rules. */
export async function listSenderStates(ruleIds: string[], senderId: string) {
  if (!ruleIds.length) return [];
  const ids = ruleIds.map((id) => encodeURIComponent(id)).join(',');
  const result = await sbSelect(`flow_states?select=*&sender_id=${eq(senderId)}&rule_id=in.(${ids})`);
  return parseRows(stateRowSchema, result, 'select flow_states');
}

export async function saveFlowState(ruleId: string, senderId: string, state: FlowState) {
  const result = await sbUpsert(
    'flow_states',
    {
      rule_id: ruleId,
      sender_id: senderId,
      step: state.step,
      email: state.email,
      phone: state.phone,
      follow_confirmed: state.followConfirmed,
      attempts: state.attempts,
      last_inbound_at: state.lastInboundAt,
      updated_at: state.updatedAt ?? new Date().toISOString(),
    },
    'rule_id,sender_id',
  );
  expectOk('upsert flow_states', result);
}

export async function resetRuleStates(ruleId: string) {
  expectOk('delete flow_states', await sbDelete(`flow_states?rule_id=${eq(ruleId)}`));
}
