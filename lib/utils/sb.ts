import { supabaseEnv } from '../config/env.js';

export type SbResult = { ok: boolean; status: number; json: unknown };

function sbHeaders(extra?: Record<string, string>): Record<string, string> {
  const { serviceRole } = supabaseEnv();
  return {
    'Content-Type': 'application/json',
    apikey: serviceRole,
    Authorization: `Bearer ${serviceRole}`,
    ...extra,
  };
}

function restUrl(resource: string) {
  return `${supabaseEnv().url}/rest/v1/${resource}`;
}

async function toResult(response: Response): Promise<SbResult> {
  const json: unknown = await response.json().catch(() => ({}));
  return { ok: response.ok, status: response.status, json };
}

export function sbReady() {
  const { url, serviceRole } = supabaseEnv();
  return Boolean(url && serviceRole);
}

export async function sbInsert(table: string, row: Record<string, unknown> | Record<string, unknown>[]) {
  const payload = Array.isArray(row) ? row : [row];
  const response = await fetch(restUrl(table), {
    method: 'POST',
    headers: sbHeaders({ Prefer: 'return=representation' }),
    body: JSON.stringify(payload),
  });
  return toResult(response);
}

export async function sbUpsert(
  table: string,
  row: Record<string, unknown> | Record<string, unknown>[],
  onConflict: string,
) {
  const payload = Array.isArray(row) ? row : [row];
  const response = await fetch(`${restUrl(table)}?on_conflict=${encodeURIComponent(onConflict)}`, {
    method: 'POST',
    headers: sbHeaders({ Prefer: 'resolution=merge-duplicates,return=representation' }),
    body: JSON.stringify(payload),
  });
  return toResult(response);
}

export async function sbPatch(resource: string, patch: Record<string, unknown>) {
  const response = await fetch(restUrl(resource), {
    method: 'PATCH',
    headers: sbHeaders({ Prefer: 'return=representation' }),
    body: JSON.stringify(patch),
  });
  return toResult(response);
}

export async function sbDelete(resource: string) {
  const response = await fetch(restUrl(resource), {
    method: 'DELETE',
    headers: sbHeaders({ Prefer: 'return=representation' }),
  });
  return toResult(response);
}

export async function sbSelect(qs: string) {
  const response = await fetch(restUrl(qs), {
    method: 'GET',
    headers: sbHeaders(),
  });
  return toResult(response);
}

export async function sbRpc(fn: string, args: Record<string, unknown>) {
  const response = await fetch(restUrl(`rpc/${fn}`), {
    method: 'POST',
    headers: sbHeaders(),
    body: JSON.stringify(args),
  });
  return toResult(response);
}

/** Exact row count for a filtered table, read from the Content-Range header. */
export async function sbCount(qs: string): Promise<SbResult & { count: number }> {
  const separator = qs.includes('?') ? '&' : '?';
  const response = await fetch(restUrl(`${qs}${separator}limit=1`), {
    method: 'GET',
    headers: sbHeaders({ Prefer: 'count=exact' }),
  });
  await response.body?.cancel();
  const range = response.headers.get('content-range') || '';
  const total = Number(range.split('/')[1]);
  return { ok: response.ok, status: response.status, json: null, count: Number.isFinite(total) ? total : 0 };
}

export function eq(value: string | number | boolean) {
  return `eq.${encodeURIComponent(String(value))}`;
}
