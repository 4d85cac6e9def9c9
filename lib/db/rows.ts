import type { z } from 'zod';
import type { SbResult } from '../utils/sb.js';

export class DbError extends Error {
  constructor(
    readonly operation: string,
    readonly status: number,
    readonly detail: unknown,
  ) {
    super(`Supabase ${operation} failed (status ${status})`);
    this.name = 'DbError';
  }
}

/** Throws on a non-2xx response; PostgREST error bodies are kept as detail. */
export function expectOk(operation: string, result: SbResult): SbResult {
  if (!result.ok) throw new DbError(operation, result.status, result.json);
  return result;
}

export function parseRows<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  result: SbResult,
  operation: string,
): T[] {
  expectOk(operation, result);
  if (!Array.isArray(result.json)) return [];
  const rows: T[] = [];
  for (const item of result.json) {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      console.warn(`[db] skipped malformed row from ${operation}`, { issues: parsed.error.issues.slice(0, 3) });
    }
  }
  return rows;
}

export function firstRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, result: SbResult, operation: string) {
  return parseRows(schema, result, operation)[0] ?? null;
}
