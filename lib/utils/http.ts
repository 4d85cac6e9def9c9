import type { VercelRequest, VercelResponse } from '@vercel/node';
import type { ZodType, ZodTypeDef } from 'zod';

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    readonly detail?: unknown,
  ) {
    super(code);
    this.name = 'ApiError';
  }
}

export async function getRawBody(req: AsyncIterable<Buffer | string>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks);
}

export function firstHeader(value: string | string[] | undefined): string {
  if (Array.isArray(value)) return value[0] ?? '';
  return value ?? '';
}

export function queryParam(req: VercelRequest, name: string): string {
  const value = req.query?.[name];
  if (Array.isArray(value)) return value[0] ?? '';
  return typeof value === 'string' ? value : '';
}

export function clampInt(raw: string, fallback: number, min: number, max: number) {
  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, parsed));
}

/** Returns false (after answering 405) when the request method is not allowed. */
export function allowMethods(req: VercelRequest, res: VercelResponse, methods: string[]) {
  if (req.method && methods.includes(req.method)) return true;
  res.setHeader('Allow', methods);
  res.status(405).json({ ok: false, error: 'method_not_allowed' });
  return false;
}

export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  let value = body;
  if (typeof body === 'string') {
    try {
      value = JSON.parse(body);
    } catch {
      throw new ApiError(400, 'invalid_json');
    }
  }
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ApiError(400, 'invalid_body', parsed.error.issues);
  }
  return parsed.data;
}

export function sendError(res: VercelResponse, scope: string, error: unknown) {
  if (error instanceof ApiError) {
    const payload: Record<string, unknown> = { ok: false, error: error.code };
    if (error.detail !== undefined) payload.detail = error.detail;
    return res.status(error.status).json(payload);
  }
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[${scope}] unhandled error`, { message });
  return res.status(500).json({ ok: false, error: message });
}
