import type { VercelRequest, VercelResponse } from '@vercel/node';
import { vi } from 'vitest';

export function createRequest(options: {
  method: string;
  body?: string;
  json?: unknown;
  headers?: Record<string, string>;
  query?: Record<string, string>;
}): VercelRequest {
  const raw = options.body ?? '';
  const iterable = {
    async *[Symbol.asyncIterator]() {
      if (raw) yield Buffer.from(raw);
    },
  };
  return {
    ...iterable,
    method: options.method,
    body: options.json,
    headers: options.headers ?? {},
    query: options.query ?? {},
  } as unknown as VercelRequest;
}

type FakeResponse = {
  status(code: number): FakeResponse;
  json(data: unknown): FakeResponse;
  send(data: unknown): FakeResponse;
  redirect(statusOrUrl: number | string, url?: string): FakeResponse;
  setHeader(name: string, value: unknown): FakeResponse;
};

export function createResponse() {
  const result: {
    statusCode: number;
    json: unknown;
    body: unknown;
    headers: Record<string, unknown>;
    redirect: string | null;
  } = { statusCode: 200, json: undefined, body: undefined, headers: {}, redirect: null };
  const fake: FakeResponse = {
    status(code) {
      result.statusCode = code;
      return fake;
    },
    json(data) {
      result.json = data;
      return fake;
    },
    send(data) {
      result.body = data;
      return fake;
    },
    redirect(statusOrUrl, url) {
      result.statusCode = typeof statusOrUrl === 'number' ? statusOrUrl : 307;
      result.redirect = typeof statusOrUrl === 'string' ? statusOrUrl : url ?? null;
      return fake;
    },
    setHeader: vi.fn((name: string, value: unknown) => {
      result.headers[name.toLowerCase()] = value;
      return fake;
    }),
  };
  return { res: fake as unknown as VercelResponse, result };
}
