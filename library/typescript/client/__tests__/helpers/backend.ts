import { vi } from 'vitest';
import type { Logger } from '@supakit/telemetry';

export const BASE_URL = 'https://project.example.com';
export const NOW_MS = 1_700_000_000_000;

export const TEST_USER = {
  id: 'user-1',
  aud: 'authenticated',
  role: 'authenticated',
  email: 'user@example.com',
  created_at: '2024-01-01T00:00:00Z',
  updated_at: '2024-01-02T00:00:00Z',
  app_metadata: { provider: 'email' },
  user_metadata: {},
};

export function tokenResponse(accessToken: string, expiresAt: number) {
  return {
    access_token: accessToken,
    token_type: 'bearer',
    expires_in: 3600,
    expires_at: expiresAt,
    refresh_token: `${accessToken}-refresh`,
    user: TEST_USER,
  };
}

export function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export type Route = (url: URL, init: RequestInit) => Response | Promise<Response>;

/** "METHOD /path" をキーにレスポンスを返す fetch モック */
export function createBackend(routes: Record<string, Route>) {
  return vi.fn(async (input: RequestInfo | URL, init?: RequestInit) => {
    const url = new URL(String(input));
    const route = routes[`${init?.method ?? 'GET'} ${url.pathname}`];
    if (!route) {
      return new Response(`no route for ${url.pathname}`, { status: 501 });
    }
    return route(url, init ?? {});
  });
}

export type BackendFetch = ReturnType<typeof createBackend>;

/** 指定パスへの呼び出しを抽出する */
export function callsTo(fetch: BackendFetch, method: string, pathname: string) {
  return fetch.mock.calls
    .map(([input, init]) => ({ url: new URL(String(input)), init: init ?? {} }))
    .filter(({ url, init }) => (init.method ?? 'GET') === method && url.pathname === pathname)
    .map(({ url, init }) => ({ url, init, headers: new Headers(init.headers) }));
}

export function createLoggerSpy() {
  const log = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return { log, logger: log as unknown as Logger };
}
