// --- HTTP helpers shared by the route handlers ---

import type { ServerResponse } from 'http';

export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
};

export function json(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' });
  res.end(JSON.stringify(data));
}

export function detail(res: ServerResponse, status: number, message: string): void {
  json(res, status, { detail: message });
}

/** Temporary redirect that keeps the request method. */
export function redirect(res: ServerResponse, location: string): void {
  res.writeHead(307, { Location: location, 'Access-Control-Allow-Origin': '*' });
  res.end();
}

export function parseQuery(url: string): Record<string, string> {
  const idx = url.indexOf('?');
  if (idx === -1) return {};
  const params: Record<string, string> = {};
  for (const [k, v] of new URLSearchParams(url.slice(idx + 1))) {
    if (k && !(k in params)) params[k] = v;
  }
  return params;
}

export type ActivityAction = 'signup' | 'unregister';

export type ActivityRoute =
  | { ok: true; name: string; action: ActivityAction }
  | { ok: false; reason: 'no_match' | 'malformed' };

const ACTIVITY_ROUTE = /^\/activities\/([^/]+)\/(signup|unregister)$/;

/** Match `/activities/{name}/{action}`, percent-decoding the name segment. */
export function matchActivityRoute(path: string): ActivityRoute {
  const m = ACTIVITY_ROUTE.exec(path);
  if (!m) return { ok: false, reason: 'no_match' };
  const action: ActivityAction = m[2] === 'signup' ? 'signup' : 'unregister';
  try {
    return { ok: true, name: decodeURIComponent(m[1]), action };
  } catch {
    return { ok: false, reason: 'malformed' };
  }
}
