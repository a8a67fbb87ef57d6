// --- Static file serving for the landing page ---

import { readFileSync, statSync } from 'fs';
import { extname, resolve, sep } from 'path';
import type { ServerResponse } from 'http';
import { detail } from './http.js';

export const STATIC_PREFIX = '/static/';

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.json': 'application/json',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
  '.txt': 'text/plain; charset=utf-8',
};

/**
 * Resolve a `/static/...` request path to a file inside `staticDir`.
 * Returns null for anything that would land outside it.
 */
export function resolveStaticPath(staticDir: string, urlPath: string): string | null {
  if (!urlPath.startsWith(STATIC_PREFIX)) return null;
  let relative: string;
  try {
    relative = decodeURIComponent(urlPath.slice(STATIC_PREFIX.length));
  } catch {
    return null;
  }
  if (relative === '' || relative.includes('\0')) return null;

  const root = resolve(staticDir);
  const target = resolve(root, relative);
  return target.startsWith(root + sep) ? target : null;
}

/** Writes the file, or a 404. Returns false when nothing was found. */
export function serveStatic(res: ServerResponse, staticDir: string, urlPath: string): boolean {
  const file = resolveStaticPath(staticDir, urlPath);
  if (!file) {
    detail(res, 404, 'Not Found');
    return false;
  }

  let body: Buffer;
  try {
    if (!statSync(file).isFile()) {
      detail(res, 404, 'Not Found');
      return false;
    }
    body = readFileSync(file);
  } catch {
    detail(res, 404, 'Not Found');
    return false;
  }

  res.writeHead(200, {
    'Content-Type': CONTENT_TYPES[extname(file).toLowerCase()] ?? 'application/octet-stream',
    'Cache-Control': 'no-cache',
  });
  res.end(body);
  return true;
}
