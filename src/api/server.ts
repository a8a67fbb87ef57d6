import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import type { ActivityDirectory } from '../activities/directory.js';
import type { DirectoryResult } from '../activities/types.js';
import { CORS_HEADERS, detail, json, matchActivityRoute, parseQuery, redirect } from './http.js';
import type { ActivityAction } from './http.js';
import { serveStatic, STATIC_PREFIX } from './static.js';

export const LANDING_PAGE = '/static/index.html';

export interface ServerOptions {
  staticDir: string;
  /** Log signups, unregisters and static misses to stdout (default true). */
  logRequests?: boolean;
}

const ALLOWED_METHODS: Record<string, string> = {
  '/': 'GET',
  '/activities': 'GET',
  '/health': 'GET',
};

const ACTION_METHODS: Record<ActivityAction, string> = {
  signup: 'POST',
  unregister: 'DELETE',
};

function statusFor(result: Extract<DirectoryResult, { ok: false }>): number {
  return result.error.kind === 'not_found' ? 404 : 400;
}

export function createActivityServer(directory: ActivityDirectory, options: ServerOptions): Server {
  const logRequests = options.logRequests ?? true;
  const startedAt = Date.now();

  function log(tag: string, message: string): void {
    if (logRequests) {
      console.log(`[${new Date().toISOString()}] [${tag}] ${message}`);
    }
  }

  // --- Handlers ---

  function handleList(res: ServerResponse): void {
    json(res, 200, directory.list());
  }

  function handleActivityAction(req: IncomingMessage, res: ServerResponse, name: string, action: ActivityAction): void {
    const email = parseQuery(req.url || '').email;
    if (!email) {
      detail(res, 422, 'Missing required query parameter: email');
      return;
    }

    const result = action === 'signup'
      ? directory.signup(name, email)
      : directory.unregister(name, email);

    if (!result.ok) {
      log('Activities', `${action} rejected (${result.error.kind}): ${email} / ${name}`);
      detail(res, statusFor(result), result.error.detail);
      return;
    }

    log('Activities', result.message);
    json(res, 200, { message: result.message });
  }

  function handleHealth(res: ServerResponse): void {
    const activities = directory.list();
    json(res, 200, {
      status: 'ok',
      uptimeMs: Date.now() - startedAt,
      activities: Object.keys(activities).length,
      participants: directory.participantCount(),
      openSpots: Object.keys(activities).reduce((sum, name) => sum + Math.max(0, directory.spotsLeft(name) ?? 0), 0),
      timestamp: new Date().toISOString(),
    });
  }

  // --- Routing ---

  function route(req: IncomingMessage, res: ServerResponse): void {
    const method = req.method || 'GET';
    // HEAD is answered like GET; node drops the body
    const readMethod = method === 'HEAD' ? 'GET' : method;
    const url = (req.url || '').split('?')[0];

    if (method === 'OPTIONS') {
      res.writeHead(204, CORS_HEADERS);
      res.end();
      return;
    }

    const allowed = ALLOWED_METHODS[url];
    if (allowed !== undefined) {
      if (readMethod !== allowed) {
        detail(res, 405, 'Method Not Allowed');
      } else if (url === '/') {
        redirect(res, LANDING_PAGE);
      } else if (url === '/activities') {
        handleList(res);
      } else {
        handleHealth(res);
      }
      return;
    }

    if (url.startsWith(STATIC_PREFIX)) {
      if (readMethod !== 'GET') {
        detail(res, 405, 'Method Not Allowed');
      } else if (!serveStatic(res, options.staticDir, url)) {
        log('Static', `Not found: ${url}`);
      }
      return;
    }

    const match = matchActivityRoute(url);
    if (match.ok) {
      if (method !== ACTION_METHODS[match.action]) {
        detail(res, 405, 'Method Not Allowed');
      } else {
        handleActivityAction(req, res, match.name, match.action);
      }
      return;
    }
    if (match.reason === 'malformed') {
      detail(res, 400, 'Malformed activity name');
      return;
    }

    detail(res, 404, 'Not Found');
  }

  return createServer((req, res) => {
    try {
      route(req, res);
    } catch (err) {
      console.error('[Server] Request error:', err);
      if (!res.headersSent) {
        detail(res, 500, 'Internal Server Error');
      } else {
        res.end();
      }
    }
  });
}
