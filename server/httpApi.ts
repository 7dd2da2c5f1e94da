import type { IncomingMessage, ServerResponse } from 'node:http';
import type { ColonyStatus } from '../src/colony.ts';
import type { GenerationSummary } from '../src/fitness.ts';

/** Default and largest number of history entries returned. */
const DEFAULT_HISTORY_LIMIT = 20;
const MAX_HISTORY_LIMIT = 100;

export interface HttpApiDeps {
  getStatus: () => { tick: number; clients: number };
  getColonyStatus: () => ColonyStatus | null;
  getHistory: () => readonly GenerationSummary[];
  cfgHash: string;
  seed: number;
}

export function createHttpHandler(deps: HttpApiDeps): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    try {
      handleRequest(req, res, deps);
    } catch (err) {
      sendJson(res, 500, { ok: false, message: err instanceof Error ? err.message : String(err) });
    }
  };
}

function applyCors(req: IncomingMessage, res: ServerResponse): void {
  const origin = req.headers.origin;
  if (origin) {
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Vary', 'Origin');
  } else {
    res.setHeader('Access-Control-Allow-Origin', '*');
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET,OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
}

/** Parses ?limit=, falling back to the default for anything non-numeric. */
export function parseHistoryLimit(raw: string | null): number {
  if (raw === null) return DEFAULT_HISTORY_LIMIT;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return DEFAULT_HISTORY_LIMIT;
  return Math.min(MAX_HISTORY_LIMIT, Math.max(1, Math.floor(parsed)));
}

function handleRequest(req: IncomingMessage, res: ServerResponse, deps: HttpApiDeps): void {
  applyCors(req, res);
  if (req.method === 'OPTIONS') {
    res.statusCode = 204;
    res.end();
    return;
  }
  const url = new URL(req.url ?? '/', 'http://localhost');
  if (req.method === 'GET' && url.pathname === '/health') {
    const status = deps.getStatus();
    sendJson(res, 200, { ok: true, tick: status.tick, clients: status.clients });
    return;
  }

  if (req.method === 'GET' && url.pathname === '/api/status') {
    const colony = deps.getColonyStatus();
    if (!colony) {
      sendJson(res, 503, { ok: false, message: 'colony not ready' });
      return;
    }
    sendJson(res, 200, { ok: true, seed: deps.seed, cfgHash: deps.cfgHash, status: colony });
    return;
  }

  if (req.method === 'GET' && url.pathname === '/api/history') {
    const limit = parseHistoryLimit(url.searchParams.get('limit'));
    const history = deps.getHistory();
    sendJson(res, 200, { ok: true, history: history.slice(Math.max(0, history.length - limit)) });
    return;
  }

  res.statusCode = 404;
  res.end('Not found');
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(payload));
}
