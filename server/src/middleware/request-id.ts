import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/** Caller's X-Request-ID when it is safe to echo, else a fresh UUID. */
export function resolveRequestId(raw: string | undefined): string {
  const candidate = raw?.trim().slice(0, 64);
  return candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : randomUUID();
}

/**
 * Tags each request with an id (echoed in X-Request-ID) and a child logger
 * carrying it, then logs the request once it completes.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header('X-Request-ID'));
  const log = logger.child({ requestId });
  c.set('requestId', requestId);
  c.set('log', log);
  c.header('X-Request-ID', requestId);

  const started = Date.now();
  await next();
  log.info(
    { method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Date.now() - started },
    'request completed',
  );
}
