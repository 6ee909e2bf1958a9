import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

const REQUEST_ID_RE = /^[A-Za-z0-9._:-]{1,64}$/;

/**
 * Tags every request with an id (the caller's X-Request-ID when it is
 * well-formed) and logs method, path, status and duration once it is done.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const supplied = c.req.header('X-Request-ID')?.trim();
  const requestId = supplied && REQUEST_ID_RE.test(supplied) ? supplied : randomUUID();
  c.set('requestId', requestId);
  c.header('X-Request-ID', requestId);

  const startedAt = Date.now();
  await next();
  logger.debug(
    { requestId, method: c.req.method, path: c.req.path, status: c.res.status, duration_ms: Date.now() - startedAt },
    'Request handled',
  );
}
