import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_RE = /^[A-Za-z0-9._:-]+$/;

/**
 * Accepts a well-formed inbound X-Request-ID (or mints one), echoes it on the
 * response, and exposes a request-scoped logger as `c.get('log')`.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const raw = c.req.header('X-Request-ID');
  let requestId: string = randomUUID();
  if (raw) {
    const candidate = raw.trim().slice(0, 64);
    if (REQUEST_ID_RE.test(candidate)) {
      requestId = candidate;
    }
  }
  c.set('requestId', requestId);
  c.set('log', logger.child({ requestId }));
  c.header('X-Request-ID', requestId);
  await next();
}
