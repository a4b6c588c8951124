import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import { createAnalysisLogger, type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    logger: Logger;
  }
}

const REQUEST_ID_RE = /^[A-Za-z0-9._:-]+$/;

/**
 * Accepts a caller-supplied X-Request-ID when it is safe to echo, otherwise
 * mints one, and scopes a child logger to it.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const candidate = c.req.header('X-Request-ID')?.trim().slice(0, 64);
  const requestId = candidate && REQUEST_ID_RE.test(candidate) ? candidate : randomUUID();

  c.set('requestId', requestId);
  c.set('logger', createAnalysisLogger(requestId));
  c.header('X-Request-ID', requestId);
  await next();
}
