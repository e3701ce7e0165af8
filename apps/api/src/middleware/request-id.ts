import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';

/**
 * Request ID middleware
 * Reuses an upstream request id when present so backend server logs and ours
 * can be correlated
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const existingRequestId = c.req.header('x-request-id') || c.req.header('x-correlation-id');
  const requestId = existingRequestId || randomUUID();

  c.set('requestId', requestId);
  c.header('x-request-id', requestId);

  await next();
}
