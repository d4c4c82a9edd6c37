/**
 * Request ID Middleware
 * Reuses the caller's X-Request-Id or generates one
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

export function createRequestIdMiddleware() {
  return async function requestIdMiddleware(c: Context, next: Next) {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? generateRequestId();
    c.set('requestId', requestId);
    c.header(REQUEST_ID_HEADER, requestId);
    await next();
  };
}
