/**
 * CORS Middleware
 *
 * The textbook frontend calls the API from the browser with the session
 * cookie, so only the configured origins are echoed and credentials are
 * allowed for them.
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

export function createCorsMiddleware(allowedOrigins: readonly string[]): MiddlewareHandler {
  return cors({
    origin: (origin) => (allowedOrigins.includes(origin) ? origin : ''),
    allowMethods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
    exposeHeaders: ['Content-Length', 'Retry-After'],
    maxAge: 86400, // 24 hours
    credentials: true,
  });
}
