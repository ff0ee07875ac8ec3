/**
 * Rate Limiting Middleware
 *
 * Returns 429 Too Many Requests when limit exceeded
 */

import type { Context, Input, MiddlewareHandler } from 'hono';
import type { HonoEnv } from '@/types/hono';
import { RateLimitTier, type RateLimitService } from '@/services/rateLimit.service';

export function clientIp<P extends string, I extends Input>(c: Context<HonoEnv, P, I>): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ||
    c.req.header('x-real-ip') ||
    'unknown'
  );
}

/**
 * Limit a route group. AUTH is keyed by client IP, ASSISTANT by user (after
 * requireAuth) with the IP as fallback.
 */
export function createRateLimitMiddleware(
  service: RateLimitService,
  tier: RateLimitTier,
  options: { enabled: boolean }
): MiddlewareHandler<HonoEnv> {
  return async (c, next) => {
    if (!options.enabled) return next();

    const userId = c.get('userId');
    const key =
      tier === RateLimitTier.ASSISTANT && userId ? `user:${userId}` : `ip:${clientIp(c)}`;

    const result = await service.consume(key, tier);

    c.header('X-RateLimit-Limit', String(result.limit));
    c.header('X-RateLimit-Remaining', String(result.remainingPoints));
    c.header('X-RateLimit-Reset', String(result.resetTime));

    if (!result.allowed) {
      c.header('Retry-After', String(result.retryAfter ?? 60));

      return c.json(
        {
          error: {
            code: 'RATE_LIMIT_EXCEEDED',
            message: 'Too many requests. Please try again later.',
            details: { retryAfter: result.retryAfter, tier },
          },
        },
        429
      );
    }

    return next();
  };
}
