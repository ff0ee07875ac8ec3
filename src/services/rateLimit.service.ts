/**
 * Rate Limiting Service
 *
 * In-memory limiters keyed per client.
 *
 * Rate Limits:
 * - Credential endpoints (signup/signin): 10 req/min per IP
 * - Assistant endpoints (ask/personalize/translate): 30 req/min per user
 */

import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { logger } from '@/utils/logger';

export enum RateLimitTier {
  AUTH = 'auth',
  ASSISTANT = 'assistant',
}

export interface TierLimits {
  points: number;
  /** Seconds */
  duration: number;
  /** Seconds blocked after the limit is hit */
  blockDuration: number;
}

export const DEFAULT_RATE_LIMITS: Record<RateLimitTier, TierLimits> = {
  [RateLimitTier.AUTH]: {
    points: 10,
    duration: 60,
    blockDuration: 300,
  },
  [RateLimitTier.ASSISTANT]: {
    points: 30,
    duration: 60,
    blockDuration: 60,
  },
};

export interface RateLimitResult {
  allowed: boolean;
  tier: RateLimitTier;
  limit: number;
  remainingPoints: number;
  /** Unix timestamp (seconds) when the window resets */
  resetTime: number;
  /** Seconds to wait before retry */
  retryAfter?: number;
}

export interface RateLimitService {
  consume(key: string, tier: RateLimitTier): Promise<RateLimitResult>;
  reset(key: string, tier: RateLimitTier): Promise<void>;
}

export function createRateLimitService(
  overrides: Partial<Record<RateLimitTier, TierLimits>> = {}
): RateLimitService {
  const limits: Record<RateLimitTier, TierLimits> = { ...DEFAULT_RATE_LIMITS, ...overrides };

  const limiters: Record<RateLimitTier, RateLimiterMemory> = {
    [RateLimitTier.AUTH]: new RateLimiterMemory({
      keyPrefix: RateLimitTier.AUTH,
      ...limits[RateLimitTier.AUTH],
    }),
    [RateLimitTier.ASSISTANT]: new RateLimiterMemory({
      keyPrefix: RateLimitTier.ASSISTANT,
      ...limits[RateLimitTier.ASSISTANT],
    }),
  };

  return {
    async consume(key, tier) {
      const config = limits[tier];
      const nowSeconds = Math.floor(Date.now() / 1000);

      try {
        const result = await limiters[tier].consume(key);
        return {
          allowed: true,
          tier,
          limit: config.points,
          remainingPoints: result.remainingPoints,
          resetTime: nowSeconds + Math.ceil(result.msBeforeNext / 1000),
        };
      } catch (error) {
        if (error instanceof RateLimiterRes) {
          return {
            allowed: false,
            tier,
            limit: config.points,
            remainingPoints: 0,
            resetTime: nowSeconds + Math.ceil(error.msBeforeNext / 1000),
            retryAfter: Math.max(1, Math.ceil(error.msBeforeNext / 1000)),
          };
        }

        // Fail open
        logger.error('Rate limiter error', { error: String(error) });
        return {
          allowed: true,
          tier,
          limit: config.points,
          remainingPoints: config.points,
          resetTime: nowSeconds + config.duration,
        };
      }
    },

    async reset(key, tier) {
      await limiters[tier].delete(key);
    },
  };
}
