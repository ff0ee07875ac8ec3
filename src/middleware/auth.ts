/**
 * Authentication Middleware
 *
 * Resolves the session from either source:
 * - Authorization: Bearer <token>
 * - session_token cookie (browser frontend)
 *
 * Sets context variables:
 * - c.get('userId') - Authenticated user ID
 * - c.get('user') - Authenticated user row
 * - c.get('sessionToken') - The token that authenticated the request
 */

import type { Context, Input, MiddlewareHandler } from 'hono';
import { getCookie } from 'hono/cookie';
import type { UserRecord } from '@/db/schema';
import { UnauthorizedError } from '@/errors/appErrors';
import type { AuthService } from '@/services/auth.service';
import type { HonoEnv } from '@/types/hono';
import { logger } from '@/utils/logger';

/** Bearer header first, then the cookie */
export function extractSessionToken(
  authorization: string | undefined,
  cookieToken: string | undefined
): string | undefined {
  if (authorization?.startsWith('Bearer ')) {
    const token = authorization.slice('Bearer '.length).trim();
    if (token) return token;
  }
  return cookieToken || undefined;
}

export function createAuthMiddleware(auth: AuthService, cookieName: string) {
  /**
   * Authentication resolver
   *
   * Invalid or expired tokens leave the request unauthenticated; routes opt
   * in with requireAuth. Store failures propagate to the error handler.
   */
  const authResolver: MiddlewareHandler<HonoEnv> = async (c, next) => {
    const token = extractSessionToken(c.req.header('Authorization'), getCookie(c, cookieName));

    if (token) {
      try {
        const { user } = await auth.authenticate(token);
        c.set('userId', user.id);
        c.set('user', user);
        c.set('sessionToken', token);
      } catch (error) {
        if (!(error instanceof UnauthorizedError)) throw error;
        logger.debug('Session rejected', { path: c.req.path, reason: error.message });
      }
    }

    return next();
  };

  /**
   * Require authentication guard
   *
   * Use after authResolver in middleware chain
   */
  const requireAuth: MiddlewareHandler<HonoEnv> = async (c, next) => {
    if (!c.get('userId')) {
      c.header('WWW-Authenticate', 'Bearer');
      return c.json(
        {
          error: {
            code: 'UNAUTHENTICATED',
            message: 'Authentication required',
          },
        },
        401
      );
    }
    return next();
  };

  return { authResolver, requireAuth };
}

/**
 * The authenticated user, for handlers behind requireAuth
 */
export function getAuthenticatedUser<P extends string, I extends Input>(
  c: Context<HonoEnv, P, I>
): UserRecord {
  const user = c.get('user');
  if (!user) {
    throw new UnauthorizedError();
  }
  return user;
}
