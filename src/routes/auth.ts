/**
 * Authentication Routes
 *
 * Email/password signup and signin, signout and the current user.
 * Session tokens are returned in the body and set as an httpOnly cookie.
 */

import { Hono, type Context, type Input, type MiddlewareHandler } from 'hono';
import { deleteCookie, getCookie, setCookie } from 'hono/cookie';
import type { AppConfig } from '@/config';
import { extractSessionToken, getAuthenticatedUser } from '@/middleware/auth';
import { clientIp } from '@/middleware/rateLimit';
import type { AuthResult, AuthService, SessionMeta } from '@/services/auth.service';
import type { SchemaStore } from '@/services/store.service';
import type { HonoEnv } from '@/types/hono';
import { DEFAULT_PROFILE, serializeProfile } from '@/routes/profile';
import { signinSchema, signupSchema } from '@/validators/auth';
import { toProfileFields } from '@/validators/profile';
import { validate } from '@/validators/validate';

export interface AuthRouteDeps {
  auth: AuthService;
  store: SchemaStore;
  session: AppConfig['session'];
  requireAuth: MiddlewareHandler<HonoEnv>;
  /** Applied to signup and signin */
  credentialRateLimit: MiddlewareHandler<HonoEnv>;
}

function requestMeta<P extends string, I extends Input>(c: Context<HonoEnv, P, I>): SessionMeta {
  const ip = clientIp(c);
  return {
    ipAddress: ip === 'unknown' ? null : ip.slice(0, 45),
    userAgent: c.req.header('user-agent')?.slice(0, 500) ?? null,
  };
}

function serializeAuthResult(result: AuthResult) {
  return {
    session_token: result.sessionToken,
    expires_at: result.expiresAt.toISOString(),
    user: result.user,
  };
}

export function createAuthRoutes(deps: AuthRouteDeps) {
  const { auth, store, session, requireAuth, credentialRateLimit } = deps;
  const authRoutes = new Hono<HonoEnv>();

  function setSessionCookie<P extends string, I extends Input>(
    c: Context<HonoEnv, P, I>,
    result: AuthResult
  ) {
    setCookie(c, session.cookieName, result.sessionToken, {
      httpOnly: true,
      secure: session.secureCookie,
      sameSite: 'Lax',
      path: '/',
      expires: result.expiresAt,
    });
  }

  /**
   * POST /api/auth/signup
   */
  authRoutes.post('/signup', credentialRateLimit, validate('json', signupSchema), async (c) => {
    const body = c.req.valid('json');

    const result = await auth.signup(
      {
        email: body.email,
        name: body.name,
        password: body.password,
        profile: toProfileFields(body),
      },
      requestMeta(c)
    );

    setSessionCookie(c, result);
    return c.json(serializeAuthResult(result), 201);
  });

  /**
   * POST /api/auth/signin
   */
  authRoutes.post('/signin', credentialRateLimit, validate('json', signinSchema), async (c) => {
    const { email, password } = c.req.valid('json');
    const result = await auth.signin(email, password, requestMeta(c));

    setSessionCookie(c, result);
    return c.json(serializeAuthResult(result));
  });

  /**
   * POST /api/auth/signout
   *
   * Always succeeds; an unknown or missing token is a no-op
   */
  authRoutes.post('/signout', async (c) => {
    const token =
      c.get('sessionToken') ??
      extractSessionToken(c.req.header('Authorization'), getCookie(c, session.cookieName));

    if (token) {
      await auth.signout(token);
    }

    deleteCookie(c, session.cookieName, { path: '/' });
    return c.json({ message: 'Signed out successfully' });
  });

  /**
   * GET /api/auth/me
   */
  authRoutes.get('/me', requireAuth, async (c) => {
    const user = getAuthenticatedUser(c);
    const profile = await store.getProfile(user.id);

    return c.json({
      id: user.id,
      email: user.email,
      name: user.name,
      email_verified: user.emailVerified,
      created_at: user.createdAt.toISOString(),
      profile: profile ? serializeProfile(profile) : DEFAULT_PROFILE,
    });
  });

  return authRoutes;
}
