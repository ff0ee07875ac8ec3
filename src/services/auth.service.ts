/**
 * Authentication Service
 *
 * Business logic for authentication operations:
 * - Email/password signup and signin
 * - Session issue, lookup and signout
 *
 * Sessions are opaque bearer tokens; only their HMAC is stored. Expiry is a
 * fixed TTL from creation, checked on every lookup. There is no sliding
 * renewal.
 */

import type { AppConfig } from '@/config';
import type { UserProfileRecord, UserRecord } from '@/db/schema';
import { UnauthorizedError } from '@/errors/appErrors';
import type { PasswordHasher } from '@/services/password.service';
import type { ProfileFields, SchemaStore } from '@/services/store.service';
import {
  constantTimeCompare,
  generateSessionToken,
  hashSessionToken,
  isWellFormedSessionToken,
} from '@/utils/crypto';
import { logger } from '@/utils/logger';

/**
 * User fields returned alongside a new session
 */
export interface UserSummary {
  id: string;
  email: string;
  name: string | null;
}

/**
 * Result of signup/signin. `sessionToken` is the raw bearer token and is
 * only available here.
 */
export interface AuthResult {
  sessionToken: string;
  expiresAt: Date;
  user: UserSummary;
}

export interface SignupInput {
  email: string;
  name: string;
  password: string;
  profile: ProfileFields;
}

/** Request metadata recorded on the session row */
export interface SessionMeta {
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface AuthenticatedUser {
  user: UserRecord;
  sessionId: string;
  expiresAt: Date;
}

export interface AuthService {
  signup(input: SignupInput, meta?: SessionMeta): Promise<AuthResult & { profile: UserProfileRecord }>;
  signin(email: string, password: string, meta?: SessionMeta): Promise<AuthResult>;
  authenticate(token: string | null | undefined): Promise<AuthenticatedUser>;
  signout(token: string): Promise<void>;
}

export interface AuthServiceDeps {
  store: SchemaStore;
  hasher: PasswordHasher;
  session: Pick<AppConfig['session'], 'secret' | 'ttlMs'>;
  /** Injectable clock */
  now?: () => Date;
}

const authLogger = logger.child({ component: 'auth' });

function toSummary(user: UserRecord): UserSummary {
  return { id: user.id, email: user.email, name: user.name };
}

export function createAuthService(deps: AuthServiceDeps): AuthService {
  const { store, hasher, session: sessionConfig } = deps;
  const now = deps.now ?? (() => new Date());

  // Digest verified when the email is unknown, so that path costs the same
  // argon2 work as a wrong password. Hashed here so no signin pays for it.
  const dummyDigest = hasher.hash(generateSessionToken());
  void dummyDigest.catch((error: unknown) => {
    authLogger.error('Dummy digest could not be created', { error: String(error) });
  });

  async function issueSession(user: UserRecord, meta: SessionMeta = {}): Promise<AuthResult> {
    const sessionToken = generateSessionToken();
    const expiresAt = new Date(now().getTime() + sessionConfig.ttlMs);

    await store.createSession({
      userId: user.id,
      tokenHash: hashSessionToken(sessionToken, sessionConfig.secret),
      expiresAt,
      ipAddress: meta.ipAddress,
      userAgent: meta.userAgent,
    });

    return { sessionToken, expiresAt, user: toSummary(user) };
  }

  return {
    async signup(input, meta) {
      const passwordHash = await hasher.hash(input.password);

      // The unique index on users.email decides concurrent signups
      const { user, profile } = await store.createUserWithProfile({
        user: { email: input.email, name: input.name },
        profile: input.profile,
        passwordHash,
      });

      authLogger.info('User signed up', { userId: user.id });

      const result = await issueSession(user, meta);
      return { ...result, profile };
    },

    async signin(email, password, meta) {
      const credential = await store.findCredentialByEmail(email);

      if (!credential) {
        await hasher.verify(password, await dummyDigest);
        throw new UnauthorizedError('Invalid credentials');
      }

      const valid = await hasher.verify(password, credential.passwordHash);
      if (!valid) {
        authLogger.info('Signin rejected', { userId: credential.user.id });
        throw new UnauthorizedError('Invalid credentials');
      }

      return issueSession(credential.user, meta);
    },

    async authenticate(token) {
      if (!token) {
        throw new UnauthorizedError('Not authenticated');
      }
      if (!isWellFormedSessionToken(token)) {
        throw new UnauthorizedError('Invalid or expired session');
      }

      const tokenHash = hashSessionToken(token, sessionConfig.secret);
      const found = await store.findValidSessionByToken(tokenHash, now());

      if (!found || !constantTimeCompare(found.session.tokenHash, tokenHash)) {
        throw new UnauthorizedError('Invalid or expired session');
      }

      return {
        user: found.user,
        sessionId: found.session.id,
        expiresAt: found.session.expiresAt,
      };
    },

    async signout(token) {
      if (!isWellFormedSessionToken(token)) return;
      await store.deleteSession(hashSessionToken(token, sessionConfig.secret));
    },
  };
}
