/**
 * Schema Store
 *
 * Transactional access to users, accounts, sessions, profiles and the chat
 * log. Constraint violations are translated here (see errors/dbErrors.ts);
 * callers only ever see the application error taxonomy.
 */

import { and, desc, eq, gt, lte } from 'drizzle-orm';
import type { Database } from '@/db/client';
import {
  accounts,
  chatMessages,
  sessions,
  userProfiles,
  users,
  type ChatMessageRecord,
  type SessionRecord,
  type UserProfileRecord,
  type UserRecord,
} from '@/db/schema';
import { InvalidArgumentError, NotFoundError } from '@/errors/appErrors';
import { translateDbError, type DbErrorMessages } from '@/errors/dbErrors';
import { decryptIfEncrypted, encryptIfAvailable } from '@/utils/crypto';

/** provider_id of email/password accounts */
export const CREDENTIAL_PROVIDER = 'credential';

export interface NewUser {
  email: string;
  name?: string | null;
  image?: string | null;
  emailVerified?: boolean;
}

export interface ProfileFields {
  softwareBackground?: string | null;
  hardwareBackground?: string | null;
  operatingSystem?: string | null;
  gpuHardware?: string | null;
  experienceLevel?: string;
  preferredLanguage?: string;
}

export interface NewSession {
  userId: string;
  tokenHash: string;
  expiresAt: Date;
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface NewLinkedAccount {
  providerId: string;
  accountId: string;
  accessToken?: string | null;
  refreshToken?: string | null;
  accessTokenExpiresAt?: Date | null;
}

/** An OAuth account with provider tokens in plaintext */
export interface LinkedAccount {
  id: string;
  userId: string;
  providerId: string;
  accountId: string;
  accessToken: string | null;
  refreshToken: string | null;
  accessTokenExpiresAt: Date | null;
  createdAt: Date;
}

export interface NewChatMessage {
  userId: string | null;
  message: string;
  response: string;
  contextUsed: string | null;
  language: string;
}

export interface SchemaStore {
  createUserWithProfile(input: {
    user: NewUser;
    profile: ProfileFields;
    passwordHash?: string;
  }): Promise<{ user: UserRecord; profile: UserProfileRecord }>;
  findUserByEmail(email: string): Promise<UserRecord | null>;
  findUserById(userId: string): Promise<UserRecord | null>;
  findCredentialByEmail(email: string): Promise<{ user: UserRecord; passwordHash: string } | null>;
  deleteUser(userId: string): Promise<void>;

  linkAccount(userId: string, account: NewLinkedAccount): Promise<LinkedAccount>;
  findAccount(providerId: string, accountId: string): Promise<LinkedAccount | null>;
  listAccounts(userId: string): Promise<LinkedAccount[]>;

  createSession(session: NewSession): Promise<SessionRecord>;
  findValidSessionByToken(
    tokenHash: string,
    now: Date
  ): Promise<{ session: SessionRecord; user: UserRecord } | null>;
  deleteSession(tokenHash: string): Promise<boolean>;
  deleteExpiredSessions(now: Date): Promise<number>;

  getProfile(userId: string): Promise<UserProfileRecord | null>;
  updateProfile(userId: string, fields: ProfileFields): Promise<UserProfileRecord>;

  appendChatMessage(entry: NewChatMessage): Promise<ChatMessageRecord>;
  listRecentChatMessages(userId: string, limit: number): Promise<ChatMessageRecord[]>;
}

export interface SchemaStoreOptions {
  /** AES-256-GCM key (hex) for OAuth provider tokens at rest */
  encryptionKey?: string;
}

export function createSchemaStore(db: Database, options: SchemaStoreOptions = {}): SchemaStore {
  const { encryptionKey } = options;

  async function run<T>(messages: DbErrorMessages, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw translateDbError(error, messages);
    }
  }

  const toLinkedAccount = (row: typeof accounts.$inferSelect): LinkedAccount => ({
    id: row.id,
    userId: row.userId,
    providerId: row.providerId,
    accountId: row.accountId,
    accessToken: row.accessToken ? decryptIfEncrypted(row.accessToken, encryptionKey) : null,
    refreshToken: row.refreshToken ? decryptIfEncrypted(row.refreshToken, encryptionKey) : null,
    accessTokenExpiresAt: row.accessTokenExpiresAt,
    createdAt: row.createdAt,
  });

  return {
    createUserWithProfile({ user, profile, passwordHash }) {
      return run(
        {
          operation: 'create user',
          conflict: 'Email already registered',
        },
        () =>
          db.transaction(async (tx) => {
            const [createdUser] = await tx
              .insert(users)
              .values({
                email: user.email,
                name: user.name ?? null,
                image: user.image ?? null,
                emailVerified: user.emailVerified ?? false,
              })
              .returning();

            const [createdProfile] = await tx
              .insert(userProfiles)
              .values({ ...profile, userId: createdUser.id })
              .returning();

            if (passwordHash) {
              await tx.insert(accounts).values({
                userId: createdUser.id,
                providerId: CREDENTIAL_PROVIDER,
                accountId: createdUser.id,
                password: passwordHash,
              });
            }

            return { user: createdUser, profile: createdProfile };
          })
      );
    },

    findUserByEmail(email) {
      return run({ operation: 'find user by email' }, async () => {
        const [user] = await db.select().from(users).where(eq(users.email, email)).limit(1);
        return user ?? null;
      });
    },

    findUserById(userId) {
      return run({ operation: 'find user' }, async () => {
        const [user] = await db.select().from(users).where(eq(users.id, userId)).limit(1);
        return user ?? null;
      });
    },

    findCredentialByEmail(email) {
      return run({ operation: 'find credential' }, async () => {
        const [row] = await db
          .select({ user: users, password: accounts.password })
          .from(users)
          .innerJoin(
            accounts,
            and(eq(accounts.userId, users.id), eq(accounts.providerId, CREDENTIAL_PROVIDER))
          )
          .where(eq(users.email, email))
          .limit(1);

        if (!row || !row.password) return null;
        return { user: row.user, passwordHash: row.password };
      });
    },

    async deleteUser(userId) {
      const deleted = await run({ operation: 'delete user' }, async () =>
        db.delete(users).where(eq(users.id, userId)).returning({ id: users.id })
      );
      if (deleted.length === 0) {
        throw new NotFoundError(`User ${userId} not found`);
      }
    },

    async linkAccount(userId, account) {
      if (account.providerId === CREDENTIAL_PROVIDER) {
        throw new InvalidArgumentError('Credential accounts are created at signup');
      }

      const [row] = await run(
        {
          operation: 'link account',
          conflict: `${account.providerId} identity is already linked to a user`,
          invalidReference: `User ${userId} not found`,
        },
        async () =>
          db
            .insert(accounts)
            .values({
              userId,
              providerId: account.providerId,
              accountId: account.accountId,
              accessToken: account.accessToken
                ? encryptIfAvailable(account.accessToken, encryptionKey)
                : null,
              refreshToken: account.refreshToken
                ? encryptIfAvailable(account.refreshToken, encryptionKey)
                : null,
              accessTokenExpiresAt: account.accessTokenExpiresAt ?? null,
            })
            .returning()
      );
      return toLinkedAccount(row);
    },

    findAccount(providerId, accountId) {
      return run({ operation: 'find account' }, async () => {
        const [row] = await db
          .select()
          .from(accounts)
          .where(and(eq(accounts.providerId, providerId), eq(accounts.accountId, accountId)))
          .limit(1);
        return row ? toLinkedAccount(row) : null;
      });
    },

    listAccounts(userId) {
      return run({ operation: 'list accounts' }, async () => {
        const rows = await db
          .select()
          .from(accounts)
          .where(eq(accounts.userId, userId))
          .orderBy(accounts.createdAt);
        return rows.map(toLinkedAccount);
      });
    },

    async createSession(session) {
      const [row] = await run(
        {
          operation: 'create session',
          invalidReference: `User ${session.userId} not found`,
        },
        async () =>
          db
            .insert(sessions)
            .values({
              userId: session.userId,
              tokenHash: session.tokenHash,
              expiresAt: session.expiresAt,
              ipAddress: session.ipAddress ?? null,
              userAgent: session.userAgent ?? null,
            })
            .returning()
      );
      return row;
    },

    findValidSessionByToken(tokenHash, now) {
      return run({ operation: 'find session' }, async () => {
        // Inner join: a session whose user is gone is not valid
        const [row] = await db
          .select({ session: sessions, user: users })
          .from(sessions)
          .innerJoin(users, eq(sessions.userId, users.id))
          .where(and(eq(sessions.tokenHash, tokenHash), gt(sessions.expiresAt, now)))
          .limit(1);
        return row ?? null;
      });
    },

    async deleteSession(tokenHash) {
      const deleted = await run({ operation: 'delete session' }, async () =>
        db.delete(sessions).where(eq(sessions.tokenHash, tokenHash)).returning({ id: sessions.id })
      );
      return deleted.length > 0;
    },

    async deleteExpiredSessions(now) {
      const deleted = await run({ operation: 'delete expired sessions' }, async () =>
        db.delete(sessions).where(lte(sessions.expiresAt, now)).returning({ id: sessions.id })
      );
      return deleted.length;
    },

    getProfile(userId) {
      return run({ operation: 'get profile' }, async () => {
        const [profile] = await db
          .select()
          .from(userProfiles)
          .where(eq(userProfiles.userId, userId))
          .limit(1);
        return profile ?? null;
      });
    },

    async updateProfile(userId, fields) {
      const [profile] = await run({ operation: 'update profile' }, async () =>
        db
          .update(userProfiles)
          .set({ ...fields, updatedAt: new Date() })
          .where(eq(userProfiles.userId, userId))
          .returning()
      );
      if (!profile) {
        throw new NotFoundError(`Profile for user ${userId} not found`);
      }
      return profile;
    },

    async appendChatMessage(entry) {
      const [row] = await run(
        {
          operation: 'append chat message',
          invalidReference: `User ${entry.userId} not found`,
        },
        async () => db.insert(chatMessages).values(entry).returning()
      );
      return row;
    },

    listRecentChatMessages(userId, limit) {
      return run({ operation: 'list chat messages' }, async () =>
        db
          .select()
          .from(chatMessages)
          .where(eq(chatMessages.userId, userId))
          .orderBy(desc(chatMessages.createdAt), desc(chatMessages.id))
          .limit(limit)
      );
    },
  };
}
