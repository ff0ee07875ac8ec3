/**
 * Database Schema Definitions
 * Drizzle ORM schema for PostgreSQL
 *
 * Mirrors the DDL in ./migrations.ts. Keep both in step when adding columns.
 */

import {
  pgTable,
  uuid,
  varchar,
  boolean,
  timestamp,
  text,
  bigserial,
  unique,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Registered users
 */
export const users = pgTable(
  'users',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    email: varchar('email', { length: 320 }).notNull().unique(),
    name: varchar('name', { length: 255 }),
    emailVerified: boolean('email_verified').notNull().default(false),
    image: text('image'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  }
);

/**
 * External identities linked to a user.
 * Email/password signups live here too, under provider_id 'credential'.
 */
export const accounts = pgTable(
  'accounts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
    providerId: varchar('provider_id', { length: 255 }).notNull(),
    accountId: varchar('account_id', { length: 255 }).notNull(),
    accessToken: text('access_token'),
    refreshToken: text('refresh_token'),
    accessTokenExpiresAt: timestamp('access_token_expires_at', { withTimezone: true }),
    password: text('password'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique('accounts_provider_account_unique').on(table.providerId, table.accountId),
    index('idx_accounts_user').on(table.userId),
  ]
);

/**
 * Login sessions. Only an HMAC of the bearer token is stored.
 */
export const sessions = pgTable(
  'sessions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
    tokenHash: varchar('token_hash', { length: 64 }).notNull().unique(),
    ipAddress: varchar('ip_address', { length: 45 }),
    userAgent: varchar('user_agent', { length: 500 }),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_sessions_user').on(table.userId),
    index('idx_sessions_expires').on(table.expiresAt),
  ]
);

/**
 * Personalization attributes, one row per user
 */
export const userProfiles = pgTable(
  'user_profiles',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .unique()
      .references(() => users.id, { onDelete: 'cascade' }),
    softwareBackground: varchar('software_background', { length: 255 }),
    hardwareBackground: varchar('hardware_background', { length: 255 }),
    operatingSystem: varchar('operating_system', { length: 100 }),
    gpuHardware: varchar('gpu_hardware', { length: 255 }),
    experienceLevel: varchar('experience_level', { length: 50 }).notNull().default('beginner'),
    preferredLanguage: varchar('preferred_language', { length: 10 }).notNull().default('en'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  }
);

/**
 * Append-only log of assistant turns
 */
export const chatMessages = pgTable(
  'chat_messages',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    userId: uuid('user_id').references(() => users.id, { onDelete: 'cascade' }),
    message: text('message').notNull(),
    response: text('response').notNull(),
    contextUsed: text('context_used'),
    language: varchar('language', { length: 10 }).notNull().default('en'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_chat_user').on(table.userId),
    index('idx_chat_created').on(table.createdAt.desc()),
  ]
);

/**
 * Applied migrations
 */
export const schemaMigrations = pgTable('schema_migrations', {
  id: varchar('id', { length: 100 }).primaryKey(),
  appliedAt: timestamp('applied_at', { withTimezone: true }).notNull().defaultNow(),
});

export type UserRecord = typeof users.$inferSelect;
export type AccountRecord = typeof accounts.$inferSelect;
export type SessionRecord = typeof sessions.$inferSelect;
export type UserProfileRecord = typeof userProfiles.$inferSelect;
export type ChatMessageRecord = typeof chatMessages.$inferSelect;
