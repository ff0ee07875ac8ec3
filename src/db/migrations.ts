/**
 * Schema migrations
 *
 * Ordered DDL applied by applyMigrations(). Each migration runs in its own
 * transaction and is recorded in schema_migrations, so a partially applied
 * migration rolls back and is retried on the next start.
 */

import { sql } from 'drizzle-orm';
import type { Database } from '@/db/client';
import { schemaMigrations } from '@/db/schema';
import { logger } from '@/utils/logger';

export interface Migration {
  id: string;
  statements: string[];
}

export const MIGRATIONS: Migration[] = [
  {
    id: '0001_initial_schema',
    statements: [
      `CREATE TABLE IF NOT EXISTS users (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        email VARCHAR(320) NOT NULL,
        name VARCHAR(255),
        email_verified BOOLEAN NOT NULL DEFAULT FALSE,
        image TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT users_email_unique UNIQUE (email)
      )`,
      `CREATE TABLE IF NOT EXISTS accounts (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        provider_id VARCHAR(255) NOT NULL,
        account_id VARCHAR(255) NOT NULL,
        access_token TEXT,
        refresh_token TEXT,
        access_token_expires_at TIMESTAMPTZ,
        password TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT accounts_provider_account_unique UNIQUE (provider_id, account_id)
      )`,
      `CREATE INDEX IF NOT EXISTS idx_accounts_user ON accounts(user_id)`,
      `CREATE TABLE IF NOT EXISTS sessions (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        token_hash VARCHAR(64) NOT NULL,
        ip_address VARCHAR(45),
        user_agent VARCHAR(500),
        expires_at TIMESTAMPTZ NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT sessions_token_hash_unique UNIQUE (token_hash)
      )`,
      `CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(user_id)`,
      `CREATE INDEX IF NOT EXISTS idx_sessions_expires ON sessions(expires_at)`,
      `CREATE TABLE IF NOT EXISTS user_profiles (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        software_background VARCHAR(255),
        hardware_background VARCHAR(255),
        operating_system VARCHAR(100),
        gpu_hardware VARCHAR(255),
        experience_level VARCHAR(50) NOT NULL DEFAULT 'beginner',
        preferred_language VARCHAR(10) NOT NULL DEFAULT 'en',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT user_profiles_user_id_unique UNIQUE (user_id)
      )`,
      `CREATE TABLE IF NOT EXISTS chat_messages (
        id BIGSERIAL PRIMARY KEY,
        user_id UUID REFERENCES users(id) ON DELETE CASCADE,
        message TEXT NOT NULL,
        response TEXT NOT NULL,
        context_used TEXT,
        language VARCHAR(10) NOT NULL DEFAULT 'en',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
      `CREATE INDEX IF NOT EXISTS idx_chat_user ON chat_messages(user_id)`,
      `CREATE INDEX IF NOT EXISTS idx_chat_created ON chat_messages(created_at DESC)`,
    ],
  },
];

/**
 * Apply every migration not yet recorded in schema_migrations
 *
 * @returns IDs of the migrations applied by this call
 */
export async function applyMigrations(
  db: Database,
  migrations: Migration[] = MIGRATIONS
): Promise<string[]> {
  await db.execute(
    sql.raw(`CREATE TABLE IF NOT EXISTS schema_migrations (
      id VARCHAR(100) PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`)
  );

  const appliedRows = await db.select({ id: schemaMigrations.id }).from(schemaMigrations);
  const applied = new Set(appliedRows.map((row) => row.id));
  const newlyApplied: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.id)) continue;

    await db.transaction(async (tx) => {
      for (const statement of migration.statements) {
        await tx.execute(sql.raw(statement));
      }
      await tx.insert(schemaMigrations).values({ id: migration.id });
    });

    logger.info('Applied migration', { migration: migration.id });
    newlyApplied.push(migration.id);
  }

  return newlyApplied;
}
