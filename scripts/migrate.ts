/**
 * Apply pending schema migrations
 *
 * Run with: npm run db:migrate
 *
 * Requires:
 *   - DATABASE_URL environment variable (plus the rest of .env)
 */

import 'dotenv/config';
import { loadConfig } from '@/config';
import { createDatabase } from '@/db/client';
import { applyMigrations } from '@/db/migrations';

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const database = createDatabase(config.database);

  try {
    const applied = await applyMigrations(database.db);
    console.log(
      applied.length > 0 ? `Applied: ${applied.join(', ')}` : 'Schema is up to date'
    );
  } finally {
    await database.close();
  }
}

main().catch((error) => {
  console.error('Migration failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
