/**
 * Delete a user and everything that belongs to them (sessions, accounts,
 * profile, chat history)
 *
 * Run with: npm run user:delete -- <user-id>
 */

import 'dotenv/config';
import { z } from 'zod';
import { loadConfig } from '@/config';
import { createDatabase } from '@/db/client';
import { NotFoundError } from '@/errors/appErrors';
import { createSchemaStore } from '@/services/store.service';

async function main(): Promise<void> {
  const parsed = z.string().uuid().safeParse(process.argv[2]);
  if (!parsed.success) {
    console.error('Usage: npm run user:delete -- <user-id (uuid)>');
    process.exit(1);
  }

  const config = loadConfig(process.env);
  const database = createDatabase(config.database);
  const store = createSchemaStore(database.db, { encryptionKey: config.encryptionKey });

  try {
    await store.deleteUser(parsed.data);
    console.log(`Deleted user ${parsed.data}`);
  } catch (error) {
    if (error instanceof NotFoundError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    await database.close();
  }
}

main().catch((error) => {
  console.error('Delete failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
