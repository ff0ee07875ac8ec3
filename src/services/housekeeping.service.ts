/**
 * Housekeeping
 *
 * Periodic removal of expired sessions. Expiry is enforced at lookup time,
 * so this only keeps the table small.
 */

import type { SchemaStore } from '@/services/store.service';
import { logger } from '@/utils/logger';

export interface SessionCleanupOptions {
  intervalMs: number;
  now?: () => Date;
}

/**
 * Delete expired sessions once
 *
 * @returns Number of sessions deleted
 */
export async function cleanupExpiredSessions(
  store: Pick<SchemaStore, 'deleteExpiredSessions'>,
  now: Date = new Date()
): Promise<number> {
  const deleted = await store.deleteExpiredSessions(now);
  if (deleted > 0) {
    logger.info('Expired sessions removed', { deleted });
  }
  return deleted;
}

/**
 * Run cleanupExpiredSessions on an interval. An interval of 0 disables it.
 *
 * @returns Stops the timer
 */
export function startSessionCleanup(
  store: Pick<SchemaStore, 'deleteExpiredSessions'>,
  options: SessionCleanupOptions
): () => void {
  if (options.intervalMs <= 0) {
    logger.info('Session cleanup disabled');
    return () => {};
  }

  const now = options.now ?? (() => new Date());
  let running = false;

  const timer = setInterval(() => {
    if (running) return;
    running = true;
    cleanupExpiredSessions(store, now())
      .catch((error) => {
        logger.error('Session cleanup failed', { error: String(error) });
      })
      .finally(() => {
        running = false;
      });
  }, options.intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
