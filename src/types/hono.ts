/**
 * Hono Type Extensions
 *
 * Custom types for Hono context variables
 */

import type { UserRecord } from '@/db/schema';

/**
 * Environment variables for Hono context
 */
export type HonoEnv = {
  Variables: {
    userId?: string;
    user?: UserRecord;
    /** Raw token the request authenticated with */
    sessionToken?: string;
  };
};
