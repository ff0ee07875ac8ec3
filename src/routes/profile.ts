/**
 * Profile Routes
 *
 * Endpoints for the personalization profile of the signed-in user
 */

import { Hono, type MiddlewareHandler } from 'hono';
import type { UserProfileRecord } from '@/db/schema';
import { NotFoundError } from '@/errors/appErrors';
import { getAuthenticatedUser } from '@/middleware/auth';
import type { SchemaStore } from '@/services/store.service';
import type { HonoEnv } from '@/types/hono';
import { patchProfileSchema, toProfileFields } from '@/validators/profile';
import { validate } from '@/validators/validate';

export function serializeProfile(profile: UserProfileRecord) {
  return {
    software_background: profile.softwareBackground,
    hardware_background: profile.hardwareBackground,
    operating_system: profile.operatingSystem,
    gpu_hardware: profile.gpuHardware,
    experience_level: profile.experienceLevel,
    preferred_language: profile.preferredLanguage,
    updated_at: profile.updatedAt.toISOString(),
  };
}

/** Shown for a user whose profile row is missing */
export const DEFAULT_PROFILE = {
  software_background: null,
  hardware_background: null,
  operating_system: null,
  gpu_hardware: null,
  experience_level: 'beginner',
  preferred_language: 'en',
  updated_at: null,
};

export interface ProfileRouteDeps {
  store: SchemaStore;
  requireAuth: MiddlewareHandler<HonoEnv>;
}

export function createProfileRoutes({ store, requireAuth }: ProfileRouteDeps) {
  const profile = new Hono<HonoEnv>();

  profile.use('*', requireAuth);

  /**
   * GET /api/profile
   */
  profile.get('/', async (c) => {
    const user = getAuthenticatedUser(c);
    const row = await store.getProfile(user.id);
    if (!row) {
      throw new NotFoundError('User profile not found');
    }
    return c.json({ profile: serializeProfile(row) });
  });

  /**
   * PATCH /api/profile
   *
   * Partial update; omitted fields keep their values, null clears them
   */
  profile.patch('/', validate('json', patchProfileSchema), async (c) => {
    const user = getAuthenticatedUser(c);
    const body = c.req.valid('json');
    const row = await store.updateProfile(user.id, toProfileFields(body));
    return c.json({ profile: serializeProfile(row) });
  });

  return profile;
}
