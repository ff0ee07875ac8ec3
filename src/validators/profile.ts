/**
 * Profile Validation Schemas
 */

import { z } from 'zod';
import type { ProfileFields } from '@/services/store.service';

const optionalText = (max: number) => z.string().trim().max(max).nullish();

export const languageCodeSchema = z
  .string()
  .trim()
  .min(2)
  .max(10)
  .regex(/^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})?$/, 'Expected a language code such as "en" or "ur"');

/** Personalization attributes, snake_case on the wire */
export const profileFieldsSchema = z.object({
  software_background: optionalText(255),
  hardware_background: optionalText(255),
  operating_system: optionalText(100),
  gpu_hardware: optionalText(255),
  experience_level: z.string().trim().min(1).max(50).optional(),
  preferred_language: languageCodeSchema.optional(),
});

/**
 * PATCH /api/profile
 */
export const patchProfileSchema = profileFieldsSchema
  .strict()
  .refine((body) => Object.keys(body).length > 0, {
    message: 'At least one profile field is required',
  });

export type ProfileFieldsBody = z.infer<typeof profileFieldsSchema>;

/** Wire fields to store fields; absent keys stay absent */
export function toProfileFields(body: ProfileFieldsBody): ProfileFields {
  const fields: ProfileFields = {};
  if (body.software_background !== undefined) fields.softwareBackground = body.software_background;
  if (body.hardware_background !== undefined) fields.hardwareBackground = body.hardware_background;
  if (body.operating_system !== undefined) fields.operatingSystem = body.operating_system;
  if (body.gpu_hardware !== undefined) fields.gpuHardware = body.gpu_hardware;
  if (body.experience_level !== undefined) fields.experienceLevel = body.experience_level;
  if (body.preferred_language !== undefined) fields.preferredLanguage = body.preferred_language;
  return fields;
}
