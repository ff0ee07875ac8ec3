/**
 * Authentication Validation Schemas
 *
 * Zod schemas for request validation on auth endpoints
 */

import { z } from 'zod';
import { profileFieldsSchema } from '@/validators/profile';

export const emailSchema = z.string().trim().toLowerCase().email().max(320);

/**
 * POST /api/auth/signup
 */
export const signupSchema = profileFieldsSchema.extend({
  email: emailSchema,
  name: z.string().trim().min(1).max(255),
  password: z.string().min(1).max(128),
});

/**
 * POST /api/auth/signin
 */
export const signinSchema = z.object({
  email: emailSchema,
  password: z.string().min(1).max(128),
});

export type SignupBody = z.infer<typeof signupSchema>;
export type SigninBody = z.infer<typeof signinSchema>;
