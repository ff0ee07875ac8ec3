/**
 * Assistant Validation Schemas
 */

import { z } from 'zod';
import { languageCodeSchema } from '@/validators/profile';

/**
 * POST /api/ask
 */
export const askSchema = z.object({
  question: z.string().trim().min(1).max(4000),
  selected_text: z.string().max(20_000).nullish(),
  language: languageCodeSchema.default('en'),
});

/**
 * POST /api/personalize
 */
export const personalizeSchema = z.object({
  content: z.string().min(1).max(50_000),
});

/**
 * POST /api/translate
 */
export const translateSchema = z.object({
  content: z.string().min(1).max(50_000),
  target_language: languageCodeSchema.default('ur'),
});

/**
 * GET /api/chat/history?limit=
 */
export const chatHistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type AskBody = z.infer<typeof askSchema>;
