/**
 * Assistant Routes
 *
 * Question answering, chat history, personalization and translation.
 * All endpoints require a session.
 */

import { Hono, type MiddlewareHandler } from 'hono';
import { getAuthenticatedUser } from '@/middleware/auth';
import type { AssistantGateway } from '@/services/assistant/assistantGateway.service';
import type { SchemaStore } from '@/services/store.service';
import type { HonoEnv } from '@/types/hono';
import {
  askSchema,
  chatHistoryQuerySchema,
  personalizeSchema,
  translateSchema,
} from '@/validators/assistant';
import { validate } from '@/validators/validate';

export interface AssistantRouteDeps {
  gateway: AssistantGateway;
  store: SchemaStore;
  requireAuth: MiddlewareHandler<HonoEnv>;
  /** Applied to the endpoints that call the model */
  assistantRateLimit: MiddlewareHandler<HonoEnv>;
}

export function createAssistantRoutes(deps: AssistantRouteDeps) {
  const { gateway, store, requireAuth, assistantRateLimit } = deps;
  const assistant = new Hono<HonoEnv>();

  /**
   * POST /api/ask
   */
  assistant.post('/ask', requireAuth, assistantRateLimit, validate('json', askSchema), async (c) => {
    const user = getAuthenticatedUser(c);
    const body = c.req.valid('json');

    const result = await gateway.ask({
      userId: user.id,
      question: body.question,
      selectedText: body.selected_text,
      language: body.language,
    });

    return c.json({ answer: result.answer, sources: result.sources });
  });

  /**
   * GET /api/chat/history?limit=20
   *
   * Most recent first
   */
  assistant.get('/chat/history', requireAuth, validate('query', chatHistoryQuerySchema), async (c) => {
    const user = getAuthenticatedUser(c);
    const { limit } = c.req.valid('query');

    const rows = await store.listRecentChatMessages(user.id, limit);

    return c.json({
      messages: rows.map((row) => ({
        id: row.id,
        message: row.message,
        response: row.response,
        language: row.language,
        created_at: row.createdAt.toISOString(),
      })),
    });
  });

  /**
   * POST /api/personalize
   */
  assistant.post(
    '/personalize',
    requireAuth,
    assistantRateLimit,
    validate('json', personalizeSchema),
    async (c) => {
      const user = getAuthenticatedUser(c);
      const { content } = c.req.valid('json');

      const personalized = await gateway.personalize({ userId: user.id, content });
      return c.json({ personalized_content: personalized });
    }
  );

  /**
   * POST /api/translate
   */
  assistant.post(
    '/translate',
    requireAuth,
    assistantRateLimit,
    validate('json', translateSchema),
    async (c) => {
      const { content, target_language } = c.req.valid('json');

      const translated = await gateway.translate({ content, targetLanguage: target_language });
      return c.json({ translated_content: translated });
    }
  );

  return assistant;
}
