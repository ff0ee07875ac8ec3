/**
 * Application assembly
 *
 * Builds the services from config and a database handle, and the Hono app
 * from the services. index.ts serves it; tests call app.request() directly.
 */

import { Hono } from 'hono';
import type { AppConfig } from '@/config';
import type { Database } from '@/db/client';
import { createAuthMiddleware } from '@/middleware/auth';
import { createCorsMiddleware } from '@/middleware/cors';
import { createErrorHandler } from '@/middleware/errorHandler';
import { createRateLimitMiddleware } from '@/middleware/rateLimit';
import { securityHeaders } from '@/middleware/securityHeaders';
import { createAssistantRoutes } from '@/routes/assistant';
import { createAuthRoutes } from '@/routes/auth';
import { createProfileRoutes } from '@/routes/profile';
import {
  createAssistantGateway,
  type AssistantGateway,
} from '@/services/assistant/assistantGateway.service';
import { createGeminiEmbeddings, createGeminiGenerator } from '@/services/assistant/providers/gemini';
import { createQdrantCollection } from '@/services/assistant/providers/qdrant';
import { createAuthService, type AuthService } from '@/services/auth.service';
import { createArgon2Hasher } from '@/services/password.service';
import {
  createRateLimitService,
  RateLimitTier,
  type RateLimitService,
} from '@/services/rateLimit.service';
import { createSchemaStore, type SchemaStore } from '@/services/store.service';
import type { HonoEnv } from '@/types/hono';

export const SERVICE_NAME = 'textbook-assistant-api';
export const SERVICE_VERSION = '2.1.0';

export interface AppServices {
  store: SchemaStore;
  auth: AuthService;
  gateway: AssistantGateway;
  rateLimits: RateLimitService;
}

export function createServices(config: Readonly<AppConfig>, db: Database): AppServices {
  const store = createSchemaStore(db, { encryptionKey: config.encryptionKey });
  const auth = createAuthService({
    store,
    hasher: createArgon2Hasher(config.passwordHashing),
    session: config.session,
  });
  const gateway = createAssistantGateway({
    store,
    embeddings: createGeminiEmbeddings(config.gemini, config.providerCalls),
    index: createQdrantCollection(config.qdrant, config.providerCalls),
    generator: createGeminiGenerator(config.gemini, config.providerCalls),
    config: config.assistant,
  });

  return { store, auth, gateway, rateLimits: createRateLimitService() };
}

export function createApp(services: AppServices, config: Readonly<AppConfig>) {
  const app = new Hono<HonoEnv>();
  const { authResolver, requireAuth } = createAuthMiddleware(
    services.auth,
    config.session.cookieName
  );
  const rateLimitOptions = { enabled: config.rateLimit.enabled };

  app.use('*', securityHeaders);
  app.use('*', createCorsMiddleware(config.cors.origins));
  app.use('/api/*', authResolver);

  app.get('/', (c) => c.json({ name: SERVICE_NAME, version: SERVICE_VERSION }));

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  app.route(
    '/api/auth',
    createAuthRoutes({
      auth: services.auth,
      store: services.store,
      session: config.session,
      requireAuth,
      credentialRateLimit: createRateLimitMiddleware(
        services.rateLimits,
        RateLimitTier.AUTH,
        rateLimitOptions
      ),
    })
  );
  app.route('/api/profile', createProfileRoutes({ store: services.store, requireAuth }));
  app.route(
    '/api',
    createAssistantRoutes({
      gateway: services.gateway,
      store: services.store,
      requireAuth,
      assistantRateLimit: createRateLimitMiddleware(
        services.rateLimits,
        RateLimitTier.ASSISTANT,
        rateLimitOptions
      ),
    })
  );

  app.onError(createErrorHandler({ verbose: config.verboseErrors }));

  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
        },
      },
      404
    );
  });

  return app;
}
