/**
 * Error Handler
 *
 * Global onError handler for the API. Maps the application error taxonomy
 * onto the JSON error envelope.
 */

import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { AppError } from '@/errors/appErrors';
import type { HonoEnv } from '@/types/hono';
import { logger } from '@/utils/logger';

/**
 * Error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export function createErrorHandler(options: { verbose: boolean }): ErrorHandler<HonoEnv> {
  return (error, c) => {
    if (error instanceof AppError) {
      const log = error.status >= 500 ? logger.error : logger.debug;
      log('Request failed', {
        code: error.code,
        error: error.message,
        cause: error.cause instanceof Error ? error.cause.message : undefined,
        path: c.req.path,
        method: c.req.method,
      });

      const details = error.details();
      const message =
        error.status === 500 && !options.verbose ? 'An internal error occurred' : error.message;

      return c.json<ErrorResponse>(
        { error: details ? { code: error.code, message, details } : { code: error.code, message } },
        error.status
      );
    }

    if (error instanceof ZodError) {
      return c.json<ErrorResponse>(
        {
          error: {
            code: 'INVALID_ARGUMENT',
            message: 'Invalid request data',
            details: error.issues,
          },
        },
        400
      );
    }

    // Thrown by hono itself, e.g. a malformed JSON body
    if (error instanceof HTTPException) {
      return c.json<ErrorResponse>(
        {
          error: {
            code: error.status === 400 ? 'INVALID_ARGUMENT' : 'HTTP_ERROR',
            message: error.message || 'Request failed',
          },
        },
        error.status
      );
    }

    logger.error('Unhandled error', {
      error: String(error),
      stack: error.stack,
      cause: error.cause ? String(error.cause) : undefined,
      path: c.req.path,
      method: c.req.method,
    });

    return c.json<ErrorResponse>(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: options.verbose ? error.message : 'An internal error occurred',
        },
      },
      500
    );
  };
}
