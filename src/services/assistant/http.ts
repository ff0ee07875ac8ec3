/**
 * JSON-over-HTTP calls to external providers
 *
 * Every attempt is bounded by a timeout. Timeouts, network errors, 429 and
 * 5xx responses are retried with jittered exponential backoff; other 4xx
 * responses and malformed bodies fail immediately.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { z } from 'zod';
import type { ProviderCallConfig } from '@/config';
import { logger } from '@/utils/logger';

export class ProviderRequestError extends Error {
  readonly retryable: boolean;
  readonly status?: number;

  constructor(
    message: string,
    options: { retryable: boolean; status?: number; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProviderRequestError';
    this.retryable = options.retryable;
    this.status = options.status;
  }
}

export interface RequestJsonOptions<S extends z.ZodTypeAny> {
  /** Short name for logs, e.g. "gemini.embed" */
  label: string;
  url: string;
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  headers?: Record<string, string>;
  body?: unknown;
  schema: S;
  policy: ProviderCallConfig;
}

const httpLogger = logger.child({ component: 'provider-http' });

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Delay before retry number `attempt` (0-based): base * 2^attempt, scaled
 * by a random factor in [0.5, 1).
 */
export function backoffDelay(attempt: number, baseMs: number): number {
  return Math.round(baseMs * 2 ** attempt * (0.5 + Math.random() / 2));
}

async function attemptOnce<S extends z.ZodTypeAny>(
  options: RequestJsonOptions<S>
): Promise<z.infer<S>> {
  const { url, method = 'POST', headers = {}, body, schema, policy } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers: body === undefined ? headers : { 'Content-Type': 'application/json', ...headers },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(policy.timeoutMs),
    });
  } catch (error) {
    const message = isTimeout(error)
      ? `timed out after ${policy.timeoutMs}ms`
      : `network error: ${errorMessage(error)}`;
    throw new ProviderRequestError(message, { retryable: true, cause: error });
  }

  if (!response.ok) {
    let detail = '';
    try {
      detail = (await response.text()).slice(0, 500);
    } catch (error) {
      detail = `<unreadable body: ${errorMessage(error)}>`;
    }
    throw new ProviderRequestError(`HTTP ${response.status}: ${detail}`, {
      retryable: response.status === 429 || response.status >= 500,
      status: response.status,
    });
  }

  let json: unknown;
  try {
    json = await response.json();
  } catch (error) {
    if (isTimeout(error)) {
      throw new ProviderRequestError(`timed out after ${policy.timeoutMs}ms`, {
        retryable: true,
        cause: error,
      });
    }
    throw new ProviderRequestError('response body is not JSON', {
      retryable: false,
      status: response.status,
      cause: error,
    });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderRequestError(`unexpected response shape: ${parsed.error.message}`, {
      retryable: false,
      status: response.status,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Send a JSON request and validate the JSON response
 *
 * @throws ProviderRequestError once retries are exhausted or the failure is
 * not retryable
 */
export async function requestJson<S extends z.ZodTypeAny>(
  options: RequestJsonOptions<S>
): Promise<z.infer<S>> {
  const { label, policy } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await attemptOnce(options);
    } catch (error) {
      if (!(error instanceof ProviderRequestError) || !error.retryable || attempt >= policy.maxRetries) {
        throw error;
      }

      const delay = backoffDelay(attempt, policy.retryDelayMs);
      httpLogger.warn('Retrying provider call', {
        call: label,
        attempt: attempt + 1,
        delayMs: delay,
        error: error.message,
      });
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}
