/**
 * Gemini embedding and text generation over the REST API
 */

import { z } from 'zod';
import type { AppConfig, ProviderCallConfig } from '@/config';
import { ProviderRequestError, requestJson } from '@/services/assistant/http';
import type { EmbeddingProvider, GenerationProvider } from '@/services/assistant/types';

const embedResponseSchema = z.object({
  embedding: z.object({
    values: z.array(z.number()).min(1),
  }),
});

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z
    .object({
      blockReason: z.string().optional(),
    })
    .optional(),
});

type GeminiConfig = AppConfig['gemini'];

function modelPath(model: string): string {
  return model.startsWith('models/') ? model : `models/${model}`;
}

function headers(config: GeminiConfig): Record<string, string> {
  return { 'x-goog-api-key': config.apiKey };
}

export function createGeminiEmbeddings(
  config: GeminiConfig,
  policy: ProviderCallConfig
): EmbeddingProvider {
  const model = modelPath(config.embeddingModel);

  return {
    async embed(text, options = {}) {
      const data = await requestJson({
        label: 'gemini.embed',
        url: `${config.baseUrl}/${model}:embedContent`,
        headers: headers(config),
        body: {
          model,
          content: { parts: [{ text }] },
          taskType: options.taskType ?? 'RETRIEVAL_QUERY',
        },
        schema: embedResponseSchema,
        policy,
      });
      return data.embedding.values;
    },
  };
}

export function createGeminiGenerator(
  config: GeminiConfig,
  policy: ProviderCallConfig
): GenerationProvider {
  const model = modelPath(config.generationModel);

  return {
    async generate(prompt) {
      const data = await requestJson({
        label: 'gemini.generate',
        url: `${config.baseUrl}/${model}:generateContent`,
        headers: headers(config),
        body: {
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
        },
        schema: generateResponseSchema,
        policy,
      });

      const candidate = data.candidates?.[0];
      const text = (candidate?.content?.parts ?? [])
        .map((part) => part.text ?? '')
        .join('')
        .trim();

      if (!text) {
        const reason =
          data.promptFeedback?.blockReason ?? candidate?.finishReason ?? 'no candidates';
        throw new ProviderRequestError(`empty generation (${reason})`, { retryable: false });
      }
      return text;
    },
  };
}
