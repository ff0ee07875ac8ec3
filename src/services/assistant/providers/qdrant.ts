/**
 * Qdrant collection access over the REST API
 */

import { z } from 'zod';
import type { AppConfig, ProviderCallConfig } from '@/config';
import { ProviderRequestError, requestJson } from '@/services/assistant/http';
import type {
  ContentPoint,
  ContextSnippet,
  VectorCollectionAdmin,
  VectorIndex,
} from '@/services/assistant/types';

const searchResponseSchema = z.object({
  result: z.array(
    z.object({
      id: z.union([z.string(), z.number()]),
      score: z.number(),
      payload: z
        .object({
          text: z.string().optional(),
          source: z.string().optional(),
          chunk_index: z.number().optional(),
        })
        .passthrough()
        .nullish(),
    })
  ),
});

const ackResponseSchema = z.object({
  result: z.unknown(),
});

const collectionInfoSchema = z.object({
  result: z.object({
    points_count: z.number().nullish(),
  }),
});

type QdrantConfig = AppConfig['qdrant'];

export type QdrantCollection = VectorIndex & VectorCollectionAdmin;

export function createQdrantCollection(
  config: QdrantConfig,
  policy: ProviderCallConfig
): QdrantCollection {
  const collectionUrl = `${config.url}/collections/${encodeURIComponent(config.collection)}`;
  const headers: Record<string, string> = config.apiKey ? { 'api-key': config.apiKey } : {};

  return {
    async search(vector, limit) {
      const data = await requestJson({
        label: 'qdrant.search',
        url: `${collectionUrl}/points/search`,
        headers,
        body: { vector, limit, with_payload: true },
        schema: searchResponseSchema,
        policy,
      });

      return data.result
        .map(
          (hit): ContextSnippet => ({
            text: hit.payload?.text ?? '',
            source: hit.payload?.source ?? null,
            chunkIndex: hit.payload?.chunk_index ?? null,
            score: hit.score,
          })
        )
        .filter((snippet) => snippet.text.length > 0);
    },

    async recreateCollection(dimension) {
      try {
        await requestJson({
          label: 'qdrant.deleteCollection',
          url: collectionUrl,
          method: 'DELETE',
          headers,
          schema: ackResponseSchema,
          policy,
        });
      } catch (error) {
        if (!(error instanceof ProviderRequestError && error.status === 404)) {
          throw error;
        }
      }

      await requestJson({
        label: 'qdrant.createCollection',
        url: collectionUrl,
        method: 'PUT',
        headers,
        body: { vectors: { size: dimension, distance: 'Cosine' } },
        schema: ackResponseSchema,
        policy,
      });
    },

    async upsertPoints(points: ContentPoint[]) {
      if (points.length === 0) return;
      await requestJson({
        label: 'qdrant.upsert',
        url: `${collectionUrl}/points?wait=true`,
        method: 'PUT',
        headers,
        body: { points },
        schema: ackResponseSchema,
        policy,
      });
    },

    async countPoints() {
      const data = await requestJson({
        label: 'qdrant.collectionInfo',
        url: collectionUrl,
        method: 'GET',
        headers,
        schema: collectionInfoSchema,
        policy,
      });
      return data.result.points_count ?? 0;
    },
  };
}
