/**
 * In-memory stand-ins for the assistant providers
 */

import { vi } from 'vitest';
import type {
  ContentPoint,
  ContextSnippet,
  EmbeddingProvider,
  GenerationProvider,
  VectorCollectionAdmin,
  VectorIndex,
} from '@/services/assistant/types';

export function snippet(text: string, source: string | null, score = 0.9): ContextSnippet {
  return { text, source, chunkIndex: 0, score };
}

export function createFakeEmbeddings(vector: number[] = [0.1, 0.2, 0.3]) {
  return {
    embed: vi.fn<EmbeddingProvider['embed']>(async () => vector),
  };
}

export function createFakeIndex(results: ContextSnippet[] = []) {
  return {
    search: vi.fn<VectorIndex['search']>(async () => results),
  };
}

export function createFakeGenerator(reply = 'Generated answer') {
  return {
    generate: vi.fn<GenerationProvider['generate']>(async () => reply),
  };
}

export function createFakeCollection() {
  const points: ContentPoint[] = [];
  const collection = {
    points,
    recreateCollection: vi.fn<VectorCollectionAdmin['recreateCollection']>(async () => {
      points.length = 0;
    }),
    upsertPoints: vi.fn<VectorCollectionAdmin['upsertPoints']>(async (batch) => {
      points.push(...batch);
    }),
    countPoints: vi.fn<VectorCollectionAdmin['countPoints']>(async () => points.length),
  };
  return collection;
}
