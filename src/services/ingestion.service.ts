/**
 * Content Ingestion
 *
 * Turns markdown course pages into embedded chunks in the vector
 * collection. Used by scripts/ingest-content.ts.
 */

import type {
  ContentPoint,
  EmbeddingProvider,
  VectorCollectionAdmin,
} from '@/services/assistant/types';
import { logger } from '@/utils/logger';

export const CHUNK_WORDS = 400;
export const MIN_CHUNK_CHARS = 50;
export const UPSERT_BATCH_SIZE = 10;

export interface SourceDocument {
  /** Path relative to the docs root, stored as the `source` payload */
  source: string;
  content: string;
}

export interface IngestionStats {
  documents: number;
  chunks: number;
  skipped: number;
  failed: number;
  uploaded: number;
  /** Null when nothing was embedded */
  dimension: number | null;
}

export interface IngestionDeps {
  embeddings: EmbeddingProvider;
  collection: VectorCollectionAdmin;
  batchSize?: number;
}

export function stripFrontMatter(markdown: string): string {
  return markdown.replace(/^---\r?\n[\s\S]*?\r?\n---\r?\n?/, '');
}

/** Markdown to plain prose; code is dropped, link text kept */
export function cleanMarkdown(markdown: string): string {
  return markdown
    .replace(/```[\s\S]*?```/g, '')
    .replace(/`[^`]*`/g, '')
    .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
    .replace(/#+\s+/g, '')
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/\*([^*]+)\*/g, '$1')
    .trim();
}

export function chunkText(text: string, chunkWords: number = CHUNK_WORDS): string[] {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const chunks: string[] = [];
  for (let i = 0; i < words.length; i += chunkWords) {
    chunks.push(words.slice(i, i + chunkWords).join(' '));
  }
  return chunks;
}

/** Chunks of one document with their position; short chunks are left out */
export function documentChunks(
  document: SourceDocument
): Array<{ text: string; chunkIndex: number }> {
  return chunkText(cleanMarkdown(stripFrontMatter(document.content)))
    .map((text, chunkIndex) => ({ text, chunkIndex }))
    .filter((chunk) => chunk.text.trim().length >= MIN_CHUNK_CHARS);
}

/**
 * Rebuild the collection from the given documents
 *
 * The collection is recreated once the first embedding reveals the vector
 * dimension. A chunk whose embedding fails is logged and skipped.
 */
export async function ingestDocuments(
  documents: Iterable<SourceDocument> | AsyncIterable<SourceDocument>,
  deps: IngestionDeps
): Promise<IngestionStats> {
  const { embeddings, collection, batchSize = UPSERT_BATCH_SIZE } = deps;
  const stats: IngestionStats = {
    documents: 0,
    chunks: 0,
    skipped: 0,
    failed: 0,
    uploaded: 0,
    dimension: null,
  };

  let pending: ContentPoint[] = [];
  let nextId = 0;

  const flush = async () => {
    if (pending.length === 0) return;
    await collection.upsertPoints(pending);
    stats.uploaded += pending.length;
    logger.info('Uploaded chunks', { count: pending.length, total: stats.uploaded });
    pending = [];
  };

  for await (const document of documents) {
    stats.documents++;
    const all = chunkText(cleanMarkdown(stripFrontMatter(document.content)));
    const kept = documentChunks(document);
    stats.skipped += all.length - kept.length;

    for (const chunk of kept) {
      stats.chunks++;

      let vector: number[];
      try {
        vector = await embeddings.embed(chunk.text, { taskType: 'RETRIEVAL_DOCUMENT' });
      } catch (error) {
        stats.failed++;
        logger.error('Chunk embedding failed', {
          source: document.source,
          chunkIndex: chunk.chunkIndex,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      if (stats.dimension === null) {
        stats.dimension = vector.length;
        await collection.recreateCollection(vector.length);
        logger.info('Collection recreated', { dimension: vector.length });
      }

      pending.push({
        id: nextId++,
        vector,
        payload: { text: chunk.text, source: document.source, chunk_index: chunk.chunkIndex },
      });

      if (pending.length >= batchSize) {
        await flush();
      }
    }
  }

  await flush();
  return stats;
}
