/**
 * Provider seams of the assistant. The gateway only talks to these
 * interfaces; providers/ holds the Gemini and Qdrant implementations.
 */

export type EmbeddingTaskType = 'RETRIEVAL_QUERY' | 'RETRIEVAL_DOCUMENT';

export interface EmbeddingProvider {
  embed(text: string, options?: { taskType?: EmbeddingTaskType }): Promise<number[]>;
}

/** A retrieved chunk of course content */
export interface ContextSnippet {
  text: string;
  source: string | null;
  chunkIndex: number | null;
  score: number;
}

export interface VectorIndex {
  search(vector: number[], limit: number): Promise<ContextSnippet[]>;
}

export interface GenerationProvider {
  generate(prompt: string): Promise<string>;
}

export interface ContentPoint {
  id: number;
  vector: number[];
  payload: {
    text: string;
    source: string;
    chunk_index: number;
  };
}

/** Write side of the vector index, used by content ingestion */
export interface VectorCollectionAdmin {
  recreateCollection(dimension: number): Promise<void>;
  upsertPoints(points: ContentPoint[]): Promise<void>;
  countPoints(): Promise<number>;
}
