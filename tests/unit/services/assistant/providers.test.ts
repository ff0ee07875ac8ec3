import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createGeminiEmbeddings, createGeminiGenerator } from '@/services/assistant/providers/gemini';
import { createQdrantCollection } from '@/services/assistant/providers/qdrant';
import { ProviderRequestError } from '@/services/assistant/http';

const policy = { timeoutMs: 1000, maxRetries: 0, retryDelayMs: 0 };

const gemini = {
  apiKey: 'test-key',
  baseUrl: 'https://gemini.test/v1beta',
  embeddingModel: 'text-embedding-004',
  generationModel: 'gemini-2.0-flash',
};

const qdrant = {
  url: 'https://qdrant.test',
  apiKey: 'test-qdrant-key',
  collection: 'textbook_content',
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function requestBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}

const fetchMock = vi.fn<typeof fetch>();

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('Gemini embeddings', () => {
  it('calls embedContent and returns the vector', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ embedding: { values: [0.5, -0.25] } }));

    const vector = await createGeminiEmbeddings(gemini, policy).embed('What is ROS 2?');

    expect(vector).toEqual([0.5, -0.25]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://gemini.test/v1beta/models/text-embedding-004:embedContent');
    expect(init?.headers).toMatchObject({ 'x-goog-api-key': 'test-key' });
    expect(requestBody(init)).toEqual({
      model: 'models/text-embedding-004',
      content: { parts: [{ text: 'What is ROS 2?' }] },
      taskType: 'RETRIEVAL_QUERY',
    });
  });

  it('passes the document task type for ingestion', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ embedding: { values: [1] } }));

    await createGeminiEmbeddings(gemini, policy).embed('chunk', { taskType: 'RETRIEVAL_DOCUMENT' });

    expect(requestBody(fetchMock.mock.calls[0][1])).toMatchObject({ taskType: 'RETRIEVAL_DOCUMENT' });
  });

  it('rejects an empty embedding', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ embedding: { values: [] } }));

    await expect(createGeminiEmbeddings(gemini, policy).embed('x')).rejects.toBeInstanceOf(
      ProviderRequestError
    );
  });
});

describe('Gemini generation', () => {
  it('joins the text parts of the first candidate', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        candidates: [{ content: { parts: [{ text: 'ROS 2 is ' }, { text: 'middleware.' }] } }],
      })
    );

    const text = await createGeminiGenerator(gemini, policy).generate('prompt');

    expect(text).toBe('ROS 2 is middleware.');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://gemini.test/v1beta/models/gemini-2.0-flash:generateContent');
    expect(requestBody(init)).toEqual({
      contents: [{ role: 'user', parts: [{ text: 'prompt' }] }],
    });
  });

  it('fails on a blocked prompt', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ promptFeedback: { blockReason: 'SAFETY' } }));

    await expect(createGeminiGenerator(gemini, policy).generate('prompt')).rejects.toThrow(
      'empty generation (SAFETY)'
    );
  });
});

describe('Qdrant collection', () => {
  it('searches with payloads and maps hits to snippets', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        result: [
          { id: 1, score: 0.92, payload: { text: 'ROS 2 nodes', source: 'ros2/intro.md', chunk_index: 0 } },
          { id: 2, score: 0.8, payload: { text: '' } },
          { id: 'b7', score: 0.7, payload: { text: 'Gazebo worlds' } },
        ],
        status: 'ok',
      })
    );

    const snippets = await createQdrantCollection(qdrant, policy).search([0.1, 0.2], 3);

    expect(snippets).toEqual([
      { text: 'ROS 2 nodes', source: 'ros2/intro.md', chunkIndex: 0, score: 0.92 },
      { text: 'Gazebo worlds', source: null, chunkIndex: null, score: 0.7 },
    ]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://qdrant.test/collections/textbook_content/points/search');
    expect(init?.headers).toMatchObject({ 'api-key': 'test-qdrant-key' });
    expect(requestBody(init)).toEqual({ vector: [0.1, 0.2], limit: 3, with_payload: true });
  });

  it('returns no snippets for an empty result', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ result: [] }));

    await expect(createQdrantCollection(qdrant, policy).search([0.1], 3)).resolves.toEqual([]);
  });

  it('omits the api-key header when none is configured', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ result: [] }));

    await createQdrantCollection({ ...qdrant, apiKey: undefined }, policy).search([0.1], 3);

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('recreates a collection, tolerating a missing one', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ status: { error: 'Not found' } }, 404))
      .mockResolvedValueOnce(jsonResponse({ result: true, status: 'ok' }));

    await createQdrantCollection(qdrant, policy).recreateCollection(768);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[0][1]?.method).toBe('DELETE');
    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe('https://qdrant.test/collections/textbook_content');
    expect(init?.method).toBe('PUT');
    expect(requestBody(init)).toEqual({ vectors: { size: 768, distance: 'Cosine' } });
  });

  it('upserts points and waits for them', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ result: { status: 'completed' } }));
    const point = {
      id: 0,
      vector: [0.1],
      payload: { text: 'chunk', source: 'intro.md', chunk_index: 0 },
    };

    await createQdrantCollection(qdrant, policy).upsertPoints([point]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://qdrant.test/collections/textbook_content/points?wait=true');
    expect(requestBody(init)).toEqual({ points: [point] });
  });

  it('counts points', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ result: { points_count: 42 } }));

    await expect(createQdrantCollection(qdrant, policy).countPoints()).resolves.toBe(42);
  });
});
