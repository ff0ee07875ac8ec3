/**
 * Content ingestion for the assistant
 *
 * Reads every .md/.mdx file under the docs directory and rebuilds the
 * Qdrant collection from it.
 *
 * Run with: npm run ingest -- <docs-dir>
 *
 * Requires:
 *   - GEMINI_API_KEY, QDRANT_URL (and QDRANT_API_KEY for Qdrant Cloud)
 *   - the rest of .env, which loadConfig validates as a whole
 */

import 'dotenv/config';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { loadConfig } from '@/config';
import { createGeminiEmbeddings } from '@/services/assistant/providers/gemini';
import { createQdrantCollection } from '@/services/assistant/providers/qdrant';
import { ingestDocuments, type SourceDocument } from '@/services/ingestion.service';

const MARKDOWN_EXTENSIONS = new Set(['.md', '.mdx']);

async function* readDocuments(root: string): AsyncGenerator<SourceDocument> {
  const entries = await readdir(root, { recursive: true, withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && MARKDOWN_EXTENSIONS.has(path.extname(entry.name)))
    .map((entry) => path.join(entry.parentPath ?? entry.path, entry.name))
    .sort();

  console.log(`Found ${files.length} markdown files`);

  for (const file of files) {
    const source = path.relative(root, file).split(path.sep).join('/');
    console.log(`Processing: ${source}`);
    yield { source, content: await readFile(file, 'utf8') };
  }
}

async function main(): Promise<void> {
  const docsDir = process.argv[2];
  if (!docsDir) {
    console.error('Usage: npm run ingest -- <docs-dir>');
    process.exit(1);
  }

  const config = loadConfig(process.env);
  const collection = createQdrantCollection(config.qdrant, config.providerCalls);

  console.log('=== Content Ingestion ===');
  const stats = await ingestDocuments(readDocuments(path.resolve(docsDir)), {
    embeddings: createGeminiEmbeddings(config.gemini, config.providerCalls),
    collection,
  });

  console.log(
    `Documents: ${stats.documents}, chunks: ${stats.chunks}, uploaded: ${stats.uploaded}, ` +
      `skipped: ${stats.skipped}, failed: ${stats.failed}`
  );
  if (stats.uploaded > 0) {
    console.log(`Total vectors: ${await collection.countPoints()}`);
  }
}

main().catch((error) => {
  console.error('Ingestion failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
