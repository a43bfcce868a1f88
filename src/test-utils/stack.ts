// src/test-utils/stack.ts
// What: In-process search stack for tests: memory store + hashing embedder wired like server.ts does.

import { Embedder, HashingEmbedder } from '../services/embeddings.js';
import { Indexer } from '../services/indexer.js';
import { MemoryVectorStore } from '../services/memoryVectorStore.js';
import { SearchService } from '../services/search.js';
import { handleUpload, UploadResult } from '../services/uploader.js';
import { VectorStore } from '../services/vectorStore.js';

export const TEST_DIMENSIONS = 384;

export interface TestStack {
  store: VectorStore;
  embedder: Embedder;
  indexer: Indexer;
  search: SearchService;
  upload(filename: string, text: string): Promise<UploadResult>;
}

export function createTestStack(
  overrides: { store?: VectorStore; embedder?: Embedder; chunkSize?: number; chunkOverlap?: number; minScore?: number } = {},
): TestStack {
  const store = overrides.store ?? new MemoryVectorStore(TEST_DIMENSIONS);
  const embedder = overrides.embedder ?? new HashingEmbedder(TEST_DIMENSIONS);
  const indexer = new Indexer(store, embedder, {
    chunking: { chunkSize: overrides.chunkSize ?? 300, chunkOverlap: overrides.chunkOverlap ?? 100 },
    embedBatchSize: 8,
    embedConcurrency: 2,
  });
  const search = new SearchService(store, embedder, {
    defaultTopK: 5,
    minScore: overrides.minScore ?? 0.3,
    overfetch: 2,
  });
  return {
    store,
    embedder,
    indexer,
    search,
    upload: (filename, text) => handleUpload(indexer, Buffer.from(text, 'utf8'), filename, 'text/plain'),
  };
}
