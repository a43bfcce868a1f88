// src/server.ts
// What: HTTP server entrypoint.
// How: Loads validated config, builds the vector store (pgvector or in-memory), the embedder, the indexer and
//      the search service, verifies the vector schema, then listens on the configured port. SIGINT/SIGTERM close
//      the server and the pool.

import config from './config/env.js';
import logger from './logging.js';
import { createApp } from './app.js';
import { createPool } from './db/pool.js';
import { createEmbedder } from './services/embeddings.js';
import { Indexer } from './services/indexer.js';
import { MemoryVectorStore } from './services/memoryVectorStore.js';
import { PgVectorStore } from './services/pgVectorStore.js';
import { SearchService } from './services/search.js';
import { openStore, VectorStore } from './services/vectorStore.js';

function createStore(): VectorStore {
  if (config.VECTOR_STORE === 'memory') {
    logger.warn('Using the in-memory vector store; documents are lost on restart');
    return new MemoryVectorStore(config.EMBEDDING_DIMENSIONS);
  }
  if (config.SUPABASE_URL) {
    logger.info({ supabase_host: new URL(config.SUPABASE_URL).host }, 'Using managed Supabase Postgres');
  }
  return new PgVectorStore(createPool(config), config.EMBEDDING_DIMENSIONS);
}

async function main(): Promise<void> {
  const store = await openStore(createStore());

  const embedder = createEmbedder(config);
  const indexer = new Indexer(store, embedder, {
    chunking: { chunkSize: config.CHUNK_SIZE, chunkOverlap: config.CHUNK_OVERLAP },
    embedBatchSize: config.EMBED_BATCH_SIZE,
    embedConcurrency: config.EMBED_CONCURRENCY,
  });
  const search = new SearchService(store, embedder, {
    defaultTopK: config.SEARCH_DEFAULT_TOP_K,
    minScore: config.SEARCH_MIN_SCORE,
    overfetch: config.SEARCH_OVERFETCH,
  });

  const app = createApp({ store, indexer, search, uploadMaxBytes: config.UPLOAD_MAX_BYTES });
  const server = app.listen(config.PORT, () => {
    logger.info(
      { port: config.PORT, store: config.VECTOR_STORE, embedder: embedder.model, dimensions: embedder.dimensions },
      'Server listening',
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      store
        .close()
        .catch((err: unknown) => logger.error({ err }, 'Failed to close vector store'))
        .finally(() => process.exit(0));
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exitCode = 1;
});
