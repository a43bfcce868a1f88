// src/services/indexer.ts
// What: Write path for one uploaded file: detect → dedupe → extract → chunk → embed → store.
// How: Duplicate uploads are caught by the sha256 of the raw bytes before any parsing. Embeddings are computed
//      in batches with bounded concurrency while no DB connection is held; the document and its passages are
//      then written in a single store transaction, so a failure at any step persists nothing.

import logger from '../logging.js';
import { DocumentRecord } from '../models/types.js';
import { ParseError, StorageError } from '../util/errors.js';
import { chunkPages, ChunkingOptions } from './chunking.js';
import { Embedder, embedInBatches } from './embeddings.js';
import { detectFormat, extractText } from './extractor.js';
import { VectorStore } from './vectorStore.js';

export interface IndexerOptions {
  chunking: ChunkingOptions;
  embedBatchSize: number;
  embedConcurrency: number;
}

export interface IndexInput {
  buffer: Buffer;
  filename: string; // already sanitized
  sha256: string;
  mimetype?: string;
}

export interface IndexOutcome {
  status: 'indexed' | 'already_exists';
  document: DocumentRecord;
  passages_count: number;
}

export class Indexer {
  constructor(
    private readonly store: VectorStore,
    private readonly embedder: Embedder,
    private readonly opts: IndexerOptions,
  ) {}

  async indexDocument(input: IndexInput): Promise<IndexOutcome> {
    const start = Date.now();
    const { buffer, filename, sha256, mimetype } = input;

    detectFormat(filename, mimetype);

    const existing = await this.store.findByHash(sha256);
    if (existing) {
      logger.info({ filename, hash: sha256, document_id: existing.id }, 'Document already indexed; skipping');
      return { status: 'already_exists', document: existing, passages_count: 0 };
    }

    const extracted = await extractText(buffer, filename, mimetype);
    const drafts = await chunkPages(extracted.pages, filename, this.opts.chunking, extracted.info);
    if (drafts.length === 0) {
      throw new ParseError(`No passages produced for "${filename}"`);
    }

    const vectors = await embedInBatches(
      this.embedder,
      drafts.map((d) => d.content),
      { batchSize: this.opts.embedBatchSize, concurrency: this.opts.embedConcurrency },
    );

    let document: DocumentRecord;
    try {
      document = await this.store.insert(
        {
          filename,
          content_type: extracted.content_type,
          sha256,
          size_bytes: buffer.length,
          page_count: extracted.page_count,
          content: extracted.text,
        },
        drafts.map((d, i) => ({ ordinal: d.ordinal, content: d.content, metadata: d.metadata, embedding: vectors[i] })),
      );
    } catch (err) {
      // A concurrent upload of the same bytes may have won the unique sha256 constraint.
      if (!(err instanceof StorageError)) throw err;
      const winner = await this.store.findByHash(sha256);
      if (!winner) throw err;
      logger.info({ filename, hash: sha256, document_id: winner.id }, 'Document indexed concurrently; skipping');
      return { status: 'already_exists', document: winner, passages_count: 0 };
    }

    logger.info(
      { filename, hash: sha256, document_id: document.id, passages: drafts.length, duration_ms: Date.now() - start },
      'Document indexed',
    );
    return { status: 'indexed', document, passages_count: drafts.length };
  }
}
