// src/services/vectorStore.ts
// What: Storage port for documents, passages and their vectors.
// How: The search service and indexer only see this interface; PgVectorStore (pgvector) and
//      MemoryVectorStore (exact in-process scan) implement it. Scores are 1 - cosine distance, clamped to [0,1].
//      deleteMany() is the batch delete used by the API and the UI; openStore() is the start-up check.

import {
  DocumentDetail,
  DocumentRecord,
  DocumentSummary,
  NewDocument,
  NewPassage,
  SearchMatch,
} from '../models/types.js';
import logger from '../logging.js';
import { NotFoundError } from '../util/errors.js';

export interface VectorStore {
  /** Check the backing schema fits the configured vector dimension. */
  init(): Promise<void>;
  /** Write the document and all of its passages atomically. */
  insert(document: NewDocument, passages: NewPassage[]): Promise<DocumentRecord>;
  findByHash(sha256: string): Promise<DocumentRecord | null>;
  getDocument(id: string): Promise<DocumentDetail>;
  /** Remove a document; its passages go with it. Throws NotFoundError for unknown ids. */
  deleteDocument(id: string): Promise<void>;
  /** Remove every document; returns how many were deleted. */
  clear(): Promise<number>;
  listDocuments(): Promise<DocumentSummary[]>;
  /** Nearest passages by cosine distance, closest first. Empty store yields []. */
  query(vector: number[], topK: number): Promise<SearchMatch[]>;
  close(): Promise<void>;
}

export interface BatchDeleteResult {
  deleted: string[];
  missing: string[];
}

/** Delete several documents one by one; unknown ids are reported instead of failing the batch. */
export async function deleteMany(store: VectorStore, ids: string[]): Promise<BatchDeleteResult> {
  const result: BatchDeleteResult = { deleted: [], missing: [] };
  for (const id of new Set(ids)) {
    try {
      await store.deleteDocument(id);
      result.deleted.push(id);
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      result.missing.push(id);
    }
  }
  return result;
}

/** init() the store; when that fails, close it so its pool does not keep the process alive. */
export async function openStore<S extends VectorStore>(store: S): Promise<S> {
  try {
    await store.init();
    return store;
  } catch (err) {
    try {
      await store.close();
    } catch (closeErr) {
      logger.warn({ err: closeErr }, 'Failed to close vector store');
    }
    throw err;
  }
}
