// src/services/memoryVectorStore.ts
// What: In-process VectorStore (VECTOR_STORE=memory) for local runs without Postgres, and for tests.
// How: Documents and passages live in Maps; query() is an exact cosine scan mirroring pgvector's <=>.
//      Enforces the same constraints as the SQL schema: unique sha256, fixed vector dimension, cascade delete.

import { v4 as uuidv4, validate as isUuid } from 'uuid';
import {
  DocumentDetail,
  DocumentRecord,
  DocumentSummary,
  NewDocument,
  NewPassage,
  Passage,
  SearchMatch,
} from '../models/types.js';
import { NotFoundError, StorageError } from '../util/errors.js';
import { clampSimilarity, cosineDistance } from '../util/sql.js';
import { VectorStore } from './vectorStore.js';

interface StoredPassage extends Passage {
  embedding: number[];
}

interface StoredDocument {
  record: DocumentRecord;
  content: string;
  passages: StoredPassage[];
}

export class MemoryVectorStore implements VectorStore {
  // Map keeps insertion order, which listDocuments() reverses for newest-first.
  private readonly docs = new Map<string, StoredDocument>();

  constructor(private readonly dimensions: number) {}

  async init(): Promise<void> {}

  async insert(document: NewDocument, passages: NewPassage[]): Promise<DocumentRecord> {
    if ([...this.docs.values()].some((d) => d.record.sha256 === document.sha256)) {
      throw new StorageError(`A document with hash ${document.sha256} already exists`);
    }
    for (const p of passages) {
      this.assertDimensions(p.embedding);
    }
    const record: DocumentRecord = {
      id: uuidv4(),
      filename: document.filename,
      content_type: document.content_type,
      sha256: document.sha256,
      size_bytes: document.size_bytes,
      page_count: document.page_count,
      created_at: new Date().toISOString(),
    };
    this.docs.set(record.id, {
      record,
      content: document.content,
      passages: passages.map((p) => ({
        id: uuidv4(),
        document_id: record.id,
        ordinal: p.ordinal,
        content: p.content,
        metadata: { ...p.metadata },
        embedding: [...p.embedding],
      })),
    });
    return { ...record };
  }

  async findByHash(sha256: string): Promise<DocumentRecord | null> {
    for (const d of this.docs.values()) {
      if (d.record.sha256 === sha256) return { ...d.record };
    }
    return null;
  }

  async getDocument(id: string): Promise<DocumentDetail> {
    const d = this.lookup(id);
    return {
      document: { ...d.record, content: d.content },
      passages: [...d.passages]
        .sort((a, b) => a.ordinal - b.ordinal)
        .map(({ embedding: _embedding, ...rest }) => ({ ...rest, metadata: { ...rest.metadata } })),
    };
  }

  async deleteDocument(id: string): Promise<void> {
    this.lookup(id);
    this.docs.delete(id);
  }

  async clear(): Promise<number> {
    const n = this.docs.size;
    this.docs.clear();
    return n;
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    return [...this.docs.values()]
      .reverse()
      .map((d) => ({ ...d.record, passage_count: d.passages.length }));
  }

  async query(vector: number[], topK: number): Promise<SearchMatch[]> {
    this.assertDimensions(vector);
    const scored: SearchMatch[] = [];
    for (const d of this.docs.values()) {
      for (const p of d.passages) {
        const distance = cosineDistance(p.embedding, vector);
        scored.push({
          document: { id: d.record.id, filename: d.record.filename },
          passage_id: p.id,
          ordinal: p.ordinal,
          content: p.content,
          score: clampSimilarity(distance),
          distance,
          metadata: { ...p.metadata },
        });
      }
    }
    return scored.sort((a, b) => a.distance - b.distance).slice(0, topK);
  }

  async close(): Promise<void> {}

  private lookup(id: string): StoredDocument {
    const d = isUuid(id) ? this.docs.get(id) : undefined;
    if (!d) throw new NotFoundError(`Document ${id} not found`);
    return d;
  }

  private assertDimensions(v: number[]): void {
    if (v.length !== this.dimensions) {
      throw new StorageError(`Vector has ${v.length} dimensions; the store expects ${this.dimensions}`);
    }
  }
}
