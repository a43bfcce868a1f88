// src/services/pgVectorStore.ts
// What: VectorStore over Postgres + pgvector (tables from src/db/migrations).
// How: insert() writes the document and its passages in one transaction on a single pooled client, casting
//      embeddings with ::vector. query() opens a short transaction only to raise hnsw.ef_search (SET LOCAL via
//      set_config) before ordering by cosine distance (<=>). Driver errors become StorageError; unknown ids and
//      malformed uuids become NotFoundError. Clients are always released in finally.

import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { SqlPool } from '../db/pool.js';
import logger from '../logging.js';
import {
  ContentType,
  DocumentDetail,
  DocumentRecord,
  DocumentSummary,
  NewDocument,
  NewPassage,
  Passage,
  PassageMetadata,
  SearchMatch,
} from '../models/types.js';
import { AppError, errorMessage, NotFoundError, StorageError } from '../util/errors.js';
import { clampSimilarity, vectorToParam } from '../util/sql.js';
import { VectorStore } from './vectorStore.js';

interface DocumentRow {
  id: string;
  filename: string;
  content_type: ContentType;
  sha256: string;
  size_bytes: number;
  page_count: number | null;
  created_at: Date | string;
}

interface PassageRow {
  id: string;
  document_id: string;
  ordinal: number;
  content: string;
  metadata: PassageMetadata;
}

interface MatchRow extends PassageRow {
  filename: string;
  distance: number | string;
}

const DOCUMENT_COLUMNS = 'id, filename, content_type, sha256, size_bytes, page_count, created_at';

function toRecord(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    filename: row.filename,
    content_type: row.content_type,
    sha256: row.sha256,
    size_bytes: Number(row.size_bytes),
    page_count: row.page_count === null ? null : Number(row.page_count),
    created_at: row.created_at instanceof Date ? row.created_at.toISOString() : String(row.created_at),
  };
}

function toPassage(row: PassageRow): Passage {
  return {
    id: row.id,
    document_id: row.document_id,
    ordinal: Number(row.ordinal),
    content: row.content,
    metadata: row.metadata,
  };
}

export class PgVectorStore implements VectorStore {
  constructor(
    private readonly pool: SqlPool,
    private readonly dimensions: number,
  ) {}

  async init(): Promise<void> {
    const r = await this.run('Schema check', () =>
      this.pool.query(
        `SELECT format_type(a.atttypid, a.atttypmod) AS column_type
         FROM pg_attribute a
         WHERE a.attrelid = to_regclass('passages') AND a.attname = 'embedding' AND NOT a.attisdropped`,
      ),
    );
    const rows: { column_type: string }[] = r.rows;
    const columnType = rows[0]?.column_type;
    if (!columnType) {
      throw new StorageError('Table passages.embedding not found; run the migrations first (npm run migrate)');
    }
    const expected = `vector(${this.dimensions})`;
    if (columnType !== expected) {
      throw new StorageError(
        `passages.embedding is ${columnType} but EMBEDDING_DIMENSIONS expects ${expected}; align the migration and the config`,
      );
    }
    logger.debug({ column_type: columnType }, 'Vector schema verified');
  }

  async insert(document: NewDocument, passages: NewPassage[]): Promise<DocumentRecord> {
    for (const p of passages) {
      this.assertDimensions(p.embedding);
    }
    const client = await this.run('Connect', () => this.pool.connect());
    let inTx = false;
    try {
      await client.query('BEGIN');
      inTx = true;

      const docRes = await client.query(
        `INSERT INTO documents (id, filename, content_type, sha256, size_bytes, page_count, content)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${DOCUMENT_COLUMNS}`,
        [
          uuidv4(),
          document.filename,
          document.content_type,
          document.sha256,
          document.size_bytes,
          document.page_count,
          document.content,
        ],
      );
      const inserted: DocumentRow[] = docRes.rows;
      const record = toRecord(inserted[0]);

      for (const p of passages) {
        await client.query(
          'INSERT INTO passages (id, document_id, ordinal, content, embedding, metadata) VALUES ($1, $2, $3, $4, $5::vector, $6::jsonb)',
          [uuidv4(), record.id, p.ordinal, p.content, vectorToParam(p.embedding), JSON.stringify(p.metadata)],
        );
      }

      await client.query('COMMIT');
      inTx = false;
      return record;
    } catch (err) {
      if (inTx) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          logger.warn({ err: rollbackErr }, 'Rollback failed');
        }
      }
      throw this.toStorageError('Insert', err);
    } finally {
      client.release();
    }
  }

  async findByHash(sha256: string): Promise<DocumentRecord | null> {
    const r = await this.run('Lookup', () =>
      this.pool.query(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE sha256 = $1 LIMIT 1`, [sha256]),
    );
    const rows: DocumentRow[] = r.rows;
    return rows.length > 0 ? toRecord(rows[0]) : null;
  }

  async getDocument(id: string): Promise<DocumentDetail> {
    if (!isUuid(id)) throw new NotFoundError(`Document ${id} not found`);
    const docRes = await this.run('Lookup', () =>
      this.pool.query(`SELECT ${DOCUMENT_COLUMNS}, content FROM documents WHERE id = $1`, [id]),
    );
    const docRows: (DocumentRow & { content: string })[] = docRes.rows;
    if (docRows.length === 0) throw new NotFoundError(`Document ${id} not found`);
    const row = docRows[0];
    const passRes = await this.run('Lookup', () =>
      this.pool.query(
        'SELECT id, document_id, ordinal, content, metadata FROM passages WHERE document_id = $1 ORDER BY ordinal',
        [id],
      ),
    );
    const passageRows: PassageRow[] = passRes.rows;
    return {
      document: { ...toRecord(row), content: row.content },
      passages: passageRows.map(toPassage),
    };
  }

  async deleteDocument(id: string): Promise<void> {
    if (!isUuid(id)) throw new NotFoundError(`Document ${id} not found`);
    // passages.document_id is ON DELETE CASCADE
    const r = await this.run('Delete', () => this.pool.query('DELETE FROM documents WHERE id = $1', [id]));
    if ((r.rowCount ?? 0) === 0) throw new NotFoundError(`Document ${id} not found`);
  }

  async clear(): Promise<number> {
    const r = await this.run('Clear', () => this.pool.query('DELETE FROM documents'));
    return r.rowCount ?? 0;
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    const sql = `
      SELECT d.id, d.filename, d.content_type, d.sha256, d.size_bytes, d.page_count, d.created_at,
             COALESCE(p.cnt, 0) AS passage_count
      FROM documents d
      LEFT JOIN (SELECT document_id, COUNT(*) cnt FROM passages GROUP BY document_id) p ON p.document_id = d.id
      ORDER BY d.created_at DESC
    `;
    const r = await this.run('List', () => this.pool.query(sql));
    const rows: (DocumentRow & { passage_count: number | string })[] = r.rows;
    return rows.map((row) => ({ ...toRecord(row), passage_count: Number(row.passage_count) }));
  }

  async query(vector: number[], topK: number): Promise<SearchMatch[]> {
    this.assertDimensions(vector);
    const client = await this.run('Connect', () => this.pool.connect());
    let rows: MatchRow[] = [];
    let inTx = false;
    try {
      await client.query('BEGIN');
      inTx = true;
      // HNSW returns at most ef_search candidates; keep it above topK.
      await client.query("SELECT set_config('hnsw.ef_search', $1, true)", [String(Math.min(1000, Math.max(40, topK)))]);
      const r = await client.query(
        `SELECT p.id, p.document_id, p.ordinal, p.content, p.metadata, d.filename,
                (p.embedding <=> $1::vector) AS distance
         FROM passages p
         JOIN documents d ON d.id = p.document_id
         ORDER BY p.embedding <=> $1::vector
         LIMIT $2`,
        [vectorToParam(vector), topK],
      );
      rows = r.rows;
      await client.query('COMMIT');
      inTx = false;
    } catch (err) {
      if (inTx) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          logger.warn({ err: rollbackErr }, 'Rollback failed');
        }
      }
      throw this.toStorageError('Query', err);
    } finally {
      client.release();
    }

    return rows.map((row) => {
      const distance = Number(row.distance);
      return {
        document: { id: row.document_id, filename: row.filename },
        passage_id: row.id,
        ordinal: Number(row.ordinal),
        content: row.content,
        score: clampSimilarity(distance),
        distance,
        metadata: row.metadata,
      };
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private assertDimensions(v: number[]): void {
    if (v.length !== this.dimensions) {
      throw new StorageError(`Vector has ${v.length} dimensions; the store expects ${this.dimensions}`);
    }
  }

  private toStorageError(what: string, err: unknown): AppError {
    if (err instanceof AppError) return err;
    return new StorageError(`${what} failed: ${errorMessage(err)}`, { cause: err });
  }

  private async run<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw this.toStorageError(what, err);
    }
  }
}
