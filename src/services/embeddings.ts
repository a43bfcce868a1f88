// src/services/embeddings.ts
// What: Embedding providers behind one interface, plus batched embedding for ingestion.
// How: OpenAIEmbedder calls the embeddings endpoint with an explicit `dimensions` so vectors fit the
//      vector(N) column; HashingEmbedder is a local, deterministic feature-hashing model for offline use.
//      Both validate vector length and report failures as EmbeddingServiceError.
//      embedInBatches() splits large inputs and runs batches through p-limit.

import OpenAI from 'openai';
import pLimit from 'p-limit';
import { AppConfig } from '../config/schema.js';
import { EmbeddingServiceError, errorMessage } from '../util/errors.js';

export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
}

// The slice of the OpenAI client we use; lets tests hand in a fake.
export interface EmbeddingsClient {
  embeddings: {
    create(body: OpenAI.EmbeddingCreateParams): Promise<OpenAI.CreateEmbeddingResponse>;
  };
}

function assertDimensions(vectors: number[][], expected: number): void {
  for (const v of vectors) {
    if (v.length !== expected) {
      throw new EmbeddingServiceError(`Unexpected embedding size; expected ${expected}, got ${v.length}`);
    }
  }
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  readonly dimensions: number;
  private readonly client: EmbeddingsClient;

  constructor(opts: { model: string; dimensions: number; apiKey?: string; client?: EmbeddingsClient }) {
    this.model = opts.model;
    this.dimensions = opts.dimensions;
    this.client = opts.client ?? new OpenAI({ apiKey: opts.apiKey });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    let res: OpenAI.CreateEmbeddingResponse;
    try {
      res = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        dimensions: this.dimensions,
      });
    } catch (err) {
      throw new EmbeddingServiceError(`Embedding service unavailable: ${errorMessage(err)}`, { cause: err });
    }
    if (res.data.length !== texts.length) {
      throw new EmbeddingServiceError(`Expected ${texts.length} embeddings, got ${res.data.length}`);
    }
    // The API does not promise input order; index does.
    const vectors = [...res.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    assertDimensions(vectors, this.dimensions);
    return vectors;
  }
}

/**
 * Feature-hashing bag-of-words embedder. Lower-cased word tokens are hashed with 32-bit FNV-1a into
 * `dimensions` buckets with a hash-derived sign, then the vector is L2-normalised. Texts sharing words
 * land close together under cosine distance; there is no notion of synonyms.
 */
export class HashingEmbedder implements Embedder {
  readonly model = 'fnv1a-hashing';
  readonly dimensions: number;

  constructor(dimensions: number) {
    this.dimensions = dimensions;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.embedOne(t));
  }

  private embedOne(text: string): number[] {
    const v = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const h = fnv1a(token);
      v[h % this.dimensions] += h >>> 31 === 1 ? -1 : 1;
    }
    const norm = Math.sqrt(v.reduce((acc, x) => acc + x * x, 0));
    return norm === 0 ? v : v.map((x) => x / norm);
  }
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

export function fnv1a(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h >>> 0;
}

export async function embedText(embedder: Embedder, text: string): Promise<number[]> {
  const [vec] = await embedder.embed([text]);
  if (!vec) {
    throw new EmbeddingServiceError('Embedding service returned no vector');
  }
  return vec;
}

export async function embedInBatches(
  embedder: Embedder,
  texts: string[],
  opts: { batchSize: number; concurrency: number },
): Promise<number[][]> {
  const limit = pLimit(Math.max(1, opts.concurrency));
  const batches: string[][] = [];
  for (let offset = 0; offset < texts.length; offset += opts.batchSize) {
    batches.push(texts.slice(offset, offset + opts.batchSize));
  }
  const results = await Promise.all(batches.map((batch) => limit(() => embedder.embed(batch))));
  return results.flat();
}

export function createEmbedder(
  config: Pick<AppConfig, 'EMBEDDING_PROVIDER' | 'OPENAI_API_KEY' | 'OPENAI_EMBED_MODEL' | 'EMBEDDING_DIMENSIONS'>,
): Embedder {
  if (config.EMBEDDING_PROVIDER === 'hashing') {
    return new HashingEmbedder(config.EMBEDDING_DIMENSIONS);
  }
  return new OpenAIEmbedder({
    apiKey: config.OPENAI_API_KEY,
    model: config.OPENAI_EMBED_MODEL,
    dimensions: config.EMBEDDING_DIMENSIONS,
  });
}
