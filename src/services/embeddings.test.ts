import OpenAI from 'openai';
import { describe, expect, it, vi } from 'vitest';
import { EmbeddingServiceError } from '../util/errors.js';
import { cosineDistance } from '../util/sql.js';
import {
  createEmbedder,
  Embedder,
  embedInBatches,
  embedText,
  EmbeddingsClient,
  fnv1a,
  HashingEmbedder,
  OpenAIEmbedder,
  tokenize,
} from './embeddings.js';

function response(vectors: { index: number; embedding: number[] }[]): OpenAI.CreateEmbeddingResponse {
  return {
    object: 'list',
    model: 'text-embedding-3-small',
    data: vectors.map((v) => ({ object: 'embedding', index: v.index, embedding: v.embedding })),
    usage: { prompt_tokens: 1, total_tokens: 1 },
  };
}

function fakeClient(create: EmbeddingsClient['embeddings']['create']): EmbeddingsClient {
  return { embeddings: { create } };
}

describe('tokenize', () => {
  it('lower-cases and keeps letters and digits', () => {
    expect(tokenize('Hello, World! 42 café')).toEqual(['hello', 'world', '42', 'café']);
  });

  it('returns no tokens for punctuation only', () => {
    expect(tokenize('...!?')).toEqual([]);
  });
});

describe('fnv1a', () => {
  it('produces the 32-bit FNV-1a hash', () => {
    expect(fnv1a('')).toBe(2166136261);
    expect(fnv1a('the')).toBe(3020861980);
  });
});

describe('HashingEmbedder', () => {
  const embedder = new HashingEmbedder(384);

  it('is deterministic and unit-length', async () => {
    const [a, b] = await embedder.embed(['The quick brown fox', 'The quick brown fox']);
    expect(a).toEqual(b);
    expect(a).toHaveLength(384);
    const norm = Math.sqrt(a.reduce((acc, x) => acc + x * x, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it('places texts with shared words close together', async () => {
    const [q, d] = await embedder.embed(['quick fox', 'the quick brown fox']);
    expect(1 - cosineDistance(q, d)).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it('ignores case and punctuation', async () => {
    const [a, b] = await embedder.embed(['Quick, FOX!', 'quick fox']);
    expect(a).toEqual(b);
  });

  it('returns a zero vector when there are no tokens', async () => {
    const [v] = await embedder.embed(['---']);
    expect(v.every((x) => x === 0)).toBe(true);
  });
});

describe('OpenAIEmbedder', () => {
  it('requests the configured model and dimensions', async () => {
    const create = vi.fn(async () =>
      response([
        { index: 0, embedding: [1, 0, 0] },
        { index: 1, embedding: [0, 1, 0] },
      ]),
    );
    const embedder = new OpenAIEmbedder({ model: 'text-embedding-3-small', dimensions: 3, client: fakeClient(create) });

    const vectors = await embedder.embed(['a', 'b']);

    expect(create).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: ['a', 'b'], dimensions: 3 });
    expect(vectors).toEqual([
      [1, 0, 0],
      [0, 1, 0],
    ]);
  });

  it('orders vectors by index', async () => {
    const client = fakeClient(async () =>
      response([
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ]),
    );
    const embedder = new OpenAIEmbedder({ model: 'm', dimensions: 2, client });
    expect(await embedder.embed(['first', 'second'])).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it('makes no request for empty input', async () => {
    const create = vi.fn(async () => response([]));
    const embedder = new OpenAIEmbedder({ model: 'm', dimensions: 2, client: fakeClient(create) });
    expect(await embedder.embed([])).toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it('wraps client failures', async () => {
    const cause = new Error('connect ECONNREFUSED');
    const embedder = new OpenAIEmbedder({
      model: 'm',
      dimensions: 2,
      client: fakeClient(async () => {
        throw cause;
      }),
    });
    const err = await embedder.embed(['x']).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingServiceError);
    expect(err).toMatchObject({
      message: 'Embedding service unavailable: connect ECONNREFUSED',
      status: 503,
      code: 'EMBEDDING_SERVICE_ERROR',
      cause,
    });
  });

  it('rejects vectors of the wrong size', async () => {
    const embedder = new OpenAIEmbedder({
      model: 'm',
      dimensions: 3,
      client: fakeClient(async () => response([{ index: 0, embedding: [1, 0] }])),
    });
    await expect(embedder.embed(['x'])).rejects.toThrow('Unexpected embedding size; expected 3, got 2');
  });

  it('rejects a short response', async () => {
    const embedder = new OpenAIEmbedder({
      model: 'm',
      dimensions: 2,
      client: fakeClient(async () => response([{ index: 0, embedding: [1, 0] }])),
    });
    await expect(embedder.embed(['x', 'y'])).rejects.toThrow('Expected 2 embeddings, got 1');
  });
});

describe('embedText', () => {
  it('fails when the provider returns nothing', async () => {
    const empty: Embedder = { model: 'm', dimensions: 2, embed: async () => [] };
    await expect(embedText(empty, 'x')).rejects.toThrow('Embedding service returned no vector');
  });
});

describe('embedInBatches', () => {
  it('splits input into batches and keeps order', async () => {
    const batches: string[][] = [];
    const embedder: Embedder = {
      model: 'len',
      dimensions: 1,
      embed: async (texts) => {
        batches.push(texts);
        return texts.map((t) => [t.length]);
      },
    };

    const vectors = await embedInBatches(embedder, ['a', 'bb', 'ccc', 'dddd', 'eeeee'], {
      batchSize: 2,
      concurrency: 2,
    });

    expect(vectors).toEqual([[1], [2], [3], [4], [5]]);
    expect(batches).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['eeeee']]);
  });

  it('returns nothing for no input', async () => {
    const embedder = new HashingEmbedder(8);
    expect(await embedInBatches(embedder, [], { batchSize: 4, concurrency: 1 })).toEqual([]);
  });
});

describe('createEmbedder', () => {
  it('builds the provider named in the config', () => {
    const base = { OPENAI_EMBED_MODEL: 'text-embedding-3-small', EMBEDDING_DIMENSIONS: 384 };
    expect(createEmbedder({ ...base, EMBEDDING_PROVIDER: 'hashing' })).toBeInstanceOf(HashingEmbedder);
    const openai = createEmbedder({ ...base, EMBEDDING_PROVIDER: 'openai', OPENAI_API_KEY: 'test-key' });
    expect(openai).toBeInstanceOf(OpenAIEmbedder);
    expect(openai.model).toBe('text-embedding-3-small');
    expect(openai.dimensions).toBe(384);
  });
});
