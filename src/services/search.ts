// src/services/search.ts
// What: Read path: natural-language query → ranked passages.
// How: Embeds the query with the ingestion embedder, over-fetches topK * overfetch candidates from the store,
//      drops those at or below the minimum score, narrows "who is ..." answers to the sentences naming the
//      subject, then returns the best topK. Embedding and storage failures are wrapped in SearchError.

import logger from '../logging.js';
import { SearchMatch } from '../models/types.js';
import { SearchError, ValidationError } from '../util/errors.js';
import { Embedder, embedText } from './embeddings.js';
import { VectorStore } from './vectorStore.js';

export interface SearchOptions {
  defaultTopK: number;
  minScore: number; // matches must score strictly above this
  overfetch: number;
}

const WHO_IS = /^who\s+is\s+/i;

/**
 * For "who is X" questions keep only the sentences of a passage that mention X.
 * Passages without such a sentence are returned unchanged.
 */
export function focusContent(query: string, content: string): string {
  const trimmed = content.trim();
  const q = query.trim();
  if (!WHO_IS.test(q)) return trimmed;
  const subject = q.replace(WHO_IS, '').replace(/[?.!\s]+$/, '').toLowerCase();
  if (!subject) return trimmed;
  const relevant = trimmed.split('. ').filter((s) => s.toLowerCase().includes(subject));
  if (relevant.length === 0) return trimmed;
  const joined = relevant.join('. ');
  return /[.!?]$/.test(joined) ? joined : `${joined}.`;
}

export class SearchService {
  constructor(
    private readonly store: VectorStore,
    private readonly embedder: Embedder,
    private readonly opts: SearchOptions,
  ) {}

  get defaultTopK(): number {
    return this.opts.defaultTopK;
  }

  async search(query: string, topK: number = this.opts.defaultTopK): Promise<SearchMatch[]> {
    if (query.trim().length === 0) {
      throw new ValidationError('Query must not be empty');
    }
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError('topK must be a positive integer');
    }

    let vector: number[];
    try {
      vector = await embedText(this.embedder, query);
    } catch (err) {
      throw new SearchError('Could not embed the query', err);
    }

    let candidates: SearchMatch[];
    try {
      candidates = await this.store.query(vector, topK * Math.max(1, this.opts.overfetch));
    } catch (err) {
      throw new SearchError('Vector store query failed', err);
    }

    const matches = candidates
      .filter((m) => m.score > this.opts.minScore)
      .map((m) => ({ ...m, content: focusContent(query, m.content) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);

    logger.debug(
      { query_length: query.length, topK, candidates: candidates.length, matches: matches.length },
      'Search completed',
    );
    return matches;
  }
}
