// src/services/chunking.ts
// What: Passage splitting with a size/overlap window.
// How: Runs LangChain's RecursiveCharacterTextSplitter page by page, trying paragraph, line, sentence and
//      word boundaries in that order before cutting mid-word. Ordinals run across the whole document and each
//      passage keeps its source filename and, for PDFs, the 1-based page number plus creator/creation date.

import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { PassageMetadata } from '../models/types.js';
import { DocumentInfo, ExtractedPage } from './extractor.js';

export const DEFAULT_SEPARATORS = ['\n\n', '\n', '.', '!', '?', ',', ' ', ''];

export interface ChunkingOptions {
  chunkSize: number; // characters
  chunkOverlap: number; // characters, < chunkSize
}

export interface PassageDraft {
  ordinal: number;
  content: string;
  metadata: PassageMetadata;
}

export async function chunkPages(
  pages: ExtractedPage[],
  source: string,
  opts: ChunkingOptions,
  info: DocumentInfo = {},
): Promise<PassageDraft[]> {
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: opts.chunkSize,
    chunkOverlap: opts.chunkOverlap,
    separators: DEFAULT_SEPARATORS,
  });

  const drafts: PassageDraft[] = [];
  for (const p of pages) {
    const pieces = await splitter.splitText(p.text);
    for (const piece of pieces) {
      const content = piece.trim();
      if (content.length === 0) continue;
      const metadata: PassageMetadata = p.page === null ? { source, ...info } : { source, page: p.page, ...info };
      drafts.push({ ordinal: drafts.length, content, metadata });
    }
  }
  return drafts;
}
