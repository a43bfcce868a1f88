// src/models/types.ts
// What: Shared TypeScript types for DB entities and DTOs used by routes/services.
// How: Interfaces mirror DB columns (snake_case); New* shapes are what the indexer hands to a store.

export type ContentType = 'application/pdf' | 'text/plain';

export interface PassageMetadata {
  source: string; // original filename
  page?: number; // 1-based, PDFs only
  creator?: string; // PDF info dictionary
  creation_date?: string;
}

export interface DocumentRecord {
  id: string;
  filename: string;
  content_type: ContentType;
  sha256: string;
  size_bytes: number;
  page_count: number | null;
  created_at: string; // ISO timestamp
}

export interface DocumentSummary extends DocumentRecord {
  passage_count: number;
}

export interface Passage {
  id: string;
  document_id: string;
  ordinal: number;
  content: string;
  metadata: PassageMetadata;
}

export interface DocumentDetail {
  document: DocumentRecord & { content: string };
  passages: Passage[];
}

export interface NewDocument {
  filename: string;
  content_type: ContentType;
  sha256: string;
  size_bytes: number;
  page_count: number | null;
  content: string;
}

export interface NewPassage {
  ordinal: number;
  content: string;
  embedding: number[];
  metadata: PassageMetadata;
}

export interface SearchMatch {
  document: { id: string; filename: string };
  passage_id: string;
  ordinal: number;
  content: string;
  score: number; // [0,1]
  distance: number; // cosine distance
  metadata: PassageMetadata;
}
