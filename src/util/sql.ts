// src/util/sql.ts
// What: SQL helpers for vectors and scoring.
// How: vectorToParam formats an array for ::vector casting; clampSimilarity converts cosine distance to [0,1];
//      cosineDistance mirrors pgvector's <=> operator for the in-memory store.

export function vectorToParam(v: number[]): string {
  // Postgres vector literal: [0.1,0.2,...]
  return `[${v.join(',')}]`;
}

export function clampSimilarity(distance: number): number {
  if (!Number.isFinite(distance)) return 0;
  const sim = 1 - distance;
  if (sim < 0) return 0;
  if (sim > 1) return 1;
  return sim;
}

export function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  // A zero vector has no direction; treat it as orthogonal to everything.
  if (na === 0 || nb === 0) return 1;
  return 1 - dot / (Math.sqrt(na) * Math.sqrt(nb));
}
