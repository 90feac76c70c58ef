/** Cosine similarity in [-1, 1]; -1 for empty, mismatched or non-finite vectors. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) { return -1; }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const av = a[i] ?? NaN;
    const bv = b[i] ?? NaN;
    if (!Number.isFinite(av) || !Number.isFinite(bv)) { return -1; }

    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }

  if (normA <= 0 || normB <= 0) { return -1; }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Store-level ordering: score desc, then id asc, so equal scores rank the same way every time. */
export function compareMatches(a: { id: string; score: number }, b: { id: string; score: number }): number {
  if (a.score !== b.score) { return b.score - a.score; }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
