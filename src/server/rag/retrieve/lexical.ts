function words(text: string): string[] {
  const normalized = String(text ?? "").toLowerCase().replace(/[^\p{L}\p{N}]+/gu, " ").trim();
  if (!normalized) { return []; }
  return normalized.split(/\s+/g).filter((t) => t.length >= 3);
}

/** Distinct query terms of 3+ characters, in first-seen order. */
export function tokenizeQuery(query: string): string[] {
  return [...new Set(words(query))];
}

export function tokenizeText(text: string): Set<string> {
  return new Set(words(text));
}

/** Fraction of query terms present in the chunk, in [0, 1]. */
export function lexicalScore(queryTokens: readonly string[], chunkText: string): number {
  if (queryTokens.length === 0) { return 0; }
  const tokenSet = tokenizeText(chunkText);
  let matched = 0;
  for (const t of queryTokens) {
    if (tokenSet.has(t)) { matched++; }
  }
  return matched / queryTokens.length;
}
