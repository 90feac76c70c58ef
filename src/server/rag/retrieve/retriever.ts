import type { RagConfig } from "../config.ts";
import { RagError, invalidConfig } from "../errors.ts";
import type { DocumentStore } from "../ingest/statusStore.ts";
import { debugRag } from "../log.ts";
import { callService } from "../service/callService.ts";
import { cosineSimilarity } from "../store/similarity.ts";
import type { Embedder, EmbeddingVector, RetrievalResult, RetrievedChunk, VectorMatch, VectorStore } from "../types.ts";
import { lexicalScore, tokenizeQuery } from "./lexical.ts";

export interface RetrieveFilters {
  documentIds?: string[];
}

export interface RetrieveOptions {
  signal?: AbortSignal;
}

export type RetrieverConfig = Pick<
  RagConfig,
  "topK" | "maxTopK" | "minScore" | "hybrid" | "vectorWeight" | "serviceTimeoutMs"
>;

export interface Retriever {
  /** The effective k, or invalid_config when it falls outside 1..maxTopK. */
  resolveK(k?: number): number;
  retrieve(query: string, k?: number, filters?: RetrieveFilters, opts?: RetrieveOptions): Promise<RetrievalResult>;
}

export interface RetrieverDeps {
  embedder: Embedder;
  store: VectorStore;
  documents: DocumentStore;
  config: RetrieverConfig;
}

const MAX_CANDIDATES = 200;

/** Score desc, then sequenceIndex, documentId and chunkId ascending. */
export function compareRetrieved(a: RetrievedChunk, b: RetrievedChunk): number {
  if (b.score !== a.score) { return b.score - a.score; }
  if (a.sequenceIndex !== b.sequenceIndex) { return a.sequenceIndex - b.sequenceIndex; }
  if (a.documentId !== b.documentId) { return a.documentId < b.documentId ? -1 : 1; }
  if (a.chunkId !== b.chunkId) { return a.chunkId < b.chunkId ? -1 : 1; }
  return 0;
}

function candidateCount(k: number): number {
  return Math.max(k, Math.min(MAX_CANDIDATES, k * 5));
}

export function createRetriever(deps: RetrieverDeps): Retriever {
  const { config } = deps;
  const weight = config.hybrid ? Math.min(1, Math.max(0, config.vectorWeight)) : 1;

  /** Best keyword matches over the committed chunks, scored against the query vector too. */
  async function lexicalCandidates(
    vector: EmbeddingVector,
    queryTokens: readonly string[],
    chunkIds: string[],
    limit: number,
  ): Promise<VectorMatch[]> {
    const scored = (await deps.store.get(chunkIds))
      .map((record) => ({ record, lex: lexicalScore(queryTokens, record.metadata.text) }))
      .filter((c) => c.lex > 0);

    scored.sort((a, b) => b.lex - a.lex || (a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0));

    return scored.slice(0, limit).map(({ record }) => ({
      id: record.id,
      score: cosineSimilarity(vector, record.vector),
      metadata: record.metadata,
    }));
  }

  function resolveK(k?: number): number {
    const value = k ?? config.topK;
    if (!Number.isInteger(value) || value < 1 || value > config.maxTopK) {
      throw invalidConfig(`k must be an integer in 1..${config.maxTopK} (got ${String(value)})`);
    }
    return value;
  }

  return {
    resolveK,

    async retrieve(queryRaw, kRaw, filters, opts): Promise<RetrievalResult> {
      const k = resolveK(kRaw);
      const query = String(queryRaw ?? "").trim();
      if (!query) { throw new RagError("invalid_input", "query is required"); }

      const wanted = filters?.documentIds ? new Set(filters.documentIds) : null;
      const committed = new Map<string, string>();
      for (const doc of await deps.documents.list({ status: "indexed" })) {
        if (wanted && !wanted.has(doc.id)) { continue; }
        for (const chunkId of doc.chunkIds) { committed.set(chunkId, doc.id); }
      }

      if (committed.size === 0) {
        debugRag("rag.retrieve", "empty_corpus", { query });
        return { query, items: [], degraded: true };
      }

      const vector = await callService((signal) => deps.embedder.embed(query, signal), {
        timeoutMs: config.serviceTimeoutMs,
        retries: 1,
        label: "query embedding",
        ...(opts?.signal ? { signal: opts.signal } : {}),
      });

      const documentIds = [...new Set(committed.values())];
      const pool = candidateCount(k);
      const matches = await deps.store.search(vector, pool, { documentIds });
      const queryTokens = config.hybrid ? tokenizeQuery(query) : [];

      const candidates = new Map<string, VectorMatch>();
      for (const m of matches) { candidates.set(m.id, m); }
      if (config.hybrid && queryTokens.length > 0) {
        // Keyword hits the vector pool missed still compete on the blended score.
        for (const m of await lexicalCandidates(vector, queryTokens, [...committed.keys()], pool)) {
          if (!candidates.has(m.id)) { candidates.set(m.id, m); }
        }
      }

      const items: RetrievedChunk[] = [];
      for (const m of candidates.values()) {
        // Orphans from an interrupted re-index are never surfaced.
        if (committed.get(m.id) !== m.metadata.documentId) { continue; }

        const vectorScore = m.score;
        const item: RetrievedChunk = {
          chunkId: m.id,
          documentId: m.metadata.documentId,
          text: m.metadata.text,
          sequenceIndex: m.metadata.sequenceIndex,
          vectorScore,
          score: vectorScore,
        };
        if (config.hybrid) {
          const lex = lexicalScore(queryTokens, m.metadata.text);
          item.lexicalScore = lex;
          item.score = weight * vectorScore + (1 - weight) * lex;
        }
        if (item.score < config.minScore) { continue; }
        items.push(item);
      }

      items.sort(compareRetrieved);
      const top = items.slice(0, k);

      const first = top[0];
      const degraded = !first || (config.hybrid && queryTokens.length > 0 && (first.lexicalScore ?? 0) === 0);

      debugRag("rag.retrieve", "done", {
        query,
        k,
        candidates: candidates.size,
        returned: top.length,
        degraded,
        top: top.map((t) => ({ chunkId: t.chunkId, score: Number(t.score.toFixed(4)) })),
      });

      return { query, items: top, degraded };
    },
  };
}
