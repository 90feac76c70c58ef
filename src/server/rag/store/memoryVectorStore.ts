import { RagError } from "../errors.ts";
import type { EmbeddingVector, VectorMatch, VectorRecord, VectorSearchFilter, VectorStore } from "../types.ts";
import { compareMatches, cosineSimilarity } from "./similarity.ts";

function assertRecord(record: VectorRecord): void {
  if (!record.id) { throw new RagError("invalid_input", "Vector record id is required"); }
  if (!Array.isArray(record.vector) || record.vector.length === 0) {
    throw new RagError("invalid_input", `Vector for ${record.id} is empty`);
  }
  for (const v of record.vector) {
    if (!Number.isFinite(v)) {
      throw new RagError("invalid_input", `Vector for ${record.id} contains a non-finite number`);
    }
  }
}

/**
 * Brute-force in-process vector store. Records are validated before any of
 * them is written, so a rejected batch leaves the store untouched.
 */
export function createMemoryVectorStore(): VectorStore & { size(): number } {
  const records = new Map<string, VectorRecord>();

  return {
    async upsert(batch: VectorRecord[]): Promise<void> {
      for (const r of batch) { assertRecord(r); }
      for (const r of batch) {
        records.set(r.id, {
          id: r.id,
          vector: [...r.vector],
          metadata: { ...r.metadata },
        });
      }
    },

    async search(vector: EmbeddingVector, k: number, filter?: VectorSearchFilter): Promise<VectorMatch[]> {
      if (!Number.isInteger(k) || k <= 0) { return []; }
      const allowed = filter?.documentIds ? new Set(filter.documentIds) : null;

      const scored: VectorMatch[] = [];
      for (const r of records.values()) {
        if (allowed && !allowed.has(r.metadata.documentId)) { continue; }
        scored.push({ id: r.id, score: cosineSimilarity(vector, r.vector), metadata: { ...r.metadata } });
      }

      scored.sort(compareMatches);
      return scored.slice(0, k);
    },

    async get(ids: string[]): Promise<VectorRecord[]> {
      const out: VectorRecord[] = [];
      for (const id of ids) {
        const r = records.get(id);
        if (r) { out.push({ id: r.id, vector: [...r.vector], metadata: { ...r.metadata } }); }
      }
      return out;
    },

    async delete(ids: string[]): Promise<number> {
      let deleted = 0;
      for (const id of ids) {
        if (records.delete(id)) { deleted += 1; }
      }
      return deleted;
    },

    size(): number {
      return records.size;
    },
  };
}
