import type { Database } from '../../db/types.ts'
import { RagError } from '../errors.ts'
import type { EmbeddingVector, VectorMatch, VectorRecord, VectorSearchFilter, VectorStore } from '../types.ts'
import { compareMatches, cosineSimilarity } from './similarity.ts'

interface ChunkVectorRow {
  id: string
  documentId: string
  sequenceIndex: number
  text: string
  embeddingJson: string
}

function asRow(raw: unknown): ChunkVectorRow | null {
  if (!raw || typeof raw !== 'object') return null
  const r = raw as Record<string, unknown>

  const id = typeof r.id === 'string' ? r.id : ''
  const documentId = typeof r.documentId === 'string' ? r.documentId : ''
  const sequenceIndex = typeof r.sequenceIndex === 'number' ? r.sequenceIndex : NaN
  const text = typeof r.text === 'string' ? r.text : ''
  const embeddingJson = typeof r.embeddingJson === 'string' ? r.embeddingJson : ''

  if (!id || !documentId || !Number.isFinite(sequenceIndex) || !embeddingJson) return null
  return { id, documentId, sequenceIndex, text, embeddingJson }
}

function parseVector(json: string): number[] {
  try {
    const parsed: unknown = JSON.parse(json)
    if (Array.isArray(parsed) && parsed.every((n) => typeof n === 'number')) return parsed
  } catch {
    return []
  }
  return []
}

function assertVector(id: string, vector: EmbeddingVector): void {
  if (!Array.isArray(vector) || vector.length === 0) {
    throw new RagError('invalid_input', `Vector for ${id} is empty`)
  }
  if (!vector.every((v) => Number.isFinite(v))) {
    throw new RagError('invalid_input', `Vector for ${id} contains a non-finite number`)
  }
}

// Stays under SQLite's bound-parameter limit.
const GET_BATCH = 500

/**
 * Vectors stored as JSON next to the chunk text; similarity is computed in
 * process over the (optionally document-filtered) candidate rows.
 */
export function createSqliteVectorStore(db: Database): VectorStore {
  const upsertStmt = db.prepare(
    'INSERT OR REPLACE INTO chunk_vectors (id, documentId, sequenceIndex, text, embeddingJson) VALUES (?, ?, ?, ?, ?)',
  )
  const deleteStmt = db.prepare('DELETE FROM chunk_vectors WHERE id = ?')

  return {
    async upsert(records: VectorRecord[]): Promise<void> {
      for (const r of records) {
        if (!r.id) throw new RagError('invalid_input', 'Vector record id is required')
        assertVector(r.id, r.vector)
      }

      const tx = db.transaction(() => {
        for (const r of records) {
          upsertStmt.run(r.id, r.metadata.documentId, r.metadata.sequenceIndex, r.metadata.text, JSON.stringify(r.vector))
        }
      })
      tx()
    },

    async search(vector: EmbeddingVector, k: number, filter?: VectorSearchFilter): Promise<VectorMatch[]> {
      if (!Number.isInteger(k) || k <= 0) return []

      const docIds = filter?.documentIds
      if (docIds && docIds.length === 0) return []

      const where = docIds ? `WHERE documentId IN (${docIds.map(() => '?').join(',')})` : ''
      const rows = db
        .prepare(`SELECT id, documentId, sequenceIndex, text, embeddingJson FROM chunk_vectors ${where}`)
        .all(...(docIds ?? []))

      const scored: VectorMatch[] = []
      for (const raw of rows) {
        const row = asRow(raw)
        if (!row) continue
        scored.push({
          id: row.id,
          score: cosineSimilarity(vector, parseVector(row.embeddingJson)),
          metadata: { documentId: row.documentId, sequenceIndex: row.sequenceIndex, text: row.text },
        })
      }

      scored.sort(compareMatches)
      return scored.slice(0, k)
    },

    async get(ids: string[]): Promise<VectorRecord[]> {
      const out: VectorRecord[] = []
      for (let i = 0; i < ids.length; i += GET_BATCH) {
        const batch = ids.slice(i, i + GET_BATCH)
        const rows = db
          .prepare(
            `SELECT id, documentId, sequenceIndex, text, embeddingJson FROM chunk_vectors WHERE id IN (${batch.map(() => '?').join(',')})`,
          )
          .all(...batch)

        for (const raw of rows) {
          const row = asRow(raw)
          if (!row) continue
          out.push({
            id: row.id,
            vector: parseVector(row.embeddingJson),
            metadata: { documentId: row.documentId, sequenceIndex: row.sequenceIndex, text: row.text },
          })
        }
      }
      return out
    },

    async delete(ids: string[]): Promise<number> {
      if (ids.length === 0) return 0
      let deleted = 0
      const tx = db.transaction(() => {
        for (const id of ids) {
          deleted += Number(deleteStmt.run(String(id)).changes) || 0
        }
      })
      tx()
      return deleted
    },
  }
}
