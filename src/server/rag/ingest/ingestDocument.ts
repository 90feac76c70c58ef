import { randomUUID } from 'node:crypto'

import { KeyedMutex } from '../conversation/keyedMutex.ts'
import { RagError, toRagError } from '../errors.ts'
import { debugRag, logRagError, logRagWarn } from '../log.ts'
import { callService } from '../service/callService.ts'
import { chunkText, type ChunkOptions } from '../text/chunk.ts'
import { normalizeText } from '../text/normalize.ts'
import type { DocumentInput, DocumentRecord, Embedder, VectorRecord, VectorStore } from '../types.ts'
import type { DocumentStore } from './statusStore.ts'

export interface IndexerDeps {
  documents: DocumentStore
  store: VectorStore
  embedder: Embedder
  chunking: ChunkOptions
  embedBatchSize: number
  serviceTimeoutMs: number
  now?: () => number
  newGeneration?: () => string
}

export interface IndexResult {
  document: DocumentRecord
  chunksIndexed: number
}

export interface Indexer {
  indexDocument(input: DocumentInput, opts?: { signal?: AbortSignal }): Promise<IndexResult>
  deleteDocument(documentId: string): Promise<DocumentRecord>
}

function requireDocumentId(raw: unknown): string {
  const id = String(raw ?? '').trim()
  if (!id) throw new RagError('invalid_input', 'documentId is required')
  return id
}

export function createIndexer(deps: IndexerDeps): Indexer {
  const now = deps.now ?? Date.now
  const newGeneration = deps.newGeneration ?? (() => randomUUID().slice(0, 8))
  const batchSize = Math.max(1, Math.floor(deps.embedBatchSize))
  const locks = new KeyedMutex()

  // Fails fast with invalid_config on bad chunk settings.
  chunkText('', deps.chunking)

  async function embedAll(texts: string[], documentId: string, signal?: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = []
    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize)
      const out = await callService((s) => deps.embedder.embedBatch(batch, s), {
        timeoutMs: deps.serviceTimeoutMs,
        retries: 1,
        label: `embedding batch ${i / batchSize} of ${documentId}`,
        ...(signal ? { signal } : {}),
      })
      if (out.length !== batch.length) {
        throw new RagError('service_unavailable', `Expected ${batch.length} embeddings, got ${out.length}`)
      }
      vectors.push(...out)
    }
    return vectors
  }

  async function discard(ids: string[], documentId: string, why: string): Promise<void> {
    if (ids.length === 0) return
    try {
      await deps.store.delete(ids)
    } catch (error: unknown) {
      logRagWarn('rag.ingest', `${why} for ${documentId} left ${ids.length} unreferenced chunks: ${toRagError(error).message}`)
    }
  }

  async function indexLocked(input: DocumentInput, signal?: AbortSignal): Promise<IndexResult> {
    const documentId = requireDocumentId(input.id)
    if (typeof input.rawText !== 'string') throw new RagError('invalid_input', 'rawText must be a string')

    const existing = await deps.documents.get(documentId)
    const previousIds = existing?.chunkIds ?? []
    const uploadedAt = input.uploadedAt ?? existing?.uploadedAt ?? now()
    const sourceUri = String(input.sourceUri ?? existing?.sourceUri ?? '')

    // Pending documents are invisible to retrieval until the swap below.
    await deps.documents.put({ id: documentId, sourceUri, uploadedAt, updatedAt: now(), status: 'pending', chunkIds: previousIds })

    const generation = newGeneration()
    // Whitespace-only chunks carry nothing to embed or retrieve.
    const drafts = [...chunkText(normalizeText(input.rawText), deps.chunking)].filter((d) => d.text.trim().length > 0)
    const newIds = drafts.map((d) => `${documentId}:${generation}:${d.sequenceIndex}`)
    let written = false

    try {
      const vectors = drafts.length ? await embedAll(drafts.map((d) => d.text), documentId, signal) : []

      const records: VectorRecord[] = []
      drafts.forEach((d, i) => {
        const vector = vectors[i]
        const id = newIds[i]
        if (!vector || !id) throw new RagError('service_unavailable', `Missing embedding for chunk ${d.sequenceIndex}`)
        records.push({ id, vector, metadata: { documentId, sequenceIndex: d.sequenceIndex, text: d.text } })
      })

      if (records.length) {
        written = true
        await deps.store.upsert(records)
      }

      const document: DocumentRecord = {
        id: documentId,
        sourceUri,
        uploadedAt,
        updatedAt: now(),
        status: 'indexed',
        chunkIds: newIds,
      }
      await deps.documents.put(document)

      await discard(previousIds.filter((id) => !newIds.includes(id)), documentId, 'replacing previous chunks')

      debugRag('rag.ingest', 'indexed', { documentId, chunks: newIds.length, replaced: previousIds.length })
      return { document, chunksIndexed: newIds.length }
    } catch (error: unknown) {
      const cause = toRagError(error)

      if (written) await discard(newIds, documentId, 'rollback')
      await discard(previousIds, documentId, 'clearing stale chunks')

      await deps.documents.put({
        id: documentId,
        sourceUri,
        uploadedAt,
        updatedAt: now(),
        status: 'failed',
        chunkIds: [],
        lastError: cause.message,
      })

      logRagError('rag.ingest', `failed for documentId=${documentId}: ${cause.kind}: ${cause.message}`)
      throw new RagError('indexing_failed', `Indexing failed for ${documentId}: ${cause.message}`, { cause })
    }
  }

  return {
    async indexDocument(input: DocumentInput, opts?: { signal?: AbortSignal }): Promise<IndexResult> {
      const documentId = requireDocumentId(input.id)
      return locks.runExclusive(documentId, () => indexLocked(input, opts?.signal))
    },

    async deleteDocument(documentIdRaw: string): Promise<DocumentRecord> {
      const documentId = requireDocumentId(documentIdRaw)

      return locks.runExclusive(documentId, async () => {
        const existing = await deps.documents.get(documentId)
        const owned = existing?.chunkIds ?? []

        if (owned.length) await deps.store.delete(owned)

        const tombstone: DocumentRecord = {
          id: documentId,
          sourceUri: existing?.sourceUri ?? '',
          uploadedAt: existing?.uploadedAt ?? now(),
          updatedAt: now(),
          status: 'deleted',
          chunkIds: [],
        }
        await deps.documents.put(tombstone)

        debugRag('rag.ingest', 'deleted', { documentId, chunks: owned.length })
        return tombstone
      })
    },
  }
}
