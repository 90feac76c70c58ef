import { randomUUID } from 'node:crypto'

import type { RagHealth, RagService } from './types.ts'

import { createAnswerComposer } from '../../src/server/rag/answer/answerComposer.ts'
import { loadRagConfig, type RagConfig } from '../../src/server/rag/config.ts'
import { createMemorySessionStore, type ConversationStore } from '../../src/server/rag/conversation/sessionStore.ts'
import { sweepIdleSessions } from '../../src/server/rag/conversation/sweepIdleSessions.ts'
import { createOllamaEmbedder } from '../../src/server/rag/embeddings/ollama.ts'
import { RagError, toRagError } from '../../src/server/rag/errors.ts'
import { createIndexer } from '../../src/server/rag/ingest/ingestDocument.ts'
import { createIngestQueue } from '../../src/server/rag/ingest/queue.ts'
import { createMemoryDocumentStore, type DocumentStore } from '../../src/server/rag/ingest/statusStore.ts'
import { createOllamaGenerator } from '../../src/server/rag/llm/ollamaChat.ts'
import { debugRag } from '../../src/server/rag/log.ts'
import { createRetriever } from '../../src/server/rag/retrieve/retriever.ts'
import { callService } from '../../src/server/rag/service/callService.ts'
import { createMemoryVectorStore } from '../../src/server/rag/store/memoryVectorStore.ts'
import { createSqliteDocumentStore } from '../../src/server/rag/store/sqliteDocumentStore.ts'
import { createSqliteVectorStore } from '../../src/server/rag/store/sqliteVectorStore.ts'
import type { Embedder, Generator, VectorStore } from '../../src/server/rag/types.ts'
import { openSqliteDb } from '../../src/server/db/index.ts'

/** Collaborators that replace the configured providers (tests, embedding hosts). */
export interface RagServiceOverrides {
  embedder?: Embedder
  generator?: Generator
  vectorStore?: VectorStore
  documents?: DocumentStore
  sessions?: ConversationStore
}

const HEALTH_PROBE_TIMEOUT_MS = 1500

interface Stores {
  vectorStore: VectorStore
  documents: DocumentStore
  close: () => void
}

function openStores(config: RagConfig, overrides: RagServiceOverrides): Stores {
  if (overrides.vectorStore && overrides.documents) {
    return { vectorStore: overrides.vectorStore, documents: overrides.documents, close: () => {} }
  }

  if (config.provider === 'sqlite') {
    const db = openSqliteDb(config.dbPath)
    return {
      vectorStore: overrides.vectorStore ?? createSqliteVectorStore(db),
      documents: overrides.documents ?? createSqliteDocumentStore(db),
      close: () => db.close(),
    }
  }

  return {
    vectorStore: overrides.vectorStore ?? createMemoryVectorStore(),
    documents: overrides.documents ?? createMemoryDocumentStore(),
    close: () => {},
  }
}

export function createRagService(config: RagConfig = loadRagConfig(), overrides: RagServiceOverrides = {}): RagService {
  const embedder = overrides.embedder ?? createOllamaEmbedder({ baseUrl: config.ollamaUrl, model: config.embedModel })
  const generator = overrides.generator ?? createOllamaGenerator({ baseUrl: config.ollamaUrl, model: config.chatModel })
  const sessions = overrides.sessions ?? createMemorySessionStore()
  const stores = openStores(config, overrides)

  const indexer = createIndexer({
    documents: stores.documents,
    store: stores.vectorStore,
    embedder,
    chunking: {
      chunkSize: config.chunkSize,
      overlap: config.chunkOverlap,
      ...(config.chunkBoundaryWindow > 0 ? { boundaryWindow: config.chunkBoundaryWindow } : {}),
    },
    embedBatchSize: config.embedBatchSize,
    serviceTimeoutMs: config.serviceTimeoutMs,
  })
  const queue = createIngestQueue(indexer)
  const retriever = createRetriever({ embedder, store: stores.vectorStore, documents: stores.documents, config })
  const composer = createAnswerComposer({ sessions, retriever, generator, config })

  debugRag('rag.service', 'created', { provider: config.provider, embedModel: config.embedModel, chatModel: config.chatModel })

  return {
    async uploadDocument(input) {
      const documentId = String(input.id ?? '').trim() || randomUUID()
      const jobId = queue.enqueue({ id: documentId, sourceUri: String(input.sourceUri ?? ''), rawText: input.text })
      return { documentId, jobId }
    },

    indexDocument: (input) => indexer.indexDocument(input),
    deleteDocument: (documentId) => indexer.deleteDocument(documentId),

    async getDocument(documentId) {
      const id = String(documentId ?? '').trim()
      const found = id ? await stores.documents.get(id) : null
      if (!found) throw new RagError('document_not_found', `Document not found: ${id}`)
      return found
    },

    listDocuments: (filter) => stores.documents.list(filter),
    getIngestJob: (jobId) => queue.getJob(jobId),
    drainIngest: () => queue.drain(),

    retrieve: (query, k, filters) => retriever.retrieve(query, k, filters),

    async ask(sessionId, question, opts) {
      // Fail fast on an empty question before creating a session for it.
      if (!String(question ?? '').trim()) throw new RagError('invalid_input', 'question is required')
      const id = sessionId === undefined ? (await sessions.createSession()).id : sessionId
      return composer.answer(id, question, opts)
    },

    createSession: () => sessions.createSession(),
    getHistory: (sessionId, limit) => sessions.getHistory(sessionId, limit),
    clearSession: (sessionId) => sessions.clear(sessionId),
    deleteSession: (sessionId) => sessions.delete(sessionId),
    listSessions: () => sessions.listSessions(),
    sweepSessions: (now) =>
      sweepIdleSessions(sessions, { maxIdleMs: config.sessionMaxIdleMs, ...(now !== undefined ? { now } : {}) }),

    async health(): Promise<RagHealth> {
      const base: RagHealth = {
        ok: true,
        provider: config.provider,
        ...(config.provider === 'sqlite' ? { dbPath: config.dbPath } : {}),
        embedModel: config.embedModel,
        chatModel: config.chatModel,
      }

      try {
        const vec = await callService((signal) => embedder.embed('ping', signal), {
          timeoutMs: HEALTH_PROBE_TIMEOUT_MS,
          retries: 0,
          label: 'embeddings health probe',
        })
        if (vec.length === 0) {
          return { ...base, ok: false, error: { kind: 'service_unavailable', message: 'Embeddings returned an empty vector' } }
        }
        return base
      } catch (error: unknown) {
        const e = toRagError(error)
        return { ...base, ok: false, error: { kind: e.kind, message: e.message } }
      }
    },

    close: () => stores.close(),
  }
}
