import { sanitizeBaseUrl } from './service/ollamaHttp.ts'

export type RagProvider = 'memory' | 'sqlite'

export interface RagConfig {
  provider: RagProvider
  dbPath: string
  chunkSize: number
  chunkOverlap: number
  /** 0 lets the chunker derive the lookback window from chunkSize. */
  chunkBoundaryWindow: number
  embedBatchSize: number
  topK: number
  maxTopK: number
  minScore: number
  hybrid: boolean
  vectorWeight: number
  rewriteExchanges: number
  historyTurns: number
  historyMaxChars: number
  serviceTimeoutMs: number
  sessionMaxIdleMs: number
  ollamaUrl: string
  embedModel: string
  chatModel: string
}

type Env = Record<string, string | undefined>

export function parseIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name]
  const n = raw ? Number(raw) : NaN
  return Number.isFinite(n) ? Math.floor(n) : fallback
}

export function parseFloatEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name]
  const n = raw ? Number(raw) : NaN
  return Number.isFinite(n) ? n : fallback
}

export function isEnvTrue(value: unknown): boolean {
  const v = String(value ?? '').trim().toLowerCase()
  return v === '1' || v === 'true' || v === 'yes' || v === 'on'
}

function parseProvider(raw: string | undefined): RagProvider {
  return String(raw || '').trim().toLowerCase() === 'sqlite' ? 'sqlite' : 'memory'
}

export function loadRagConfig(env: Env = process.env): RagConfig {
  const vectorWeight = parseFloatEnv(env, 'RAG_VECTOR_WEIGHT', 0.7)

  return Object.freeze({
    provider: parseProvider(env.RAG_PROVIDER),
    dbPath: String(env.RAG_DB_PATH || 'data/rag.sqlite').trim(),
    chunkSize: parseIntEnv(env, 'RAG_CHUNK_SIZE_CHARS', 1000),
    chunkOverlap: parseIntEnv(env, 'RAG_CHUNK_OVERLAP_CHARS', 200),
    chunkBoundaryWindow: Math.max(0, parseIntEnv(env, 'RAG_CHUNK_BOUNDARY_WINDOW', 0)),
    embedBatchSize: Math.max(1, parseIntEnv(env, 'RAG_EMBED_BATCH_SIZE', 32)),
    topK: parseIntEnv(env, 'RAG_TOP_K', 5),
    maxTopK: Math.max(1, parseIntEnv(env, 'RAG_MAX_TOP_K', 50)),
    minScore: parseFloatEnv(env, 'RAG_MIN_SCORE', 0.1),
    hybrid: isEnvTrue(env.RAG_HYBRID),
    vectorWeight: Math.min(1, Math.max(0, vectorWeight)),
    rewriteExchanges: Math.max(0, parseIntEnv(env, 'RAG_REWRITE_TURNS', 3)),
    historyTurns: Math.max(0, parseIntEnv(env, 'RAG_HISTORY_TURNS', 6)),
    historyMaxChars: Math.max(0, parseIntEnv(env, 'RAG_HISTORY_MAX_CHARS', 4000)),
    serviceTimeoutMs: Math.max(1, parseIntEnv(env, 'RAG_SERVICE_TIMEOUT_MS', 30_000)),
    sessionMaxIdleMs: Math.max(1, parseIntEnv(env, 'RAG_SESSION_MAX_IDLE_MS', 86_400_000)),
    ollamaUrl: sanitizeBaseUrl(env.OLLAMA_URL || 'http://127.0.0.1:11434'),
    embedModel: String(env.OLLAMA_EMBED_MODEL || 'nomic-embed-text').trim(),
    chatModel: String(env.OLLAMA_CHAT_MODEL || env.OLLAMA_MODEL || 'llama3.1').trim(),
  })
}
