import { toRagError } from '../errors.ts'
import { debugRag, logRagWarn } from '../log.ts'
import { buildRewritePrompt } from '../prompt/rewritePrompt.ts'
import { callService } from '../service/callService.ts'
import type { Generator, Turn } from '../types.ts'

export interface RewriteInput {
  generator: Generator
  history: readonly Turn[]
  utterance: string
  /** User/assistant exchanges of history the rewrite may look at. */
  maxExchanges: number
  timeoutMs: number
  signal?: AbortSignal
}

export interface RewriteResult {
  query: string
  rewritten: boolean
  fallback?: 'empty_output' | 'service_error'
}

const LABEL_RE = /^(?:standalone\s+question|rewritten\s+question|question)\s*:\s*/i
const QUOTES_RE = /^["'“‘`](.*)["'”’`]$/s

export function cleanRewriteOutput(raw: string): string {
  const firstLine = String(raw ?? '')
    .trim()
    .replace(LABEL_RE, '')
    .split(/\r?\n/)
    .find((line) => line.trim().length > 0) ?? ''

  let out = firstLine.trim()
  const quoted = QUOTES_RE.exec(out)
  if (quoted) out = (quoted[1] ?? '').trim()
  return out
}

export async function rewriteQuery(input: RewriteInput): Promise<RewriteResult> {
  const utterance = String(input.utterance ?? '').trim()
  const window = Math.max(0, Math.floor(input.maxExchanges)) * 2
  const history = window > 0 ? input.history.slice(-window) : []

  if (history.length === 0) {
    return { query: utterance, rewritten: false }
  }

  const prompt = buildRewritePrompt(history, utterance)

  let raw: string
  try {
    raw = await callService((signal) => input.generator.generate(prompt, { signal }), {
      timeoutMs: input.timeoutMs,
      retries: 1,
      label: 'query rewrite',
      ...(input.signal ? { signal: input.signal } : {}),
    })
  } catch (error: unknown) {
    const e = toRagError(error)
    // Caller cancellation propagates.
    if (e.kind === 'aborted') throw e
    logRagWarn('rag.rewrite', `falling back to raw utterance: ${e.kind}: ${e.message}`)
    return { query: utterance, rewritten: false, fallback: 'service_error' }
  }

  const cleaned = cleanRewriteOutput(raw)
  if (!cleaned) {
    logRagWarn('rag.rewrite', 'empty rewrite output, falling back to raw utterance')
    return { query: utterance, rewritten: false, fallback: 'empty_output' }
  }

  debugRag('rag.rewrite', 'rewritten', { utterance, query: cleaned })
  return { query: cleaned, rewritten: cleaned !== utterance }
}
