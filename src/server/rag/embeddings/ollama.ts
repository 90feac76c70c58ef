import { RagError } from '../errors.ts'
import { postOllamaJson } from '../service/ollamaHttp.ts'
import type { Embedder, EmbeddingVector } from '../types.ts'

export type OllamaEmbedderOptions = { baseUrl: string; model: string }

function isFiniteNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === 'number' && Number.isFinite(v))
}

function prepareInputs(texts: string[]): string[] {
  if (!Array.isArray(texts) || texts.length === 0) {
    throw new RagError('invalid_input', 'embedBatch requires a non-empty array')
  }

  return texts.map((t, i) => {
    const s = String(t ?? '').trim()
    if (!s) throw new RagError('invalid_input', `Embedding input at index ${i} is empty`)
    return s
  })
}

function readVectors(json: unknown, expected: number, model: string): EmbeddingVector[] {
  const embeddings =
    json && typeof json === 'object'
      ? (json as { embeddings?: unknown }).embeddings
      : undefined

  if (!Array.isArray(embeddings)) {
    throw new RagError(
      'invalid_input',
      `Ollama /api/embed did not return an embeddings array for model "${model}". ` +
        `Verify the model supports embeddings.`,
    )
  }

  if (embeddings.length !== expected) {
    throw new RagError(
      'service_unavailable',
      `Ollama embeddings count mismatch: expected ${expected}, got ${embeddings.length}`,
    )
  }

  const vectors: EmbeddingVector[] = []
  let dim = 0
  for (let i = 0; i < embeddings.length; i++) {
    const v: unknown = embeddings[i]
    if (!isFiniteNumberArray(v)) {
      throw new RagError('invalid_input', `Ollama embeddings response at index ${i} is not a numeric vector`)
    }
    if (dim && v.length !== dim) {
      throw new RagError('invalid_input', `Ollama embeddings returned inconsistent dimensions (got ${v.length} vs ${dim})`)
    }
    dim = v.length
    vectors.push(v)
  }

  return vectors
}

export function createOllamaEmbedder({ baseUrl, model }: OllamaEmbedderOptions): Embedder {
  const configuredModel = String(model || '').trim()
  if (!configuredModel) throw new RagError('invalid_config', 'OLLAMA_EMBED_MODEL is empty')

  async function embedBatch(texts: string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
    const prepared = prepareInputs(texts)
    const json = await postOllamaJson(
      baseUrl,
      '/api/embed',
      { model: configuredModel, input: prepared },
      signal,
      `Ollama embeddings (model "${configuredModel}")`,
    )
    return readVectors(json, prepared.length, configuredModel)
  }

  return {
    embedBatch,

    async embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector> {
      const [vec] = await embedBatch([text], signal)
      if (!vec) throw new RagError('service_unavailable', 'Ollama embeddings returned no vector for query')
      return vec
    },
  }
}
