export type EmbeddingVector = number[];

export type DocumentStatus = "pending" | "indexed" | "failed" | "deleted";

export interface DocumentInput {
  id: string;
  sourceUri: string;
  rawText: string;
  uploadedAt?: number;
}

export interface DocumentRecord {
  id: string;
  sourceUri: string;
  uploadedAt: number;
  updatedAt: number;
  status: DocumentStatus;
  /** Committed chunk ids; the only ids the retriever will surface. */
  chunkIds: string[];
  lastError?: string;
}

export interface ChunkDraft {
  sequenceIndex: number;
  text: string;
  /** Leading characters duplicated from the previous chunk. */
  overlapChars: number;
  charStart: number;
  charEnd: number;
}

export interface ChunkMetadata {
  documentId: string;
  sequenceIndex: number;
  text: string;
}

export interface VectorRecord {
  id: string;
  vector: EmbeddingVector;
  metadata: ChunkMetadata;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: ChunkMetadata;
}

export interface VectorSearchFilter {
  documentIds?: string[];
}

export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<EmbeddingVector[]>;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

export interface Generator {
  generate(prompt: string, opts?: GenerateOptions): Promise<string>;
}

export interface VectorStore {
  /** All-or-nothing per call: a failed upsert leaves none of the records visible. */
  upsert(records: VectorRecord[]): Promise<void>;
  search(vector: EmbeddingVector, k: number, filter?: VectorSearchFilter): Promise<VectorMatch[]>;
  /** Stored records for the given ids; unknown ids are skipped. */
  get(ids: string[]): Promise<VectorRecord[]>;
  delete(ids: string[]): Promise<number>;
}

export interface RetrievedChunk {
  chunkId: string;
  documentId: string;
  text: string;
  score: number;
  sequenceIndex: number;
  vectorScore: number;
  lexicalScore?: number;
}

export interface RetrievalResult {
  query: string;
  items: RetrievedChunk[];
  /** Empty or low-confidence grounding. */
  degraded: boolean;
}

export type TurnRole = "user" | "assistant";

export interface Turn {
  role: TurnRole;
  content: string;
  timestamp: number;
  retrievedChunkIds?: readonly string[];
}

export type SessionStatus = "active" | "cleared" | "deleted";

export interface Session {
  id: string;
  createdAt: number;
  lastActiveAt: number;
  status: SessionStatus;
  turnCount: number;
}
