import type { AnswerOptions, AnswerResult } from "../../src/server/rag/answer/answerComposer.ts";
import type { RagProvider } from "../../src/server/rag/config.ts";
import type { DocumentListFilter } from "../../src/server/rag/ingest/statusStore.ts";
import type { IndexResult } from "../../src/server/rag/ingest/ingestDocument.ts";
import type { IngestJobStatus } from "../../src/server/rag/ingest/queue.ts";
import type { RetrievalResult, DocumentInput, DocumentRecord, Session, Turn } from "../../src/server/rag/types.ts";
import type { RetrieveFilters } from "../../src/server/rag/retrieve/retriever.ts";

export interface UploadDocumentInput {
  /** Generated when omitted. */
  id?: string;
  sourceUri: string;
  text: string;
}

export interface UploadAccepted {
  documentId: string;
  jobId: string;
}

export interface RagHealth {
  ok: boolean;
  provider: RagProvider;
  dbPath?: string;
  embedModel: string;
  chatModel: string;
  error?: { kind: string; message: string };
}

export interface RagService {
  uploadDocument(input: UploadDocumentInput): Promise<UploadAccepted>;
  indexDocument(input: DocumentInput): Promise<IndexResult>;
  deleteDocument(documentId: string): Promise<DocumentRecord>;
  getDocument(documentId: string): Promise<DocumentRecord>;
  listDocuments(filter?: DocumentListFilter): Promise<DocumentRecord[]>;
  getIngestJob(jobId: string): IngestJobStatus | null;
  /** Waits for queued ingestion to finish. */
  drainIngest(): Promise<void>;

  retrieve(query: string, k?: number, filters?: RetrieveFilters): Promise<RetrievalResult>;
  /** Starts a new session when sessionId is undefined. */
  ask(sessionId: string | undefined, question: string, opts?: AnswerOptions): Promise<AnswerResult>;

  createSession(): Promise<Session>;
  getHistory(sessionId: string, limit?: number): Promise<Turn[]>;
  clearSession(sessionId: string): Promise<Session>;
  deleteSession(sessionId: string): Promise<Session>;
  listSessions(): Promise<Session[]>;
  sweepSessions(now?: number): Promise<string[]>;

  health(): Promise<RagHealth>;
  close(): void;
}
