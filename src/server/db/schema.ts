export interface Migration {
  id: string
  sql: string
}

export const MIGRATIONS: Migration[] = [
  {
    id: '001_documents',
    sql: `
CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  sourceUri TEXT NOT NULL,
  uploadedAt INTEGER NOT NULL,
  updatedAt INTEGER NOT NULL,
  status TEXT NOT NULL,
  chunkIdsJson TEXT NOT NULL,
  lastError TEXT
);
CREATE INDEX IF NOT EXISTS documents_status ON documents (status);
`.trim(),
  },
  {
    id: '002_chunk_vectors',
    sql: `
CREATE TABLE IF NOT EXISTS chunk_vectors (
  id TEXT PRIMARY KEY,
  documentId TEXT NOT NULL,
  sequenceIndex INTEGER NOT NULL,
  text TEXT NOT NULL,
  embeddingJson TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS chunk_vectors_documentId ON chunk_vectors (documentId);
`.trim(),
  },
]
