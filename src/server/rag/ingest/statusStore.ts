import type { DocumentRecord, DocumentStatus } from "../types.ts";

export interface DocumentListFilter {
  status?: DocumentStatus;
}

/** Registry of documents and their committed chunk sets. */
export interface DocumentStore {
  get(id: string): Promise<DocumentRecord | null>;
  list(filter?: DocumentListFilter): Promise<DocumentRecord[]>;
  put(record: DocumentRecord): Promise<void>;
}

export function cloneDocument(record: DocumentRecord): DocumentRecord {
  return {
    id: record.id,
    sourceUri: record.sourceUri,
    uploadedAt: record.uploadedAt,
    updatedAt: record.updatedAt,
    status: record.status,
    chunkIds: [...record.chunkIds],
    ...(record.lastError ? { lastError: record.lastError } : {}),
  };
}

function byUploadThenId(a: DocumentRecord, b: DocumentRecord): number {
  if (a.uploadedAt !== b.uploadedAt) { return a.uploadedAt - b.uploadedAt; }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function createMemoryDocumentStore(): DocumentStore {
  const documents = new Map<string, DocumentRecord>();

  return {
    async get(id: string): Promise<DocumentRecord | null> {
      const found = documents.get(String(id || "").trim());
      return found ? cloneDocument(found) : null;
    },

    async list(filter?: DocumentListFilter): Promise<DocumentRecord[]> {
      const out: DocumentRecord[] = [];
      for (const d of documents.values()) {
        if (filter?.status && d.status !== filter.status) { continue; }
        out.push(cloneDocument(d));
      }
      return out.sort(byUploadThenId);
    },

    async put(record: DocumentRecord): Promise<void> {
      documents.set(record.id, cloneDocument(record));
    },
  };
}
