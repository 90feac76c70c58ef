import type { Database } from "../../db/types.ts";
import type { DocumentListFilter, DocumentStore } from "../ingest/statusStore.ts";
import type { DocumentRecord, DocumentStatus } from "../types.ts";

const STATUSES: ReadonlySet<string> = new Set<DocumentStatus>(["pending", "indexed", "failed", "deleted"]);

function isDocumentStatus(value: unknown): value is DocumentStatus {
  return typeof value === "string" && STATUSES.has(value);
}

function parseChunkIds(json: unknown): string[] {
  if (typeof json !== "string" || !json) { return []; }
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === "string") : [];
  } catch {
    return [];
  }
}

function asRecord(raw: unknown): DocumentRecord | null {
  if (!raw || typeof raw !== "object") { return null; }
  const r = raw as Record<string, unknown>;

  const id = typeof r.id === "string" ? r.id : "";
  const sourceUri = typeof r.sourceUri === "string" ? r.sourceUri : "";
  const uploadedAt = typeof r.uploadedAt === "number" ? r.uploadedAt : Number(r.uploadedAt);
  const updatedAt = typeof r.updatedAt === "number" ? r.updatedAt : Number(r.updatedAt);
  const lastError = typeof r.lastError === "string" && r.lastError ? r.lastError : undefined;
  const status = r.status;

  if (!id || !isDocumentStatus(status)) { return null; }
  if (!Number.isFinite(uploadedAt) || !Number.isFinite(updatedAt)) { return null; }

  return {
    id,
    sourceUri,
    uploadedAt,
    updatedAt,
    status,
    chunkIds: parseChunkIds(r.chunkIdsJson),
    ...(lastError ? { lastError } : {}),
  };
}

export function createSqliteDocumentStore(db: Database): DocumentStore {
  const columns = "id, sourceUri, uploadedAt, updatedAt, status, chunkIdsJson, lastError";

  const upsertStmt = db.prepare(
    `INSERT INTO documents (${columns})
     VALUES (?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(id) DO UPDATE SET
       sourceUri = excluded.sourceUri,
       uploadedAt = excluded.uploadedAt,
       updatedAt = excluded.updatedAt,
       status = excluded.status,
       chunkIdsJson = excluded.chunkIdsJson,
       lastError = excluded.lastError`,
  );

  return {
    async get(id: string): Promise<DocumentRecord | null> {
      const row = db.prepare(`SELECT ${columns} FROM documents WHERE id = ?`).get(String(id || "").trim());
      return asRecord(row);
    },

    async list(filter?: DocumentListFilter): Promise<DocumentRecord[]> {
      const rows = filter?.status
        ? db.prepare(`SELECT ${columns} FROM documents WHERE status = ? ORDER BY uploadedAt ASC, id ASC`).all(filter.status)
        : db.prepare(`SELECT ${columns} FROM documents ORDER BY uploadedAt ASC, id ASC`).all();

      const out: DocumentRecord[] = [];
      for (const row of rows) {
        const parsed = asRecord(row);
        if (parsed) { out.push(parsed); }
      }
      return out;
    },

    async put(record: DocumentRecord): Promise<void> {
      upsertStmt.run(
        record.id,
        record.sourceUri,
        Math.floor(record.uploadedAt),
        Math.floor(record.updatedAt),
        record.status,
        JSON.stringify(record.chunkIds),
        record.lastError ?? null,
      );
    },
  };
}
