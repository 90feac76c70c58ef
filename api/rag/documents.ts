import express from "express";
import { z } from "zod";

import type { RagService } from "./types.ts";
import { sendInvalidInput, sendRagError, zodIssuesToDetails } from "./httpErrors.ts";
import { debugRag } from "../../src/server/rag/log.ts";

const MAX_TEXT_CHARS = 2_000_000;

const uploadBodySchema = z.object({
  id: z.string().max(200).optional(),
  sourceUri: z.string().max(2000).optional(),
  text: z.string().max(MAX_TEXT_CHARS, "text is too large"),
});

const listQuerySchema = z.object({
  status: z.enum(["pending", "indexed", "failed", "deleted"]).optional(),
});

export interface CreateDocumentsRouterDeps {
  rag: RagService;
}

export function createDocumentsRouter({ rag }: CreateDocumentsRouterDeps): express.Router {
  const router = express.Router();

  // POST /api/documents -> 202 { documentId, jobId }
  router.post("/", async (req, res) => {
    const parsed = uploadBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendInvalidInput(res, zodIssuesToDetails(parsed.error.issues));
    }

    try {
      const accepted = await rag.uploadDocument({
        ...(parsed.data.id ? { id: parsed.data.id } : {}),
        sourceUri: parsed.data.sourceUri ?? "",
        text: parsed.data.text,
      });
      debugRag("api.documents", "ingest_enqueued", { ...accepted, chars: parsed.data.text.length });
      return res.status(202).json(accepted);
    } catch (error: unknown) {
      return sendRagError(res, error, "api.documents");
    }
  });

  // GET /api/documents?status=
  router.get("/", async (req, res) => {
    const parsed = listQuerySchema.safeParse(req.query ?? {});
    if (!parsed.success) {
      return sendInvalidInput(res, zodIssuesToDetails(parsed.error.issues));
    }

    try {
      const documents = await rag.listDocuments(parsed.data.status ? { status: parsed.data.status } : undefined);
      return res.status(200).json({ ok: true, documents });
    } catch (error: unknown) {
      return sendRagError(res, error, "api.documents");
    }
  });

  // GET /api/documents/jobs/:jobId
  router.get("/jobs/:jobId", (req, res) => {
    const status = rag.getIngestJob(String(req.params.jobId || "").trim());
    if (!status) {
      return res.status(404).json({ ok: false, error: { kind: "not_found", message: "Job not found" } });
    }
    return res.status(200).json(status);
  });

  // GET /api/documents/:id
  router.get("/:id", async (req, res) => {
    try {
      const document = await rag.getDocument(req.params.id);
      return res.status(200).json({ ok: true, document });
    } catch (error: unknown) {
      return sendRagError(res, error, "api.documents");
    }
  });

  // DELETE /api/documents/:id
  router.delete("/:id", async (req, res) => {
    try {
      const document = await rag.deleteDocument(req.params.id);
      return res.status(200).json({ ok: true, document });
    } catch (error: unknown) {
      return sendRagError(res, error, "api.documents");
    }
  });

  return router;
}
