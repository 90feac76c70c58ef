import express from "express";
import { z } from "zod";

import type { RagService } from "./types.ts";
import { sendInvalidInput, sendRagError, zodIssuesToDetails } from "./httpErrors.ts";

const historyQuerySchema = z.object({
  limit: z
    .string()
    .regex(/^\d+$/, "limit must be a non-negative integer")
    .optional(),
});

export interface CreateSessionsRouterDeps {
  rag: RagService;
}

export function createSessionsRouter({ rag }: CreateSessionsRouterDeps): express.Router {
  const router = express.Router();

  router.post("/", async (_req, res) => {
    try {
      const session = await rag.createSession();
      return res.status(201).json({ ok: true, session });
    } catch (error: unknown) {
      return sendRagError(res, error, "api.sessions");
    }
  });

  router.get("/", async (_req, res) => {
    try {
      const sessions = await rag.listSessions();
      return res.status(200).json({ ok: true, sessions });
    } catch (error: unknown) {
      return sendRagError(res, error, "api.sessions");
    }
  });

  // GET /api/sessions/:id/history?limit=
  router.get("/:id/history", async (req, res) => {
    const parsed = historyQuerySchema.safeParse(req.query ?? {});
    if (!parsed.success) {
      return sendInvalidInput(res, zodIssuesToDetails(parsed.error.issues));
    }

    const limit = parsed.data.limit !== undefined ? Number(parsed.data.limit) : undefined;
    try {
      const turns = await rag.getHistory(req.params.id, limit);
      return res.status(200).json({ ok: true, sessionId: req.params.id, turns });
    } catch (error: unknown) {
      return sendRagError(res, error, "api.sessions");
    }
  });

  router.post("/:id/clear", async (req, res) => {
    try {
      const session = await rag.clearSession(req.params.id);
      return res.status(200).json({ ok: true, session });
    } catch (error: unknown) {
      return sendRagError(res, error, "api.sessions");
    }
  });

  router.delete("/:id", async (req, res) => {
    try {
      const session = await rag.deleteSession(req.params.id);
      return res.status(200).json({ ok: true, session });
    } catch (error: unknown) {
      return sendRagError(res, error, "api.sessions");
    }
  });

  return router;
}
