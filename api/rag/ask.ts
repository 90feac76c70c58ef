import express from "express";
import { z } from "zod";

import type { RagService } from "./types.ts";
import { sendInvalidInput, sendRagError, zodIssuesToDetails } from "./httpErrors.ts";

const askBodySchema = z.object({
  sessionId: z.string().min(1).optional(),
  question: z.string().max(4000, "question is too long"),
  topK: z.number().int().positive().optional(),
  documentIds: z.array(z.string()).optional(),
});

export interface CreateAskRouterDeps {
  rag: RagService;
}

export function createAskRouter({ rag }: CreateAskRouterDeps): express.Router {
  const router = express.Router();

  // POST /api/ask
  router.post("/", async (req, res) => {
    const parsed = askBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendInvalidInput(res, zodIssuesToDetails(parsed.error.issues));
    }

    const question = parsed.data.question.trim();
    if (!question) {
      return sendInvalidInput(res, [{ field: "question", message: "Question is required" }]);
    }

    const documentIds = parsed.data.documentIds?.map((d) => d.trim()).filter(Boolean);

    try {
      const result = await rag.ask(parsed.data.sessionId, question, {
        ...(parsed.data.topK !== undefined ? { k: parsed.data.topK } : {}),
        ...(documentIds && documentIds.length ? { filters: { documentIds } } : {}),
      });
      return res.status(200).json(result);
    } catch (error: unknown) {
      return sendRagError(res, error, "api.ask");
    }
  });

  return router;
}
