import express from "express";
import cors from "cors";

import { createRagService } from "./rag/index.ts";
import { createRagHealthHandler } from "./rag/health.ts";
import { createDocumentsRouter } from "./rag/documents.ts";
import { createSessionsRouter } from "./rag/sessions.ts";
import { createAskRouter } from "./rag/ask.ts";
import type { RagService } from "./rag/types.ts";

export interface CreateAppDeps {
  rag?: RagService;
}

export function createApp(deps: CreateAppDeps = {}): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  const rag = deps.rag ?? createRagService();

  // RAG health/status endpoint (read-only)
  app.get("/api/health", createRagHealthHandler({ rag }));

  // Documents: async ingestion, lookup, delete
  app.use("/api/documents", createDocumentsRouter({ rag }));

  // Conversation sessions
  app.use("/api/sessions", createSessionsRouter({ rag }));

  // Conversational ask (rewrite + retrieval + grounded answer)
  app.use("/api/ask", createAskRouter({ rag }));

  return app;
}
