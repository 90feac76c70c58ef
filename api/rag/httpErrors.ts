import type express from "express";
import type { ZodIssue } from "zod";

import { toRagError, type RagErrorKind } from "../../src/server/rag/errors.ts";
import { logRagError } from "../../src/server/rag/log.ts";

export interface FieldIssue {
  field: string;
  message: string;
}

export function statusForKind(kind: RagErrorKind): number {
  switch (kind) {
    case "invalid_input":
    case "invalid_config":
      return 400;
    case "session_not_found":
    case "document_not_found":
      return 404;
    case "session_deleted":
      return 410;
    case "generation_failed":
    case "indexing_failed":
    case "service_unavailable":
    case "rate_limited":
    case "content_filtered":
    case "timeout":
    case "auth":
      return 502;
    case "aborted":
    case "unknown":
      return 500;
  }
}

export function zodIssuesToDetails(issues: readonly ZodIssue[]): FieldIssue[] {
  return issues.map((i) => ({
    field: i.path.length ? i.path.map(String).join(".") : "input",
    message: String(i.message || "Invalid value"),
  }));
}

export function sendInvalidInput(res: express.Response, details: FieldIssue[]): express.Response {
  return res.status(400).json({
    ok: false,
    error: { kind: "invalid_input", message: details[0]?.message || "Invalid input", details },
  });
}

export function sendRagError(res: express.Response, error: unknown, scope: string): express.Response {
  const e = toRagError(error);
  const status = statusForKind(e.kind);
  if (status >= 500) {
    logRagError(scope, `${e.kind}: ${e.message}`);
  }
  return res.status(status).json({ ok: false, error: { kind: e.kind, message: e.message } });
}
