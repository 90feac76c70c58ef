export type RagErrorKind =
  | "invalid_config"
  | "invalid_input"
  | "session_not_found"
  | "session_deleted"
  | "document_not_found"
  | "indexing_failed"
  | "generation_failed"
  | "service_unavailable"
  | "rate_limited"
  | "content_filtered"
  | "timeout"
  | "auth"
  | "aborted"
  | "unknown";

const KNOWN_KINDS: ReadonlySet<string> = new Set<RagErrorKind>([
  "invalid_config",
  "invalid_input",
  "session_not_found",
  "session_deleted",
  "document_not_found",
  "indexing_failed",
  "generation_failed",
  "service_unavailable",
  "rate_limited",
  "content_filtered",
  "timeout",
  "auth",
  "aborted",
  "unknown",
]);

const TRANSIENT_KINDS: ReadonlySet<RagErrorKind> = new Set<RagErrorKind>([
  "service_unavailable",
  "rate_limited",
  "timeout",
]);

export class RagError extends Error {
  readonly kind: RagErrorKind;

  constructor(kind: RagErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RagError";
    this.kind = kind;
  }

  toJSON(): { kind: RagErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}

function isRagErrorKind(value: unknown): value is RagErrorKind {
  return typeof value === "string" && KNOWN_KINDS.has(value);
}

export function toRagError(error: unknown): RagError {
  if (error instanceof RagError) { return error; }

  if (error && typeof error === "object") {
    const kind = (error as { kind?: unknown }).kind;
    const message = (error as { message?: unknown }).message;
    if (isRagErrorKind(kind) && typeof message === "string") {
      return new RagError(kind, message, { cause: error });
    }
  }

  if (error instanceof Error) {
    if (error.name === "AbortError") {
      return new RagError("aborted", error.message || "Operation aborted", { cause: error });
    }
    return new RagError("unknown", error.message || "Unknown error", { cause: error });
  }

  return new RagError("unknown", "Unknown error", { cause: error });
}

export function isTransientError(error: unknown): boolean {
  return TRANSIENT_KINDS.has(toRagError(error).kind);
}

export function invalidConfig(message: string): RagError {
  return new RagError("invalid_config", message);
}
