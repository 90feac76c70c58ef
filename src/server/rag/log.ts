function isDebugRagEnabled(): boolean {
  const raw = String(process.env.DEBUG_RAG || "").trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

function isTestEnv(): boolean {
  return process.env.NODE_ENV === "test";
}

export function toOneLine(input: string): string {
  return String(input || "")
    .replace(/[\r\n\t]+/g, " ")
    .replace(/\s{2,}/g, " ")
    .trim();
}

export function debugRag(scope: string, event: string, data: Record<string, unknown> = {}): void {
  if (!isDebugRagEnabled()) { return; }
  try {
    console.log(JSON.stringify({ tag: "rag", scope, event, ...data }));
  } catch (error: unknown) {
    console.log(`[${scope}] ${event} (unserializable debug payload: ${String(error)})`);
  }
}

export function logRagWarn(scope: string, message: string): void {
  if (isTestEnv()) { return; }
  console.warn(`[${scope}] ${toOneLine(message)}`);
}

export function logRagError(scope: string, message: string): void {
  if (isTestEnv()) { return; }
  console.error(`[${scope}] ${toOneLine(message)}`);
}
