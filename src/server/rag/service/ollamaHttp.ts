import { RagError, type RagErrorKind } from "../errors.ts";
import { toOneLine } from "../log.ts";

export function sanitizeBaseUrl(url: string): string {
  return String(url || "").trim().replace(/\/+$/, "");
}

function describeResponseBody(body: unknown): string {
  try {
    return toOneLine(JSON.stringify(body)).slice(0, 300);
  } catch {
    return "";
  }
}

export function kindForHttpStatus(status: number): RagErrorKind {
  if (status === 429) { return "rate_limited"; }
  if (status === 401 || status === 403) { return "auth"; }
  if (status === 408 || status >= 500) { return "service_unavailable"; }
  return "invalid_input";
}

/**
 * POSTs JSON to an Ollama endpoint and returns the parsed body.
 * Aborts are rethrown untouched so the caller can tell timeout from cancel.
 */
export async function postOllamaJson(
  baseUrl: string,
  route: string,
  body: Record<string, unknown>,
  signal: AbortSignal | undefined,
  label: string,
): Promise<unknown> {
  let resp: Response;
  try {
    resp = await fetch(`${sanitizeBaseUrl(baseUrl)}${route}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      ...(signal ? { signal } : {}),
    });
  } catch (error: unknown) {
    if (signal?.aborted) { throw error; }
    const message = error instanceof Error ? error.message : String(error ?? "unknown error");
    throw new RagError("service_unavailable", `${label} unreachable at ${sanitizeBaseUrl(baseUrl)}: ${message}`, {
      cause: error,
    });
  }

  const json: unknown = await resp.json().catch(() => null);

  if (!resp.ok) {
    const suffix = json ? ` body=${describeResponseBody(json)}` : "";
    throw new RagError(kindForHttpStatus(resp.status), `${label} failed (HTTP ${resp.status}).${suffix}`);
  }

  return json;
}
