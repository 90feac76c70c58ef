import type express from "express";

import type { RagHealth, RagService } from "./types.ts";

interface CachedProbe {
  atMs: number;
  value: RagHealth;
}

/** Read-only status endpoint; embedder probes are cached for ttlMs. */
export function createRagHealthHandler({ rag, ttlMs = 30_000 }: { rag: RagService; ttlMs?: number }): express.RequestHandler {
  let cached: CachedProbe | null = null;
  let inflight: Promise<RagHealth> | null = null;

  async function probe(): Promise<RagHealth> {
    if (cached && Date.now() - cached.atMs < ttlMs) { return cached.value; }
    if (inflight) { return inflight; }

    inflight = rag.health();
    try {
      const value = await inflight;
      cached = { atMs: Date.now(), value };
      return value;
    } finally {
      inflight = null;
    }
  }

  return async (_req, res) => {
    const health = await probe();
    // Always 200; callers read `ok`.
    return res.status(200).json(health);
  };
}
