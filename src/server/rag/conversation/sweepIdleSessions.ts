import { toRagError } from "../errors.ts";
import { debugRag, logRagWarn } from "../log.ts";
import type { ConversationStore } from "./sessionStore.ts";

export interface SweepOptions {
  maxIdleMs: number;
  now?: number;
}

/**
 * Expiry policy for sessions: deletes every live session whose last activity
 * is older than maxIdleMs. Returns the deleted ids.
 */
export async function sweepIdleSessions(store: ConversationStore, opts: SweepOptions): Promise<string[]> {
  const now = opts.now ?? Date.now();
  const cutoff = now - Math.max(0, opts.maxIdleMs);

  const deleted: string[] = [];
  for (const session of await store.listSessions()) {
    if (session.lastActiveAt >= cutoff) { continue; }

    try {
      // Activity since the listing keeps the session alive.
      const removed = await store.deleteIfIdleSince(session.id, cutoff);
      if (removed) { deleted.push(session.id); }
    } catch (error: unknown) {
      // Deleted concurrently by someone else.
      const e = toRagError(error);
      if (e.kind !== "session_deleted" && e.kind !== "session_not_found") { throw e; }
      logRagWarn("rag.sessions", `sweep skipped ${session.id}: ${e.message}`);
    }
  }

  debugRag("rag.sessions", "sweep", { cutoff, deleted: deleted.length });
  return deleted;
}

/** Runs `sweep` every intervalMs without holding the process open; the returned function stops it. */
export function startSessionSweeper(
  sweep: () => Promise<unknown>,
  opts: { intervalMs: number },
): () => void {
  const timer = setInterval(() => {
    sweep().catch((error: unknown) => {
      logRagWarn("rag.sessions", `sweep failed: ${toRagError(error).message}`);
    });
  }, Math.max(1000, opts.intervalMs));
  timer.unref();

  return () => clearInterval(timer);
}
