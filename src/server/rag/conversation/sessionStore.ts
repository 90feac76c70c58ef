import { randomUUID } from "node:crypto";

import { RagError } from "../errors.ts";
import type { Session, SessionStatus, Turn, TurnRole } from "../types.ts";
import { KeyedMutex } from "./keyedMutex.ts";

export interface TurnInput {
  role: TurnRole;
  content: string;
  timestamp?: number;
  retrievedChunkIds?: readonly string[];
}

export interface ConversationStore {
  createSession(): Promise<Session>;
  getSession(sessionId: string): Promise<Session>;
  /** Oldest first; with a limit only the most recent `limit` turns are kept. */
  getHistory(sessionId: string, limit?: number): Promise<Turn[]>;
  appendTurn(sessionId: string, turn: TurnInput): Promise<Turn>;
  /** Appends every turn or none of them, contiguously. */
  appendTurns(sessionId: string, turns: TurnInput[]): Promise<Turn[]>;
  clear(sessionId: string): Promise<Session>;
  delete(sessionId: string): Promise<Session>;
  /** Deletes the session only if it has seen no activity since `cutoff`; null when it was kept. */
  deleteIfIdleSince(sessionId: string, cutoff: number): Promise<Session | null>;
  listSessions(): Promise<Session[]>;
}

export interface MemorySessionStoreOptions {
  now?: () => number;
  newId?: () => string;
}

interface SessionState {
  id: string;
  createdAt: number;
  lastActiveAt: number;
  status: SessionStatus;
  turns: Turn[];
}

function snapshot(state: SessionState): Session {
  return {
    id: state.id,
    createdAt: state.createdAt,
    lastActiveAt: state.lastActiveAt,
    status: state.status,
    turnCount: state.turns.length,
  };
}

function freezeTurn(input: TurnInput, fallbackTimestamp: number): Turn {
  if (input.role !== "user" && input.role !== "assistant") {
    throw new RagError("invalid_input", `Unsupported turn role: ${String(input.role)}`);
  }
  if (typeof input.content !== "string") {
    throw new RagError("invalid_input", "Turn content must be a string");
  }

  const timestamp = typeof input.timestamp === "number" && Number.isFinite(input.timestamp)
    ? input.timestamp
    : fallbackTimestamp;

  const turn: Turn = {
    role: input.role,
    content: input.content,
    timestamp,
    ...(input.retrievedChunkIds ? { retrievedChunkIds: Object.freeze([...input.retrievedChunkIds]) } : {}),
  };
  return Object.freeze(turn);
}

function normalizeLimit(limit: number | undefined): number | undefined {
  if (limit === undefined) { return undefined; }
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RagError("invalid_input", `History limit must be a non-negative integer (got ${String(limit)})`);
  }
  return limit;
}

export function createMemorySessionStore(opts?: MemorySessionStoreOptions): ConversationStore {
  const now = opts?.now ?? Date.now;
  const newId = opts?.newId ?? randomUUID;
  const sessions = new Map<string, SessionState>();
  const locks = new KeyedMutex();

  function requireLive(sessionId: string): SessionState {
    const state = sessions.get(sessionId);
    if (!state) {
      throw new RagError("session_not_found", `Session not found: ${sessionId}`);
    }
    if (state.status === "deleted") {
      throw new RagError("session_deleted", `Session has been deleted: ${sessionId}`);
    }
    return state;
  }

  function appendLocked(sessionId: string, inputs: TurnInput[]): Promise<Turn[]> {
    return locks.runExclusive(sessionId, () => {
      const state = requireLive(sessionId);
      const at = now();
      const turns = inputs.map((t) => freezeTurn(t, at));

      state.turns.push(...turns);
      state.lastActiveAt = at;
      state.status = "active";
      return turns;
    });
  }

  return {
    async createSession(): Promise<Session> {
      const at = now();
      let id = newId();
      while (sessions.has(id)) { id = newId(); }

      const state: SessionState = { id, createdAt: at, lastActiveAt: at, status: "active", turns: [] };
      sessions.set(id, state);
      return snapshot(state);
    },

    async getSession(sessionId: string): Promise<Session> {
      return snapshot(requireLive(sessionId));
    },

    async getHistory(sessionId: string, limit?: number): Promise<Turn[]> {
      const cap = normalizeLimit(limit);
      const { turns } = requireLive(sessionId);
      if (cap === undefined) { return [...turns]; }
      if (cap === 0) { return []; }
      return turns.slice(-cap);
    },

    async appendTurn(sessionId: string, turn: TurnInput): Promise<Turn> {
      const [appended] = await appendLocked(sessionId, [turn]);
      if (!appended) { throw new RagError("unknown", "Append produced no turn"); }
      return appended;
    },

    async appendTurns(sessionId: string, turns: TurnInput[]): Promise<Turn[]> {
      if (turns.length === 0) {
        requireLive(sessionId);
        return [];
      }
      return appendLocked(sessionId, turns);
    },

    async clear(sessionId: string): Promise<Session> {
      return locks.runExclusive(sessionId, () => {
        const state = requireLive(sessionId);
        state.turns = [];
        state.status = "cleared";
        state.lastActiveAt = now();
        return snapshot(state);
      });
    },

    async delete(sessionId: string): Promise<Session> {
      return locks.runExclusive(sessionId, () => {
        const state = requireLive(sessionId);
        state.turns = [];
        state.status = "deleted";
        state.lastActiveAt = now();
        return snapshot(state);
      });
    },

    async deleteIfIdleSince(sessionId: string, cutoff: number): Promise<Session | null> {
      return locks.runExclusive(sessionId, () => {
        const state = requireLive(sessionId);
        if (state.lastActiveAt >= cutoff) { return null; }
        state.turns = [];
        state.status = "deleted";
        state.lastActiveAt = now();
        return snapshot(state);
      });
    },

    async listSessions(): Promise<Session[]> {
      const out: Session[] = [];
      for (const state of sessions.values()) {
        if (state.status !== "deleted") { out.push(snapshot(state)); }
      }
      return out.sort((a, b) => a.createdAt - b.createdAt || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    },
  };
}
