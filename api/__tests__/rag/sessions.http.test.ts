import { describe, it, expect } from "vitest";
import request from "supertest";

import { createApp } from "../../app.ts";
import { createRagService } from "../../rag/index.ts";
import { createMemorySessionStore } from "../../../src/server/rag/conversation/sessionStore.ts";
import { createConceptEmbedder, createScriptedGenerator, testConfig } from "../helpers/fakes.ts";

function makeApp() {
  let seq = 0;
  const sessions = createMemorySessionStore({ newId: () => `s${++seq}`, now: () => 1000 });
  const rag = createRagService(testConfig(), {
    embedder: createConceptEmbedder(),
    generator: createScriptedGenerator(),
    sessions,
  });
  return { app: createApp({ rag }), sessions };
}

describe("sessions HTTP API", () => {
  it("creates and lists sessions", async () => {
    const { app } = makeApp();

    const created = await request(app).post("/api/sessions");
    expect(created.status).toBe(201);
    expect(created.body).toEqual({
      ok: true,
      session: { id: "s1", createdAt: 1000, lastActiveAt: 1000, status: "active", turnCount: 0 },
    });

    await request(app).post("/api/sessions");
    const listed = await request(app).get("/api/sessions");
    expect(listed.status).toBe(200);
    expect(listed.body.sessions.map((s: { id: string }) => s.id)).toEqual(["s1", "s2"]);
  });

  it("returns history, newest turns last, honouring limit", async () => {
    const { app, sessions } = makeApp();
    const { id } = await sessions.createSession();
    await sessions.appendTurns(id, [
      { role: "user", content: "one" },
      { role: "assistant", content: "two" },
      { role: "user", content: "three" },
    ]);

    const all = await request(app).get(`/api/sessions/${id}/history`);
    expect(all.status).toBe(200);
    expect(all.body.sessionId).toBe("s1");
    expect(all.body.turns.map((t: { content: string }) => t.content)).toEqual(["one", "two", "three"]);

    const last = await request(app).get(`/api/sessions/${id}/history?limit=2`);
    expect(last.body.turns.map((t: { content: string }) => t.content)).toEqual(["two", "three"]);

    const bad = await request(app).get(`/api/sessions/${id}/history?limit=abc`);
    expect(bad.status).toBe(400);
    expect(bad.body.error.details).toEqual([{ field: "limit", message: "limit must be a non-negative integer" }]);
  });

  it("clears a session's history but keeps it usable", async () => {
    const { app, sessions } = makeApp();
    const { id } = await sessions.createSession();
    await sessions.appendTurns(id, [{ role: "user", content: "hello" }]);

    const cleared = await request(app).post(`/api/sessions/${id}/clear`);
    expect(cleared.status).toBe(200);
    expect(cleared.body.session.turnCount).toBe(0);

    const history = await request(app).get(`/api/sessions/${id}/history`);
    expect(history.status).toBe(200);
    expect(history.body.turns).toEqual([]);
  });

  it("deletes a session and answers 410 afterwards", async () => {
    const { app, sessions } = makeApp();
    const { id } = await sessions.createSession();

    const deleted = await request(app).delete(`/api/sessions/${id}`);
    expect(deleted.status).toBe(200);
    expect(deleted.body.session.status).toBe("deleted");

    const history = await request(app).get(`/api/sessions/${id}/history`);
    expect(history.status).toBe(410);
    expect(history.body.error.kind).toBe("session_deleted");
  });

  it("answers 404 for unknown sessions", async () => {
    const { app } = makeApp();

    const res = await request(app).get("/api/sessions/nope/history");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ ok: false, error: { kind: "session_not_found", message: expect.any(String) } });
  });
});
