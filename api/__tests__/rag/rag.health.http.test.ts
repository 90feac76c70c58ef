import { describe, it, expect } from "vitest";
import request from "supertest";

import { createApp } from "../../app.ts";
import { createRagService } from "../../rag/index.ts";
import { RagError } from "../../../src/server/rag/errors.ts";
import { createConceptEmbedder, createScriptedGenerator, testConfig } from "../helpers/fakes.ts";

describe("health HTTP API", () => {
  it("returns ok:true when the embedder answers the probe", async () => {
    const embedder = createConceptEmbedder();
    const rag = createRagService(testConfig(), { embedder, generator: createScriptedGenerator() });
    const app = createApp({ rag });

    const res = await request(app).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, provider: "memory", embedModel: "test-embed", chatModel: "test-chat" });
    expect(embedder.embed).toHaveBeenCalledTimes(1);
  });

  it("reports the database path for the sqlite provider", async () => {
    const rag = createRagService(testConfig({ provider: "sqlite" }), {
      embedder: createConceptEmbedder(),
      generator: createScriptedGenerator(),
    });
    try {
      const res = await request(createApp({ rag })).get("/api/health");
      expect(res.body.ok).toBe(true);
      expect(res.body.provider).toBe("sqlite");
      expect(res.body.dbPath).toBe(":memory:");
    } finally {
      rag.close();
    }
  });

  it("returns ok:false with the error when the probe fails", async () => {
    const embedder = createConceptEmbedder();
    embedder.embed.mockRejectedValue(new RagError("service_unavailable", "Ollama unreachable"));
    const rag = createRagService(testConfig(), { embedder, generator: createScriptedGenerator() });

    const res = await request(createApp({ rag })).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(false);
    expect(res.body.error).toEqual({ kind: "service_unavailable", message: "Ollama unreachable" });
  });

  it("caches the probe between requests", async () => {
    const embedder = createConceptEmbedder();
    const rag = createRagService(testConfig(), { embedder, generator: createScriptedGenerator() });
    const app = createApp({ rag });

    await request(app).get("/api/health");
    await request(app).get("/api/health");

    expect(embedder.embed).toHaveBeenCalledTimes(1);
  });
});
