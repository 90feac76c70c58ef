import { describe, expect, it } from "vitest";

import type { RagConfig } from "../../../src/server/rag/config.ts";
import { RagError } from "../../../src/server/rag/errors.ts";
import { createIndexer } from "../../../src/server/rag/ingest/ingestDocument.ts";
import { createMemoryDocumentStore } from "../../../src/server/rag/ingest/statusStore.ts";
import { lexicalScore, tokenizeQuery } from "../../../src/server/rag/retrieve/lexical.ts";
import { compareRetrieved, createRetriever } from "../../../src/server/rag/retrieve/retriever.ts";
import { createMemoryVectorStore } from "../../../src/server/rag/store/memoryVectorStore.ts";
import type { RetrievedChunk } from "../../../src/server/rag/types.ts";
import { PARIS_TEXT, createConceptEmbedder, testConfig } from "../helpers/fakes.ts";

async function setup(overrides: Partial<RagConfig> = {}) {
  const config = testConfig(overrides);
  const documents = createMemoryDocumentStore();
  const store = createMemoryVectorStore();
  const embedder = createConceptEmbedder();
  const indexer = createIndexer({
    documents,
    store,
    embedder,
    chunking: { chunkSize: config.chunkSize, overlap: config.chunkOverlap },
    embedBatchSize: config.embedBatchSize,
    serviceTimeoutMs: config.serviceTimeoutMs,
    newGeneration: () => "g1",
  });
  const retriever = createRetriever({ embedder, store, documents, config });
  return { documents, store, embedder, indexer, retriever };
}

async function kindOf(p: Promise<unknown>): Promise<string> {
  try {
    await p;
  } catch (error: unknown) {
    return error instanceof RagError ? error.kind : "not-a-rag-error";
  }
  return "resolved";
}

describe("retriever", () => {
  it("returns only chunks above the score threshold", async () => {
    const { indexer, retriever } = await setup();
    await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });

    const result = await retriever.retrieve("What city are we discussing?");

    expect(result.degraded).toBe(false);
    expect(result.items.map((i) => i.chunkId)).toEqual(["paris:g1:0"]);
    expect(result.items[0]?.score).toBeCloseTo(1 / Math.sqrt(3), 10);
    expect(result.items[0]).toMatchObject({ documentId: "paris", sequenceIndex: 0, text: "Paris is the capital of France. " });
  });

  it("ranks by score, highest first, and honours k", async () => {
    const { indexer, retriever } = await setup();
    await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });

    const result = await retriever.retrieve("What is the population of Paris?");
    expect(result.items.map((i) => i.chunkId)).toEqual(["paris:g1:1", "paris:g1:0"]);
    expect(result.items[0]?.score).toBeCloseTo(0.5, 10);
    expect(result.items[1]?.score).toBeCloseTo(1 / Math.sqrt(6), 10);

    const top1 = await retriever.retrieve("What is the population of Paris?", 1);
    expect(top1.items.map((i) => i.chunkId)).toEqual(["paris:g1:1"]);
  });

  it("rejects k outside 1..maxTopK and empty queries", async () => {
    const { retriever } = await setup({ maxTopK: 50 });

    expect(await kindOf(retriever.retrieve("city", 0))).toBe("invalid_config");
    expect(await kindOf(retriever.retrieve("city", 51))).toBe("invalid_config");
    expect(await kindOf(retriever.retrieve("city", 1.5))).toBe("invalid_config");
    expect(await kindOf(retriever.retrieve("   "))).toBe("invalid_input");
  });

  it("returns a degraded empty result for an empty corpus without embedding", async () => {
    const { embedder, retriever } = await setup();

    await expect(retriever.retrieve("What city?")).resolves.toEqual({ query: "What city?", items: [], degraded: true });
    expect(embedder.embed).not.toHaveBeenCalled();
  });

  it("returns a degraded empty result when nothing clears the threshold", async () => {
    const { embedder, indexer, retriever } = await setup();
    await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });

    const result = await retriever.retrieve("Tell me about bananas");
    expect(result).toEqual({ query: "Tell me about bananas", items: [], degraded: true });
    expect(embedder.embed).toHaveBeenCalledTimes(1);
  });

  it("restricts results to the requested documents", async () => {
    const { indexer, retriever } = await setup();
    await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });
    await indexer.indexDocument({ id: "berlin", sourceUri: "b", rawText: "Berlin is a city in Germany." });

    const all = await retriever.retrieve("Which city?");
    expect(all.items.map((i) => i.chunkId)).toEqual(["berlin:g1:0", "paris:g1:0"]);

    const onlyParis = await retriever.retrieve("Which city?", 5, { documentIds: ["paris"] });
    expect(onlyParis.items.map((i) => i.chunkId)).toEqual(["paris:g1:0"]);
  });

  it("breaks score ties by documentId", async () => {
    const { indexer, retriever } = await setup();
    await indexer.indexDocument({ id: "b-doc", sourceUri: "b", rawText: "Paris is a city." });
    await indexer.indexDocument({ id: "a-doc", sourceUri: "a", rawText: "Paris is a city." });

    const result = await retriever.retrieve("paris");
    expect(result.items.map((i) => i.documentId)).toEqual(["a-doc", "b-doc"]);
  });

  it("never surfaces uncommitted or non-indexed chunks", async () => {
    const { documents, store, indexer, retriever } = await setup();
    await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });
    await indexer.indexDocument({ id: "draft", sourceUri: "d", rawText: "Paris is a city." });

    await store.upsert([{ id: "paris:orphan:0", vector: [1, 0, 0, 0, 0], metadata: { documentId: "paris", sequenceIndex: 0, text: "orphan" } }]);
    const draft = await documents.get("draft");
    if (draft) { await documents.put({ ...draft, status: "pending" }); }

    const result = await retriever.retrieve("What city are we discussing?");
    expect(result.items.map((i) => i.chunkId)).toEqual(["paris:g1:0"]);
  });

  it("blends lexical overlap into the score in hybrid mode", async () => {
    const { indexer, retriever } = await setup({ hybrid: true, vectorWeight: 0.7 });
    await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });

    const result = await retriever.retrieve("What is the population of Paris?");

    expect(result.items.map((i) => i.chunkId)).toEqual(["paris:g1:0", "paris:g1:1"]);
    expect(result.items[0]?.lexicalScore).toBe(0.5);
    expect(result.items[0]?.score).toBeCloseTo(0.7 / Math.sqrt(6) + 0.15, 10);
    expect(result.items[1]?.lexicalScore).toBe(0.25);
    expect(result.items[1]?.score).toBeCloseTo(0.425, 10);
    expect(result.degraded).toBe(false);
  });

  it("finds keyword matches that fall outside the vector candidate pool", async () => {
    const { store, indexer, retriever } = await setup({ hybrid: true, vectorWeight: 0.3 });
    for (const id of ["d1", "d2", "d3", "d4", "d5"]) {
      await indexer.indexDocument({ id, sourceUri: id, rawText: "capital inhabitants" });
    }
    await indexer.indexDocument({ id: "target", sourceUri: "t", rawText: "Paris France capital population million" });

    // k=1 asks the store for five candidates: the five exact vector matches.
    expect((await store.search([0, 1, 0, 1, 0], 5)).map((m) => m.metadata.documentId)).not.toContain("target");

    const result = await retriever.retrieve("capital population", 1);

    expect(result.items.map((i) => i.chunkId)).toEqual(["target:g1:0"]);
    expect(result.items[0]?.lexicalScore).toBe(1);
    expect(result.items[0]?.vectorScore).toBeCloseTo(2 / Math.sqrt(10), 10);
    expect(result.items[0]?.score).toBeCloseTo(0.3 * (2 / Math.sqrt(10)) + 0.7, 10);
    expect(result.degraded).toBe(false);
  });

  it("flags hybrid results whose best match shares no terms with the query", async () => {
    const { indexer, retriever } = await setup({ hybrid: true, vectorWeight: 0.7 });
    await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });

    const result = await retriever.retrieve("Which inhabitants?");

    expect(result.items.map((i) => i.chunkId)).toEqual(["paris:g1:1"]);
    expect(result.items[0]?.score).toBeCloseTo(0.7 / Math.SQRT2, 10);
    expect(result.degraded).toBe(true);
  });
});

describe("lexical scoring", () => {
  it("keeps distinct lowercased terms of three or more characters", () => {
    expect(tokenizeQuery("What is THE population, the Population of Paris?")).toEqual(["what", "the", "population", "paris"]);
  });

  it("scores the fraction of query terms found in the text", () => {
    expect(lexicalScore(["paris", "population"], "Paris has a large population.")).toBe(1);
    expect(lexicalScore(["paris", "berlin"], "Paris only")).toBe(0.5);
    expect(lexicalScore([], "anything")).toBe(0);
  });
});

describe("compareRetrieved", () => {
  const base: RetrievedChunk = { chunkId: "x", documentId: "d", text: "", score: 0.5, sequenceIndex: 0, vectorScore: 0.5 };

  it("orders by score, then sequence index, document id and chunk id", () => {
    const items: RetrievedChunk[] = [
      { ...base, chunkId: "z", documentId: "b", sequenceIndex: 1 },
      { ...base, chunkId: "y", documentId: "b", sequenceIndex: 0 },
      { ...base, chunkId: "c", documentId: "a", sequenceIndex: 1 },
      { ...base, chunkId: "b", documentId: "a", sequenceIndex: 1 },
      { ...base, chunkId: "top", score: 0.9, sequenceIndex: 7 },
    ];

    expect([...items].sort(compareRetrieved).map((i) => i.chunkId)).toEqual(["top", "y", "b", "c", "z"]);
  });
});
