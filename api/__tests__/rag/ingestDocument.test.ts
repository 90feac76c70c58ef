import { describe, expect, it, vi } from "vitest";

import { RagError } from "../../../src/server/rag/errors.ts";
import { createIndexer } from "../../../src/server/rag/ingest/ingestDocument.ts";
import { createMemoryDocumentStore } from "../../../src/server/rag/ingest/statusStore.ts";
import { createMemoryVectorStore } from "../../../src/server/rag/store/memoryVectorStore.ts";
import { PARIS_TEXT, conceptVector, createConceptEmbedder } from "../helpers/fakes.ts";

function setup() {
  const documents = createMemoryDocumentStore();
  const store = createMemoryVectorStore();
  const embedder = createConceptEmbedder();
  let generation = 0;

  const indexer = createIndexer({
    documents,
    store,
    embedder,
    chunking: { chunkSize: 40, overlap: 10 },
    embedBatchSize: 2,
    serviceTimeoutMs: 1000,
    now: () => 100,
    newGeneration: () => `g${++generation}`,
  });

  return { documents, store, embedder, indexer };
}

async function caught(p: Promise<unknown>): Promise<RagError | null> {
  try {
    await p;
  } catch (error: unknown) {
    return error instanceof RagError ? error : null;
  }
  return null;
}

async function storedIds(store: ReturnType<typeof createMemoryVectorStore>): Promise<string[]> {
  return (await store.search([1, 1, 1, 1, 1], 100)).map((m) => m.id).sort();
}

describe("indexer", () => {
  it("chunks, embeds in batches and commits the chunk set", async () => {
    const { documents, store, embedder, indexer } = setup();

    const { document, chunksIndexed } = await indexer.indexDocument({ id: "paris", sourceUri: "file://paris.txt", rawText: PARIS_TEXT });

    expect(chunksIndexed).toBe(3);
    expect(document).toEqual({
      id: "paris",
      sourceUri: "file://paris.txt",
      uploadedAt: 100,
      updatedAt: 100,
      status: "indexed",
      chunkIds: ["paris:g1:0", "paris:g1:1", "paris:g1:2"],
    });
    expect(await documents.get("paris")).toEqual(document);
    expect(store.size()).toBe(3);

    expect(embedder.embedBatch).toHaveBeenCalledTimes(2);
    expect(embedder.embedBatch.mock.calls[0]?.[0]).toEqual([
      "Paris is the capital of France. ",
      "f France. It has a population of over 2 ",
    ]);
    expect(embedder.embedBatch.mock.calls[1]?.[0]).toEqual(["of over 2 million."]);
  });

  it("leaves exactly one chunk set after re-indexing", async () => {
    const { store, indexer } = setup();

    await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });
    const { document } = await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });

    expect(document.chunkIds).toEqual(["paris:g2:0", "paris:g2:1", "paris:g2:2"]);
    expect(await storedIds(store)).toEqual(["paris:g2:0", "paris:g2:1", "paris:g2:2"]);
  });

  it("serializes concurrent indexing of the same document", async () => {
    const { documents, store, indexer } = setup();

    await Promise.all([
      indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT }),
      indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: "Paris." }),
    ]);

    expect((await documents.get("paris"))?.chunkIds).toEqual(["paris:g2:0"]);
    expect(await storedIds(store)).toEqual(["paris:g2:0"]);
  });

  it("marks the document failed and removes its chunks when embedding fails", async () => {
    const { documents, store, embedder, indexer } = setup();
    await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });

    embedder.embedBatch
      .mockImplementationOnce(async (texts: string[]) => texts.map(conceptVector))
      .mockRejectedValueOnce(new RagError("auth", "bad key"));

    const error = await caught(indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT }));

    expect(error?.kind).toBe("indexing_failed");
    expect(error?.cause instanceof RagError ? error.cause.kind : null).toBe("auth");
    expect(await documents.get("paris")).toEqual({
      id: "paris",
      sourceUri: "a",
      uploadedAt: 100,
      updatedAt: 100,
      status: "failed",
      chunkIds: [],
      lastError: "bad key",
    });
    expect(store.size()).toBe(0);
  });

  it("rolls back when the vector store rejects the batch", async () => {
    const { documents, store, indexer } = setup();
    const deleteSpy = vi.spyOn(store, "delete");
    vi.spyOn(store, "upsert").mockRejectedValueOnce(new Error("disk full"));

    const error = await caught(indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT }));

    expect(error?.kind).toBe("indexing_failed");
    expect(deleteSpy).toHaveBeenCalledWith(["paris:g1:0", "paris:g1:1", "paris:g1:2"]);
    expect((await documents.get("paris"))?.status).toBe("failed");
    expect((await documents.get("paris"))?.lastError).toBe("disk full");
  });

  it("retries a transient embedding failure once", async () => {
    const { embedder, indexer } = setup();
    embedder.embedBatch.mockRejectedValueOnce(new RagError("service_unavailable", "blip"));

    const { chunksIndexed } = await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });

    expect(chunksIndexed).toBe(3);
    expect(embedder.embedBatch).toHaveBeenCalledTimes(3);
  });

  it("indexes empty text as a document without chunks", async () => {
    const { embedder, indexer } = setup();

    const { document } = await indexer.indexDocument({ id: "empty", sourceUri: "a", rawText: "" });

    expect(document.status).toBe("indexed");
    expect(document.chunkIds).toEqual([]);
    expect(embedder.embedBatch).not.toHaveBeenCalled();
  });

  it("deletes owned chunks and tolerates repeated or unknown deletes", async () => {
    const { documents, store, indexer } = setup();
    await indexer.indexDocument({ id: "paris", sourceUri: "a", rawText: PARIS_TEXT });

    const deleted = await indexer.deleteDocument("paris");
    expect(deleted.status).toBe("deleted");
    expect(deleted.chunkIds).toEqual([]);
    expect(store.size()).toBe(0);

    await expect(indexer.deleteDocument("paris")).resolves.toMatchObject({ status: "deleted" });
    await expect(indexer.deleteDocument("ghost")).resolves.toEqual({
      id: "ghost",
      sourceUri: "",
      uploadedAt: 100,
      updatedAt: 100,
      status: "deleted",
      chunkIds: [],
    });
    expect((await documents.get("ghost"))?.status).toBe("deleted");
  });

  it("rejects bad chunk settings when created", () => {
    expect(() =>
      createIndexer({
        documents: createMemoryDocumentStore(),
        store: createMemoryVectorStore(),
        embedder: createConceptEmbedder(),
        chunking: { chunkSize: 10, overlap: 10 },
        embedBatchSize: 2,
        serviceTimeoutMs: 1000,
      })).toThrow(RagError);
  });
});
