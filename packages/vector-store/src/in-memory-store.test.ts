import { describe, it, expect, beforeEach } from "vitest";
import { DimensionMismatchError, StoreUnavailableError } from "@docweave/errors";
import { chunkIdFor } from "@docweave/types";
import type { Chunk, Document } from "@docweave/types";
import { InMemoryVectorStore } from "./in-memory-store.js";

function makeDocument(id: string, ingestedAt: Date): Document {
  return { id, filename: `${id}.txt`, filetype: "txt", ingestedAt };
}

function makeChunks(documentId: string, entries: Array<[string, number[]]>): Chunk[] {
  return entries.map(([text, embedding], ordinal) => ({
    id: chunkIdFor(documentId, ordinal),
    documentId,
    text,
    embedding,
    ordinal,
    sourceFilename: `${documentId}.txt`,
    createdAt: new Date("2025-01-01T00:00:00Z"),
  }));
}

describe("InMemoryVectorStore", () => {
  let store: InMemoryVectorStore;

  beforeEach(async () => {
    store = new InMemoryVectorStore();
    await store.ensureIndex({ name: "document_embeddings", dimensions: 2, metric: "cosine" });
  });

  it("stores a document and links its chunks in ordinal order", async () => {
    const chunks = makeChunks("doc-a", [
      ["alpha", [1, 0]],
      ["beta", [0, 1]],
      ["gamma", [1, 1]],
    ]);
    await store.insertDocument(makeDocument("doc-a", new Date("2025-01-01T00:00:00Z")), [
      ...chunks,
    ].reverse());

    expect(store.linksOf("doc-a")).toEqual([
      { from: "doc-a-chunk-0", to: "doc-a-chunk-1", type: "NEXT" },
      { from: "doc-a-chunk-1", to: "doc-a-chunk-2", type: "NEXT" },
    ]);
    await expect(store.getStats()).resolves.toEqual({
      totalDocuments: 1,
      totalChunks: 3,
      indexExists: true,
    });
  });

  it("returns nearest neighbours by descending score", async () => {
    await store.insertDocument(
      makeDocument("doc-a", new Date("2025-01-01T00:00:00Z")),
      makeChunks("doc-a", [
        ["east", [1, 0]],
        ["north", [0, 1]],
        ["north-east", [1, 1]],
      ]),
    );

    const results = await store.search([1, 0], 2);

    expect(results.map((r) => r.chunk.text)).toEqual(["east", "north-east"]);
    expect(results[0]?.score).toBe(1);
    expect(results[0]?.chunk).toEqual({
      id: "doc-a-chunk-0",
      documentId: "doc-a",
      text: "east",
      ordinal: 0,
      sourceFilename: "doc-a.txt",
      createdAt: new Date("2025-01-01T00:00:00Z"),
    });
  });

  it("matches text case-insensitively in document and ordinal order", async () => {
    await store.insertDocument(
      makeDocument("doc-a", new Date("2025-01-01T00:00:00Z")),
      makeChunks("doc-a", [
        ["Graph databases", [1, 0]],
        ["unrelated", [0, 1]],
        ["more about GRAPHS", [1, 1]],
      ]),
    );
    await store.insertDocument(
      makeDocument("doc-b", new Date("2025-01-02T00:00:00Z")),
      makeChunks("doc-b", [["a graph of things", [1, 0]]]),
    );

    const results = await store.searchText("graph", 5);

    expect(results.map((r) => r.chunk.id)).toEqual(["doc-a-chunk-0", "doc-a-chunk-2", "doc-b-chunk-0"]);
    expect(results.every((r) => r.score === 1)).toBe(true);
    await expect(store.searchText("graph", 1)).resolves.toHaveLength(1);
  });

  it("reports stored dimensions and rejects a different index dimension", async () => {
    await expect(store.getStoredDimensions()).resolves.toBeNull();
    await store.insertDocument(
      makeDocument("doc-a", new Date("2025-01-01T00:00:00Z")),
      makeChunks("doc-a", [["alpha", [1, 0]]]),
    );

    await expect(store.getStoredDimensions()).resolves.toBe(2);
    await expect(
      store.ensureIndex({ name: "document_embeddings", dimensions: 3, metric: "cosine" }),
    ).rejects.toThrow(new DimensionMismatchError(2, 3, "index"));
  });

  it("records entities and mentions per chunk", async () => {
    await store.saveKnowledge("doc-a-chunk-0", {
      entities: [
        { label: "Person", name: "Ada" },
        { label: "Concept", name: "Engines" },
      ],
      relationships: [{ source: "Ada", target: "Engines", type: "RELATED_TO" }],
    });
    await store.saveKnowledge("doc-a-chunk-0", {
      entities: [{ label: "Person", name: "Ada" }],
      relationships: [{ source: "Ada", target: "Engines", type: "RELATED_TO" }],
    });

    expect(store.entitiesOf("doc-a-chunk-0")).toEqual([
      { label: "Person", name: "Ada" },
      { label: "Concept", name: "Engines" },
    ]);
    expect(store.relationCount).toBe(1);
  });

  it("lists documents newest first with chunk counts", async () => {
    await store.insertDocument(
      makeDocument("older", new Date("2025-01-01T00:00:00Z")),
      makeChunks("older", [["a", [1, 0]]]),
    );
    await store.insertDocument(
      makeDocument("newer", new Date("2025-02-01T00:00:00Z")),
      makeChunks("newer", [
        ["b", [1, 0]],
        ["c", [0, 1]],
      ]),
    );

    const listed = await store.listDocuments();

    expect(listed.map((d) => [d.id, d.chunkCount])).toEqual([
      ["newer", 2],
      ["older", 1],
    ]);
  });

  it("deletes a document with its chunks and links", async () => {
    await store.insertDocument(
      makeDocument("doc-a", new Date("2025-01-01T00:00:00Z")),
      makeChunks("doc-a", [
        ["a", [1, 0]],
        ["b", [0, 1]],
      ]),
    );

    await expect(store.deleteDocument("doc-a")).resolves.toBe(true);
    await expect(store.deleteDocument("doc-a")).resolves.toBe(false);
    expect(store.linksOf("doc-a")).toEqual([]);
    await expect(store.search([1, 0], 5)).resolves.toEqual([]);
  });

  it("clear drops the index and every record", async () => {
    await store.insertDocument(
      makeDocument("doc-a", new Date("2025-01-01T00:00:00Z")),
      makeChunks("doc-a", [["a", [1, 0]]]),
    );

    await store.clear();

    await expect(store.getStats()).resolves.toEqual({
      totalDocuments: 0,
      totalChunks: 0,
      indexExists: false,
    });
  });

  it("fails calls after close and reports unhealthy", async () => {
    await store.close();

    await expect(store.healthCheck()).resolves.toBe(false);
    await expect(store.search([1, 0], 1)).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});
