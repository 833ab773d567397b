import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Mock } from "vitest";
import { DimensionMismatchError, ProviderUnavailableError } from "@docweave/errors";
import { EmbeddingGateway } from "@docweave/embeddings";
import type { EmbedCallOptions, IModelProvider } from "@docweave/embeddings";
import { DegradableVectorStore, InMemoryVectorStore } from "@docweave/vector-store";
import type { Chunk, EmbeddingResult, ProviderName } from "@docweave/types";
import { Retriever } from "./retriever.js";

const T0 = new Date("2025-06-01T10:00:00Z");

function embedText(text: string): number[] {
  const lower = text.toLowerCase();
  return [lower.includes("cat") ? 1 : 0, lower.includes("dog") ? 1 : 0, 1];
}

function chunk(ordinal: number, text: string, embedding: number[]): Chunk {
  return {
    id: `doc-1-chunk-${String(ordinal)}`,
    documentId: "doc-1",
    text,
    embedding,
    ordinal,
    sourceFilename: "animals.txt",
    createdAt: T0,
  };
}

const unreachable = (): ProviderUnavailableError =>
  new ProviderUnavailableError("ollama is unreachable", { provider: "ollama", operation: "embed" });

function gatewayFor(provider: IModelProvider, offlineFallback: boolean): EmbeddingGateway {
  return new EmbeddingGateway(new Map<ProviderName, IModelProvider>([["ollama", provider]]), {
    defaultProvider: "ollama",
    maxRetries: 0,
    retryBaseDelayMs: 1,
    retryMaxDelayMs: 1,
    timeoutMs: 0,
    offlineFallback,
  });
}

describe("Retriever", () => {
  let backend: InMemoryVectorStore;
  let store: DegradableVectorStore;
  let retriever: Retriever;
  let gateway: EmbeddingGateway;
  let provider: IModelProvider;
  let generateEmbeddings: Mock<(texts: string[], options?: EmbedCallOptions) => Promise<EmbeddingResult>>;
  let healthCheck: Mock<() => Promise<boolean>>;

  beforeEach(async () => {
    generateEmbeddings = vi.fn((texts: string[], _options?: EmbedCallOptions) =>
      Promise.resolve({ embeddings: texts.map(embedText), model: "fake", tokensUsed: 0, dimensions: 3 }),
    );
    healthCheck = vi.fn(() => Promise.resolve(true));
    provider = {
      name: "ollama",
      kind: "local",
      model: "fake-embed",
      dimensions: 3,
      maxBatchSize: Number.POSITIVE_INFINITY,
      generateEmbeddings,
      generateText: () => Promise.resolve(""),
      healthCheck,
    };
    gateway = gatewayFor(provider, false);

    backend = new InMemoryVectorStore();
    await backend.ensureIndex({ name: "document_embeddings", dimensions: 3, metric: "cosine" });
    await backend.insertDocument(
      { id: "doc-1", filename: "animals.txt", filetype: "txt", ingestedAt: T0 },
      [
        chunk(0, "A cat naps", [1, 0, 1]),
        chunk(1, "Dogs bark loudly", [0, 1, 1]),
        chunk(2, "Birds sing", [0, 0, 1]),
      ],
    );
    store = new DegradableVectorStore(backend);
    retriever = new Retriever({ gateway, store });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("vector path", () => {
    it("returns the nearest chunks, best first", async () => {
      const result = await retriever.retrieveWithStatus("Where is the cat?", { k: 2 });

      expect(result.strategy).toBe("vector");
      expect(result.degraded).toBe(false);
      expect(result.sources.map((s) => s.text)).toEqual(["A cat naps", "Birds sing"]);
      expect(result.sources[0]!.score).toBeCloseTo(1);
      expect(result.sources[1]!.score).toBeCloseTo(Math.SQRT1_2);
      expect(result.sources[0]!.metadata).toEqual({
        chunkId: "doc-1-chunk-0",
        documentId: "doc-1",
        sourceFilename: "animals.txt",
        ordinal: 0,
      });
    });

    it("defaults to five results", async () => {
      const search = vi.spyOn(backend, "search");

      await retriever.retrieve("cat");

      expect(search).toHaveBeenCalledWith([1, 0, 1], 5);
    });

    it("refuses to search with a query of another dimension", async () => {
      const other = new InMemoryVectorStore();
      await other.insertDocument(
        { id: "doc-2", filename: "flat.txt", filetype: "txt", ingestedAt: T0 },
        [{ ...chunk(0, "two dims", [1, 0]), id: "doc-2-chunk-0", documentId: "doc-2" }],
      );
      const search = vi.spyOn(other, "search");
      const searchText = vi.spyOn(other, "searchText");
      const mismatched = new Retriever({ gateway, store: new DegradableVectorStore(other) });

      await expect(mismatched.retrieve("two")).rejects.toThrow(DimensionMismatchError);
      await expect(mismatched.retrieve("two")).rejects.toThrow(
        "Embedding dimension mismatch (query): store uses 2, got 3",
      );
      expect(search).not.toHaveBeenCalled();
      expect(searchText).not.toHaveBeenCalled();
    });
  });

  describe("text fallback", () => {
    it("matches substrings case-insensitively in ordinal order when vector search is empty", async () => {
      vi.spyOn(backend, "search").mockResolvedValue([]);

      const result = await retriever.retrieveWithStatus("S");

      expect(result.strategy).toBe("text");
      expect(result.sources.map((s) => [s.text, s.score])).toEqual([
        ["A cat naps", 1],
        ["Dogs bark loudly", 1],
        ["Birds sing", 1],
      ]);
    });

    it("answers from text search when embedding fails", async () => {
      generateEmbeddings.mockRejectedValue(unreachable());

      const result = await retriever.retrieveWithStatus("cat");

      expect(result).toEqual({
        sources: [
          {
            text: "A cat naps",
            score: 1,
            metadata: {
              chunkId: "doc-1-chunk-0",
              documentId: "doc-1",
              sourceFilename: "animals.txt",
              ordinal: 0,
            },
          },
        ],
        strategy: "text",
        degraded: false,
      });
    });

    it("rethrows the embedding error when text search finds nothing", async () => {
      generateEmbeddings.mockRejectedValue(unreachable());

      await expect(retriever.retrieve("zebra")).rejects.toThrow(ProviderUnavailableError);
    });

    it("treats offline zero vectors as an embedding failure", async () => {
      generateEmbeddings.mockRejectedValue(unreachable());
      const search = vi.spyOn(backend, "search");
      const offline = new Retriever({ gateway: gatewayFor(provider, true), store });

      const result = await offline.retrieveWithStatus("cat");

      expect(result.strategy).toBe("text");
      expect(result.sources.map((s) => [s.text, s.score])).toEqual([["A cat naps", 1]]);
      expect(search).not.toHaveBeenCalled();
    });

    it("rethrows the offline cause when text search finds nothing", async () => {
      generateEmbeddings.mockRejectedValue(unreachable());
      const offline = new Retriever({ gateway: gatewayFor(provider, true), store });

      await expect(offline.retrieve("zebra")).rejects.toThrow(ProviderUnavailableError);
    });

    it("is skipped when disabled", async () => {
      vi.spyOn(backend, "search").mockResolvedValue([]);
      const searchText = vi.spyOn(backend, "searchText");

      await expect(
        retriever.retrieveWithStatus("cat", { fallbackEnabled: false }),
      ).resolves.toEqual({ sources: [], strategy: "none", degraded: false });
      expect(searchText).not.toHaveBeenCalled();
    });

    it("does not hide an embedding error when disabled", async () => {
      generateEmbeddings.mockRejectedValue(unreachable());

      await expect(retriever.retrieve("cat", { fallbackEnabled: false })).rejects.toThrow(
        "ollama is unreachable",
      );
    });
  });

  describe("degraded store", () => {
    it("returns nothing and flags degradation without embedding", async () => {
      await backend.close();
      await store.connect();

      await expect(retriever.retrieveWithStatus("cat")).resolves.toEqual({
        sources: [],
        strategy: "none",
        degraded: true,
      });
      expect(generateEmbeddings).not.toHaveBeenCalled();
    });

    it("flags a store lost during the call", async () => {
      await backend.close();

      await expect(retriever.retrieveWithStatus("cat")).resolves.toEqual({
        sources: [],
        strategy: "none",
        degraded: true,
      });
      expect(store.status.mode).toBe("degraded");
    });
  });

  describe("status", () => {
    it("reports store statistics and stored dimensions", async () => {
      await expect(retriever.getSystemStatus()).resolves.toEqual({
        store: { mode: "connected" },
        stats: { connected: true, totalDocuments: 1, totalChunks: 3, indexExists: true },
        storedDimensions: 3,
        defaultProvider: "ollama",
      });
    });

    it("is healthy when the provider answers and embeds", async () => {
      const report = await retriever.healthCheck();

      expect(report.healthy).toBe(true);
      expect(report.providers).toEqual({ ollama: true });
      expect(report.embeddingTest).toEqual({ success: true, dimensions: 3 });
    });

    it("reports the embedding failure", async () => {
      healthCheck.mockResolvedValue(false);
      generateEmbeddings.mockRejectedValue(unreachable());

      const report = await retriever.healthCheck();

      expect(report.healthy).toBe(false);
      expect(report.providers).toEqual({ ollama: false });
      expect(report.embeddingTest).toEqual({ success: false, error: "ollama is unreachable" });
    });

    it("does not count offline zero vectors as a working embedding", async () => {
      generateEmbeddings.mockRejectedValue(unreachable());
      const offline = new Retriever({ gateway: gatewayFor(provider, true), store });

      const report = await offline.healthCheck();

      expect(report.healthy).toBe(false);
      expect(report.embeddingTest).toEqual({ success: false, error: "ollama is unreachable" });
    });
  });
});
