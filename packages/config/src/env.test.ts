import { describe, it, expect } from "vitest";
import { parseEnv } from "./env.js";

function makeValidEnv(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    NODE_ENV: "production",
    LOG_LEVEL: "info",
    DATABASE_URL: "postgresql://localhost:5432/test",
    DATABASE_POOL_MAX: "20",
    VECTOR_STORE: "pgvector",
    EMBEDDING_PROVIDER: "ollama",
    EMBEDDING_DIMENSIONS: "768",
    OLLAMA_BASE_URL: "http://localhost:11434",
    OPENAI_API_KEY: "test-openai-key",
    CHUNK_SIZE: "1000",
    CHUNK_OVERLAP: "200",
    ...overrides,
  };
}

describe("parseEnv", () => {
  it("parses valid env and returns AppConfig", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("production");
    expect(config.logLevel).toBe("info");
    expect(config.database).toEqual({ url: "postgresql://localhost:5432/test", poolMax: 20 });
    expect(config.vectorStore).toEqual({
      type: "pgvector",
      indexName: "document_embeddings",
      similarity: "cosine",
    });
    expect(config.embeddings.defaultProvider).toBe("ollama");
    expect(config.embeddings.dimensions).toBe(768);
    expect(config.ollama).toEqual({
      baseUrl: "http://localhost:11434",
      embedModel: "nomic-embed-text",
      llmModel: "qwen3:8b",
    });
    expect(config.openai.apiKey).toBe("test-openai-key");
    expect(config.chunking).toEqual({ chunkSize: 1000, chunkOverlap: 200 });
  });

  it("uses defaults for optional fields", () => {
    const config = parseEnv({});

    expect(config.nodeEnv).toBe("development");
    expect(config.database.poolMax).toBe(10);
    expect(config.embeddings.maxRetries).toBe(3);
    expect(config.embeddings.retryBaseDelayMs).toBe(1000);
    expect(config.embeddings.timeoutMs).toBe(120000);
    expect(config.cohere.embedDimensions).toBe(1024);
    expect(config.extraction.enabled).toBe(true);
    expect(config.documentCache).toEqual({
      ttlMinutes: 30,
      maxDocuments: 100,
      cleanupIntervalMinutes: 5,
    });
  });

  it("treats missing API keys as empty strings", () => {
    const config = parseEnv(makeValidEnv({ OPENAI_API_KEY: "" }));

    expect(config.openai.apiKey).toBe("");
    expect(config.gemini.apiKey).toBe("");
    expect(config.cohere.apiKey).toBe("");
  });

  it("enables the offline embedding fallback by default in test mode only", () => {
    expect(parseEnv(makeValidEnv({ NODE_ENV: "test" })).embeddings.offlineFallback).toBe(true);
    expect(parseEnv(makeValidEnv()).embeddings.offlineFallback).toBe(false);
    expect(
      parseEnv(makeValidEnv({ EMBEDDINGS_OFFLINE_FALLBACK: "true" })).embeddings.offlineFallback,
    ).toBe(true);
    expect(
      parseEnv(makeValidEnv({ NODE_ENV: "test", EMBEDDINGS_OFFLINE_FALLBACK: "false" })).embeddings
        .offlineFallback,
    ).toBe(false);
  });

  it("parses boolean flags", () => {
    const config = parseEnv(makeValidEnv({ KNOWLEDGE_EXTRACTION_ENABLED: "false" }));
    expect(config.extraction.enabled).toBe(false);
  });

  it("rejects a non-boolean flag value", () => {
    expect(() => parseEnv(makeValidEnv({ KNOWLEDGE_EXTRACTION_ENABLED: "yes" }))).toThrow();
  });

  it("rejects invalid DATABASE_URL (not a postgres URI)", () => {
    expect(() => parseEnv(makeValidEnv({ DATABASE_URL: "mysql://localhost" }))).toThrow();
  });

  it("rejects an unknown embedding provider", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "mistral" }))).toThrow();
  });

  it("rejects an index name that is not a SQL identifier", () => {
    expect(() => parseEnv(makeValidEnv({ VECTOR_INDEX_NAME: "drop table;" }))).toThrow();
  });

  it("rejects CHUNK_OVERLAP not smaller than CHUNK_SIZE", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNK_SIZE: "200", CHUNK_OVERLAP: "200" }))).toThrow(
      "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    );
  });

  it("rejects non-numeric dimensions", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_DIMENSIONS: "wide" }))).toThrow();
  });

  it("rejects invalid NODE_ENV", () => {
    expect(() => parseEnv(makeValidEnv({ NODE_ENV: "staging" }))).toThrow();
  });
});
