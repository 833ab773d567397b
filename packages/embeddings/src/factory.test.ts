import { describe, it, expect } from "vitest";
import { createProviderRegistry } from "./factory.js";
import type { ProviderRegistryConfig } from "./factory.js";

function makeConfig(keys: { openai?: string; gemini?: string; cohere?: string } = {}): ProviderRegistryConfig {
  return {
    embeddings: {
      defaultProvider: "ollama",
      dimensions: 768,
      maxRetries: 3,
      retryBaseDelayMs: 1000,
      retryMaxDelayMs: 30000,
      timeoutMs: 0,
      offlineFallback: false,
    },
    ollama: { baseUrl: "http://localhost:11434/", embedModel: "nomic-embed-text", llmModel: "qwen3:8b" },
    openai: { apiKey: keys.openai ?? "", embedModel: "text-embedding-3-small", llmModel: "gpt-4o-mini" },
    gemini: { apiKey: keys.gemini ?? "", embedModel: "text-embedding-004", llmModel: "gemini-1.5-flash" },
    cohere: {
      apiKey: keys.cohere ?? "",
      embedModel: "embed-english-v3.0",
      embedDimensions: 1024,
      llmModel: "command-r-plus",
    },
  };
}

describe("createProviderRegistry", () => {
  it("always registers the local ollama provider", () => {
    const registry = createProviderRegistry(makeConfig());

    expect([...registry.keys()]).toEqual(["ollama"]);
    const ollama = registry.get("ollama");
    expect(ollama?.kind).toBe("local");
    expect(ollama?.model).toBe("nomic-embed-text");
    expect(ollama?.dimensions).toBe(768);
  });

  it("registers remote providers whose API key is set", () => {
    const registry = createProviderRegistry(
      makeConfig({ openai: "test-secret", gemini: "test-secret", cohere: "test-secret" }),
    );

    expect([...registry.keys()]).toEqual(["ollama", "openai", "gemini", "cohere"]);
    expect(registry.get("openai")?.maxBatchSize).toBe(2048);
    expect(registry.get("gemini")?.maxBatchSize).toBe(100);
    expect(registry.get("cohere")?.maxBatchSize).toBe(96);
  });

  it("uses the shared dimensions except for cohere", () => {
    const registry = createProviderRegistry(makeConfig({ openai: "test-secret", cohere: "test-secret" }));

    expect(registry.get("openai")?.dimensions).toBe(768);
    expect(registry.get("cohere")?.dimensions).toBe(1024);
    expect(registry.get("cohere")?.kind).toBe("remote");
  });

  it("skips providers with an empty key", () => {
    const registry = createProviderRegistry(makeConfig({ gemini: "test-secret" }));

    expect(registry.has("openai")).toBe(false);
    expect(registry.has("gemini")).toBe(true);
    expect(registry.has("cohere")).toBe(false);
  });
});
