import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ProviderRequestError,
  ProviderUnavailableError,
  RateLimitedError,
  TransientProviderError,
} from "@docweave/errors";
import { OllamaProvider } from "./ollama-provider.js";

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

describe("OllamaProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const provider = new OllamaProvider({ baseUrl: "http://ollama.test:11434/", dimensions: 3 });

  it("describes itself as the local provider", () => {
    expect(provider.name).toBe("ollama");
    expect(provider.kind).toBe("local");
    expect(provider.model).toBe("nomic-embed-text");
    expect(provider.dimensions).toBe(3);
  });

  it("posts the whole batch to /api/embed", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({ embeddings: [[0.1, 0.2, 0.3], [0.4, 0.5, 0.6]], prompt_eval_count: 12 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await provider.generateEmbeddings(["first", "second"]);

    expect(result).toEqual({
      embeddings: [[0.1, 0.2, 0.3], [0.4, 0.5, 0.6]],
      model: "nomic-embed-text",
      tokensUsed: 12,
      dimensions: 3,
    });
    expect(fetchMock).toHaveBeenCalledOnce();
    const [url, init] = fetchMock.mock.calls[0] as [string, RequestInit];
    expect(url).toBe("http://ollama.test:11434/api/embed");
    expect(init.method).toBe("POST");
    expect(JSON.parse(String(init.body))).toEqual({
      model: "nomic-embed-text",
      input: ["first", "second"],
    });
  });

  it("maps a 503 to TransientProviderError", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(new Response("busy", { status: 503, statusText: "Service Unavailable" })),
    );

    await expect(provider.generateEmbeddings(["x"])).rejects.toBeInstanceOf(TransientProviderError);
  });

  it("maps a 429 to RateLimitedError with the Retry-After hint", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(new Response("", { status: 429, headers: { "Retry-After": "7" } })),
    );

    const err: unknown = await provider.generateEmbeddings(["x"]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err instanceof RateLimitedError && err.retryAfter).toBe(7);
  });

  it("maps a 404 (unknown model) to ProviderRequestError", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("", { status: 404 })));

    await expect(provider.generateEmbeddings(["x"])).rejects.toBeInstanceOf(ProviderRequestError);
  });

  it("maps a network failure to ProviderUnavailableError", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    await expect(provider.generateEmbeddings(["x"])).rejects.toThrow(
      new ProviderUnavailableError("ollama is unreachable: fetch failed", {
        provider: "ollama",
        operation: "embed",
      }),
    );
  });

  it("rejects a malformed response body", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ embedding: [1, 2, 3] })));

    await expect(provider.generateEmbeddings(["x"])).rejects.toThrow(
      "Malformed embed response from ollama",
    );
  });

  it("maps a body that is not JSON to TransientProviderError", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("<html>proxy error</html>")));

    const run = provider.generateEmbeddings(["x"]);

    await expect(run).rejects.toBeInstanceOf(TransientProviderError);
    await expect(run).rejects.toThrow("Ollama embed returned a body that is not JSON");
  });

  it("generates text without streaming", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ response: '{"ok":true}' }));
    vi.stubGlobal("fetch", fetchMock);

    const text = await provider.generateText("Describe the schema", { format: "json" });

    expect(text).toBe('{"ok":true}');
    const [url, init] = fetchMock.mock.calls[0] as [string, RequestInit];
    expect(url).toBe("http://ollama.test:11434/api/generate");
    expect(JSON.parse(String(init.body))).toEqual({
      model: "qwen3:8b",
      prompt: "Describe the schema",
      stream: false,
      format: "json",
    });
  });

  it("reports health from the root endpoint", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("Ollama is running")));
    await expect(provider.healthCheck()).resolves.toBe(true);

    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));
    await expect(provider.healthCheck()).resolves.toBe(false);
  });
});
