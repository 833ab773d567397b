import { z } from "zod";
import { TransientProviderError } from "@docweave/errors";
import type { EmbeddingResult } from "@docweave/types";
import type {
  EmbedCallOptions,
  GenerateTextOptions,
  IModelProvider,
} from "./model-provider.interface.js";
import { errorForStatus, parseRetryAfter, toProviderError } from "./provider-errors.js";

const DEFAULT_EMBED_MODEL = "nomic-embed-text";
const DEFAULT_LLM_MODEL = "qwen3:8b";
const DEFAULT_DIMENSIONS = 768;

export interface OllamaProviderConfig {
  baseUrl: string;
  model?: string;
  llmModel?: string;
  dimensions?: number;
}

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  prompt_eval_count: z.number().optional(),
});

const generateResponseSchema = z.object({
  response: z.string(),
});

/**
 * Self-hosted Ollama server. The default provider: it needs no credentials,
 * so it is always registered.
 */
export class OllamaProvider implements IModelProvider {
  readonly name = "ollama";
  readonly kind = "local";
  readonly maxBatchSize = Number.POSITIVE_INFINITY;
  readonly model: string;
  readonly dimensions: number;
  private llmModel: string;
  private baseUrl: string;

  constructor(config: OllamaProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model ?? DEFAULT_EMBED_MODEL;
    this.llmModel = config.llmModel ?? DEFAULT_LLM_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generateEmbeddings(texts: string[], options: EmbedCallOptions = {}): Promise<EmbeddingResult> {
    const body = await this.post("/api/embed", { model: this.model, input: texts }, "embed", options.signal);
    const parsed = embedResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransientProviderError("Malformed embed response from ollama", {
        provider: this.name,
        operation: "embed",
      });
    }

    return {
      embeddings: parsed.data.embeddings,
      model: this.model,
      tokensUsed: parsed.data.prompt_eval_count ?? 0,
      dimensions: parsed.data.embeddings[0]?.length ?? this.dimensions,
    };
  }

  async generateText(prompt: string, options: GenerateTextOptions = {}): Promise<string> {
    const body = await this.post(
      "/api/generate",
      {
        model: this.llmModel,
        prompt,
        stream: false,
        ...(options.format ? { format: options.format } : {}),
      },
      "generate",
      options.signal,
    );
    const parsed = generateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransientProviderError("Malformed generate response from ollama", {
        provider: this.name,
        operation: "generate",
      });
    }
    return parsed.data.response;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(this.baseUrl, { signal: AbortSignal.timeout(5_000) });
      return response.ok;
    } catch {
      return false;
    }
  }

  private async post(
    path: string,
    payload: Record<string, unknown>,
    operation: string,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const context = { provider: this.name, operation };

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (err) {
      throw toProviderError(err, context);
    }

    if (!response.ok) {
      throw errorForStatus(
        response.status,
        `Ollama ${operation} failed: ${String(response.status)} ${response.statusText}`,
        context,
        parseRetryAfter(response.headers.get("retry-after")),
      );
    }

    try {
      const data: unknown = await response.json();
      return data;
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new TransientProviderError(`Ollama ${operation} returned a body that is not JSON`, context, err);
    }
  }
}
