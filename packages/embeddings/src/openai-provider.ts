import OpenAI from "openai";
import type { EmbeddingResult } from "@docweave/types";
import type {
  EmbedCallOptions,
  GenerateTextOptions,
  IModelProvider,
} from "./model-provider.interface.js";
import { toProviderError } from "./provider-errors.js";

const DEFAULT_EMBED_MODEL = "text-embedding-3-small";
const DEFAULT_LLM_MODEL = "gpt-4o-mini";
const DEFAULT_DIMENSIONS = 1536;
const BATCH_SIZE = 2048; // OpenAI input array limit

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  llmModel?: string;
  dimensions?: number;
  baseURL?: string;
}

export class OpenAIProvider implements IModelProvider {
  readonly name = "openai";
  readonly kind = "remote";
  readonly maxBatchSize = BATCH_SIZE;
  readonly model: string;
  readonly dimensions: number;
  private llmModel: string;
  private client: OpenAI;

  constructor(config: OpenAIProviderConfig) {
    // Retries are owned by the gateway's policy
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_EMBED_MODEL;
    this.llmModel = config.llmModel ?? DEFAULT_LLM_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generateEmbeddings(texts: string[], options: EmbedCallOptions = {}): Promise<EmbeddingResult> {
    try {
      const response = await this.client.embeddings.create(
        { model: this.model, input: texts, dimensions: this.dimensions },
        { signal: options.signal },
      );
      const ordered = [...response.data].sort((a, b) => a.index - b.index);

      return {
        embeddings: ordered.map((item) => item.embedding),
        model: response.model,
        tokensUsed: response.usage.prompt_tokens,
        dimensions: this.dimensions,
      };
    } catch (err) {
      throw toProviderError(err, { provider: this.name, operation: "embed" });
    }
  }

  async generateText(prompt: string, options: GenerateTextOptions = {}): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.llmModel,
          messages: [{ role: "user", content: prompt }],
          response_format: options.format === "json" ? { type: "json_object" } : undefined,
        },
        { signal: options.signal },
      );
      return completion.choices[0]?.message.content ?? "";
    } catch (err) {
      throw toProviderError(err, { provider: this.name, operation: "generate" });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.retrieve(this.model);
      return true;
    } catch {
      return false;
    }
  }
}
