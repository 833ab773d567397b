import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@docweave/types";
import type {
  EmbedCallOptions,
  GenerateTextOptions,
  IModelProvider,
} from "./model-provider.interface.js";
import { toProviderError } from "./provider-errors.js";

const DEFAULT_MODEL = "embed-english-v3.0";
const DEFAULT_LLM_MODEL = "command-r-plus";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  llmModel?: string;
  dimensions?: number;
}

export class CohereProvider implements IModelProvider {
  readonly name = "cohere";
  readonly kind = "remote";
  readonly maxBatchSize = BATCH_SIZE;
  readonly model: string;
  readonly dimensions: number;
  private client: CohereClient;
  private llmModel: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.llmModel = config.llmModel ?? DEFAULT_LLM_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generateEmbeddings(texts: string[], options: EmbedCallOptions = {}): Promise<EmbeddingResult> {
    try {
      const response = await this.client.v2.embed(
        {
          texts,
          model: this.model,
          inputType: "search_document",
          embeddingTypes: ["float"],
        },
        { maxRetries: 0, abortSignal: options.signal },
      );

      return {
        embeddings: response.embeddings.float ?? [],
        model: this.model,
        // Use actual tokensUsed from Cohere response for billing accuracy
        tokensUsed: response.meta?.billedUnits?.inputTokens ?? 0,
        dimensions: this.dimensions,
      };
    } catch (err) {
      throw toProviderError(err, { provider: this.name, operation: "embed" });
    }
  }

  async generateText(prompt: string, options: GenerateTextOptions = {}): Promise<string> {
    try {
      const response = await this.client.v2.chat(
        {
          model: this.llmModel,
          messages: [{ role: "user", content: prompt }],
          responseFormat: options.format === "json" ? { type: "json_object" } : undefined,
        },
        { maxRetries: 0, abortSignal: options.signal },
      );

      return (response.message.content ?? [])
        .map((part) => (part.type === "text" ? part.text : ""))
        .join("");
    } catch (err) {
      throw toProviderError(err, { provider: this.name, operation: "generate" });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.generateEmbeddings(["health check"]);
      return true;
    } catch {
      return false;
    }
  }
}
