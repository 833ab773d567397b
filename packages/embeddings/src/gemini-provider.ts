import { GoogleGenerativeAI } from "@google/generative-ai";
import type { GenerativeModel } from "@google/generative-ai";
import type { EmbeddingResult } from "@docweave/types";
import type {
  EmbedCallOptions,
  GenerateTextOptions,
  IModelProvider,
} from "./model-provider.interface.js";
import { toProviderError } from "./provider-errors.js";

const DEFAULT_EMBED_MODEL = "text-embedding-004";
const DEFAULT_LLM_MODEL = "gemini-1.5-flash";
const DEFAULT_DIMENSIONS = 768;
const BATCH_SIZE = 100; // batchEmbedContents request limit

export interface GeminiProviderConfig {
  apiKey: string;
  model?: string;
  llmModel?: string;
  dimensions?: number;
}

export class GeminiProvider implements IModelProvider {
  readonly name = "gemini";
  readonly kind = "remote";
  readonly maxBatchSize = BATCH_SIZE;
  readonly model: string;
  readonly dimensions: number;
  private client: GoogleGenerativeAI;
  private embedder: GenerativeModel;
  private llmModel: string;

  constructor(config: GeminiProviderConfig) {
    this.client = new GoogleGenerativeAI(config.apiKey);
    this.model = config.model ?? DEFAULT_EMBED_MODEL;
    this.llmModel = config.llmModel ?? DEFAULT_LLM_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.embedder = this.client.getGenerativeModel({ model: this.model });
  }

  async generateEmbeddings(texts: string[], options: EmbedCallOptions = {}): Promise<EmbeddingResult> {
    try {
      const response = await this.embedder.batchEmbedContents(
        {
          requests: texts.map((text) => ({
            content: { role: "user", parts: [{ text }] },
          })),
        },
        { signal: options.signal },
      );

      return {
        embeddings: response.embeddings.map((embedding) => embedding.values),
        model: this.model,
        tokensUsed: 0,
        dimensions: this.dimensions,
      };
    } catch (err) {
      throw toProviderError(err, { provider: this.name, operation: "embed" });
    }
  }

  async generateText(prompt: string, options: GenerateTextOptions = {}): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: this.llmModel,
      ...(options.format === "json"
        ? { generationConfig: { responseMimeType: "application/json" } }
        : {}),
    });

    try {
      const result = await model.generateContent(prompt, { signal: options.signal });
      return result.response.text();
    } catch (err) {
      throw toProviderError(err, { provider: this.name, operation: "generate" });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embedder.embedContent("health check");
      return true;
    } catch {
      return false;
    }
  }
}
