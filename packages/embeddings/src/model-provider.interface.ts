import type { EmbeddingResult, ProviderName } from "@docweave/types";

export type ProviderKind = "local" | "remote";

export interface EmbedCallOptions {
  signal?: AbortSignal;
}

export interface GenerateTextOptions {
  /** Ask the model for a JSON document instead of free text. */
  format?: "json";
  signal?: AbortSignal;
}

/**
 * One model backend. Local providers take a whole input in a single call;
 * remote ones are fed at most `maxBatchSize` texts per request.
 */
export interface IModelProvider {
  readonly name: ProviderName;
  readonly kind: ProviderKind;
  readonly model: string;
  readonly dimensions: number;
  readonly maxBatchSize: number;

  generateEmbeddings(texts: string[], options?: EmbedCallOptions): Promise<EmbeddingResult>;
  generateText(prompt: string, options?: GenerateTextOptions): Promise<string>;
  healthCheck(): Promise<boolean>;
}
