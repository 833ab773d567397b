import type { ProviderName } from "./pipeline.js";

export type VectorStoreType = "pgvector" | "memory";

export type SimilarityMetric = "cosine" | "euclidean" | "dot";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error" | "silent";
  database: DatabaseConfig;
  vectorStore: VectorStoreConfig;
  embeddings: EmbeddingsConfig;
  ollama: OllamaConfig;
  openai: OpenAIConfig;
  gemini: GeminiConfig;
  cohere: CohereConfig;
  chunking: ChunkingSettings;
  extraction: ExtractionConfig;
  documentCache: DocumentCacheConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface VectorStoreConfig {
  type: VectorStoreType;
  indexName: string;
  similarity: SimilarityMetric;
}

export interface EmbeddingsConfig {
  defaultProvider: ProviderName;
  dimensions: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  timeoutMs: number;
  offlineFallback: boolean;
}

export interface OllamaConfig {
  baseUrl: string;
  embedModel: string;
  llmModel: string;
}

export interface OpenAIConfig {
  apiKey: string;
  embedModel: string;
  llmModel: string;
}

export interface GeminiConfig {
  apiKey: string;
  embedModel: string;
  llmModel: string;
}

export interface CohereConfig {
  apiKey: string;
  embedModel: string;
  embedDimensions: number;
  llmModel: string;
}

export interface ChunkingSettings {
  chunkSize: number;
  chunkOverlap: number;
}

export interface ExtractionConfig {
  enabled: boolean;
}

export interface DocumentCacheConfig {
  ttlMinutes: number;
  maxDocuments: number;
  cleanupIntervalMinutes: number;
}
