export type { Chunk, StoredChunk, ChunkingConfig, ChunkResult } from "./chunk.js";
export { CHUNK_LINK_TYPE, chunkIdFor } from "./chunk.js";

export type {
  Document,
  DocumentFileType,
  DocumentSummary,
  TextStats,
  CachedDocument,
  DocumentCacheStats,
} from "./document.js";
export { detectFileType } from "./document.js";

export type {
  ProviderName,
  EmbeddingResult,
  IngestionInput,
  IngestionResult,
  GraphSchema,
  InferredSchema,
  ExtractedEntity,
  ExtractedRelationship,
  KnowledgeExtraction,
  ExtractionOutcome,
} from "./pipeline.js";
export { PROVIDER_NAMES } from "./pipeline.js";

export type {
  Source,
  SourceMetadata,
  RetrievalOptions,
  RetrievalStrategy,
  RetrievalResult,
  StoreStatus,
  StoreStats,
  SystemStatus,
  HealthReport,
} from "./query.js";

export type {
  AppConfig,
  DatabaseConfig,
  VectorStoreConfig,
  VectorStoreType,
  SimilarityMetric,
  EmbeddingsConfig,
  OllamaConfig,
  OpenAIConfig,
  GeminiConfig,
  CohereConfig,
  ChunkingSettings,
  ExtractionConfig,
  DocumentCacheConfig,
} from "./config.js";
