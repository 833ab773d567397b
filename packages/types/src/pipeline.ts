export type ProviderName = "ollama" | "openai" | "gemini" | "cohere";

export const PROVIDER_NAMES: readonly ProviderName[] = ["ollama", "openai", "gemini", "cohere"];

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface IngestionInput {
  content: string;
  filename: string;
  embeddingProvider?: ProviderName;
  signal?: AbortSignal;
}

export interface GraphSchema {
  nodeLabels: string[];
  relationshipTypes: string[];
}

export interface InferredSchema extends GraphSchema {
  source: "llm" | "fallback";
  reason?: string;
}

export interface ExtractedEntity {
  label: string;
  name: string;
}

export interface ExtractedRelationship {
  source: string;
  target: string;
  type: string;
}

export interface KnowledgeExtraction {
  entities: ExtractedEntity[];
  relationships: ExtractedRelationship[];
}

export type ExtractionOutcome =
  | {
      status: "completed";
      schema: InferredSchema;
      chunksProcessed: number;
      entities: number;
      relationships: number;
      /** Chunks whose extracted knowledge could not be written */
      failedSaves: number;
    }
  | { status: "skipped"; reason: string };

export interface IngestionResult {
  documentId: string;
  filename: string;
  chunkCount: number;
  /** false when the vector store was unreachable and the write became a no-op */
  persisted: boolean;
  /** true when zero vectors were stored because embedding generation failed */
  embeddingsDegraded: boolean;
  extraction: ExtractionOutcome;
}
