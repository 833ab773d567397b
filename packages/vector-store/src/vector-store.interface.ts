import type {
  Chunk,
  Document,
  DocumentSummary,
  KnowledgeExtraction,
  SimilarityMetric,
  StoreStats,
  StoredChunk,
} from "@docweave/types";

export interface IndexSpec {
  name: string;
  dimensions: number;
  metric: SimilarityMetric;
}

export interface ScoredChunk {
  chunk: StoredChunk;
  score: number;
}

export type BackendStats = Omit<StoreStats, "connected">;

export interface IVectorStore {
  readonly backend: string;

  /** Creates the similarity index when missing. Fails on a dimension that differs from stored vectors. */
  ensureIndex(spec: IndexSpec): Promise<void>;
  /** Writes the document and all its chunks atomically, then links chunk i to i+1. */
  insertDocument(document: Document, chunks: Chunk[]): Promise<void>;
  /** Nearest neighbours, highest score first. */
  search(vector: number[], k: number): Promise<ScoredChunk[]>;
  /** Case-insensitive substring match in ingestion and ordinal order, score 1. */
  searchText(query: string, k: number): Promise<ScoredChunk[]>;
  getStoredDimensions(): Promise<number | null>;
  saveKnowledge(chunkId: string, extraction: KnowledgeExtraction): Promise<void>;
  listDocuments(): Promise<DocumentSummary[]>;
  deleteDocument(documentId: string): Promise<boolean>;
  /** Drops the similarity index and deletes every record. */
  clear(): Promise<void>;
  getStats(): Promise<BackendStats>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
