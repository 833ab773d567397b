import type { ProviderName } from "./pipeline.js";

export interface Source {
  text: string;
  score: number;
  metadata?: SourceMetadata;
}

export interface SourceMetadata {
  chunkId: string;
  documentId: string;
  sourceFilename: string;
  ordinal: number;
}

export interface RetrievalOptions {
  k?: number;
  fallbackEnabled?: boolean;
  provider?: ProviderName;
  signal?: AbortSignal;
}

export type RetrievalStrategy = "vector" | "text" | "none";

export interface RetrievalResult {
  sources: Source[];
  strategy: RetrievalStrategy;
  /** true when the store is unreachable; distinct from "no matches" */
  degraded: boolean;
}

export interface StoreStatus {
  mode: "connected" | "degraded";
  reason?: string;
  since?: Date;
}

export interface StoreStats {
  connected: boolean;
  totalDocuments: number;
  totalChunks: number;
  indexExists: boolean;
}

export interface SystemStatus {
  store: StoreStatus;
  stats: StoreStats;
  storedDimensions: number | null;
  defaultProvider: ProviderName;
}

export interface HealthReport {
  healthy: boolean;
  providers: Partial<Record<ProviderName, boolean>>;
  embeddingTest: { success: boolean; dimensions?: number; error?: string };
  system: SystemStatus;
}
