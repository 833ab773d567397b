import { DimensionMismatchError, StoreUnavailableError, withRetry } from "@docweave/errors";
import { createChildLogger, createSilentLogger } from "@docweave/logger";
import type { Logger } from "@docweave/logger";
import type {
  Chunk,
  Document,
  DocumentSummary,
  KnowledgeExtraction,
  StoreStats,
  StoreStatus,
} from "@docweave/types";
import type { IVectorStore, IndexSpec, ScoredChunk } from "./vector-store.interface.js";

export interface DegradableVectorStoreOptions {
  logger?: Logger;
  /** Retries of a document write before it is absorbed. Default: 2 */
  writeRetries?: number;
  /** Default: 500 */
  retryBaseDelayMs?: number;
  now?: () => Date;
}

export interface PersistResult {
  documentId: string;
  persisted: boolean;
}

const DISCONNECTED_STATS: StoreStats = {
  connected: false,
  totalDocuments: 0,
  totalChunks: 0,
  indexExists: false,
};

/**
 * Wraps a backend with an explicit degraded mode. Once the backend is found
 * unreachable, writes become no-ops, reads return nothing and admin
 * operations fail, until `refresh()` sees the backend again. Callers tell
 * "degraded" from "empty" through `status`.
 */
export class DegradableVectorStore {
  private current: StoreStatus = { mode: "connected" };
  private readonly logger: Logger;
  private readonly writeRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly backend: IVectorStore,
    options: DegradableVectorStoreOptions = {},
  ) {
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), "vector-store", {
      backend: backend.backend,
    });
    this.writeRetries = options.writeRetries ?? 2;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.now = options.now ?? (() => new Date());
  }

  get status(): StoreStatus {
    return { ...this.current };
  }

  get isDegraded(): boolean {
    return this.current.mode === "degraded";
  }

  /** Health-checks the backend and sets the mode accordingly. */
  async connect(): Promise<StoreStatus> {
    const healthy = await this.backend.healthCheck();
    if (healthy) {
      if (this.isDegraded) {
        this.logger.info("Vector store reachable again");
      }
      this.current = { mode: "connected" };
    } else {
      this.degrade("Health check failed");
    }
    return this.status;
  }

  refresh(): Promise<StoreStatus> {
    return this.connect();
  }

  async ensureIndex(spec: IndexSpec): Promise<void> {
    if (this.isDegraded) return;
    await this.guard(() => this.backend.ensureIndex(spec), undefined);
  }

  /**
   * Writes one document with its chunks. Connection failures are retried and
   * then degrade the store; any other failure except a dimension mismatch is
   * logged and reported as `persisted: false`.
   */
  async persistDocument(document: Document, chunks: Chunk[]): Promise<PersistResult> {
    if (this.isDegraded) {
      this.logger.warn({ documentId: document.id }, "Store degraded, skipping document write");
      return { documentId: document.id, persisted: false };
    }

    try {
      await withRetry(() => this.backend.insertDocument(document, chunks), {
        maxRetries: this.writeRetries,
        baseDelayMs: this.retryBaseDelayMs,
        retryableErrors: ["STORE_UNAVAILABLE"],
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn(
            { documentId: document.id, attempt, delayMs, err: error },
            "Document write failed, retrying",
          );
        },
      });
      return { documentId: document.id, persisted: true };
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        this.degrade(err.message);
        return { documentId: document.id, persisted: false };
      }
      if (err instanceof DimensionMismatchError) {
        throw err;
      }
      this.logger.warn({ documentId: document.id, err }, "Document write failed, not persisted");
      return { documentId: document.id, persisted: false };
    }
  }

  async search(vector: number[], k: number): Promise<ScoredChunk[]> {
    if (this.isDegraded) return [];
    return this.guard(() => this.backend.search(vector, k), []);
  }

  async searchText(query: string, k: number): Promise<ScoredChunk[]> {
    if (this.isDegraded) return [];
    return this.guard(() => this.backend.searchText(query, k), []);
  }

  async getStoredDimensions(): Promise<number | null> {
    if (this.isDegraded) return null;
    return this.guard(() => this.backend.getStoredDimensions(), null);
  }

  async saveKnowledge(chunkId: string, extraction: KnowledgeExtraction): Promise<void> {
    if (this.isDegraded) return;
    await this.guard(() => this.backend.saveKnowledge(chunkId, extraction), undefined);
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    if (this.isDegraded) return [];
    return this.guard(() => this.backend.listDocuments(), []);
  }

  async getStats(): Promise<StoreStats> {
    if (this.isDegraded) return { ...DISCONNECTED_STATS };
    const stats = await this.guard(() => this.backend.getStats(), null);
    return stats ? { connected: true, ...stats } : { ...DISCONNECTED_STATS };
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    return this.admin(() => this.backend.deleteDocument(documentId));
  }

  async clear(): Promise<void> {
    await this.admin(() => this.backend.clear());
  }

  healthCheck(): Promise<boolean> {
    return this.backend.healthCheck();
  }

  close(): Promise<void> {
    return this.backend.close();
  }

  private async admin<T>(fn: () => Promise<T>): Promise<T> {
    if (this.isDegraded) {
      throw new StoreUnavailableError(
        `Vector store is degraded: ${this.current.reason ?? "unreachable"}`,
      );
    }
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreUnavailableError) this.degrade(err.message);
      throw err;
    }
  }

  /** Runs a backend call; a StoreUnavailableError degrades the store and yields `fallback`. */
  private async guard<T>(fn: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        this.degrade(err.message);
        return fallback;
      }
      throw err;
    }
  }

  private degrade(reason: string): void {
    if (this.isDegraded) return;
    this.current = { mode: "degraded", reason, since: this.now() };
    this.logger.error({ reason }, "Vector store unavailable, entering degraded mode");
  }
}
