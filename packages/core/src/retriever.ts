import { AppError, DimensionMismatchError, errorMessage } from "@docweave/errors";
import type { EmbeddingGateway } from "@docweave/embeddings";
import { createChildLogger, createSilentLogger } from "@docweave/logger";
import type { Logger } from "@docweave/logger";
import type { DegradableVectorStore, ScoredChunk } from "@docweave/vector-store";
import type {
  HealthReport,
  ProviderName,
  RetrievalOptions,
  RetrievalResult,
  Source,
  SystemStatus,
} from "@docweave/types";

export interface RetrieverDependencies {
  gateway: EmbeddingGateway;
  store: DegradableVectorStore;
  logger?: Logger;
}

export const DEFAULT_TOP_K = 5;

function toSource({ chunk, score }: ScoredChunk): Source {
  return {
    text: chunk.text,
    score,
    metadata: {
      chunkId: chunk.id,
      documentId: chunk.documentId,
      sourceFilename: chunk.sourceFilename,
      ordinal: chunk.ordinal,
    },
  };
}

/**
 * Retrieval pipeline: Question -> Embed -> Vector Search -> Text Fallback
 *
 * A failed or empty vector search falls back to a case-insensitive substring
 * match. Offline zero vectors count as a failed embedding. The embedding error is rethrown only when the fallback finds nothing
 * too. A degraded store yields no sources and `degraded: true`.
 */
export class Retriever {
  private readonly logger: Logger;

  constructor(private readonly deps: RetrieverDependencies) {
    this.logger = createChildLogger(deps.logger ?? createSilentLogger(), "retriever");
  }

  async retrieve(question: string, options: RetrievalOptions = {}): Promise<Source[]> {
    const result = await this.retrieveWithStatus(question, options);
    return result.sources;
  }

  async retrieveWithStatus(question: string, options: RetrievalOptions = {}): Promise<RetrievalResult> {
    const { store } = this.deps;
    const k = options.k ?? DEFAULT_TOP_K;
    const fallbackEnabled = options.fallbackEnabled ?? true;

    if (store.isDegraded) {
      return { sources: [], strategy: "none", degraded: true };
    }

    let vectorError: unknown;
    let hits: ScoredChunk[] = [];
    try {
      hits = await this.vectorSearch(question, k, options);
    } catch (err) {
      if (options.signal?.aborted || (AppError.isAppError(err) && !err.isOperational)) {
        throw err;
      }
      vectorError = err;
      this.logger.warn({ err }, "Vector search failed");
    }

    if (hits.length > 0) {
      return { sources: hits.map(toSource), strategy: "vector", degraded: false };
    }

    if (fallbackEnabled) {
      const matches = await store.searchText(question, k);
      if (matches.length > 0) {
        this.logger.debug({ matches: matches.length }, "Answered by text search");
        return { sources: matches.map(toSource), strategy: "text", degraded: false };
      }
    }

    if (vectorError !== undefined) {
      throw vectorError;
    }
    return { sources: [], strategy: "none", degraded: store.isDegraded };
  }

  async getSystemStatus(): Promise<SystemStatus> {
    const { store, gateway } = this.deps;
    const stats = await store.getStats();
    const storedDimensions = await store.getStoredDimensions();

    return {
      store: store.status,
      stats,
      storedDimensions,
      defaultProvider: gateway.defaultProvider,
    };
  }

  /** Probes every configured provider and runs one test embedding through the default. */
  async healthCheck(): Promise<HealthReport> {
    const { gateway, store } = this.deps;

    await store.refresh();

    const providers: Partial<Record<ProviderName, boolean>> = {};
    for (const { name } of gateway.listProviders()) {
      providers[name] = await gateway.healthCheck(name);
    }

    let embeddingTest: HealthReport["embeddingTest"];
    try {
      const batch = await gateway.embedWithStatus(["health check"]);
      embeddingTest = batch.degraded
        ? { success: false, error: errorMessage(batch.error) }
        : { success: true, dimensions: batch.vectors[0]?.length ?? 0 };
    } catch (err) {
      embeddingTest = { success: false, error: errorMessage(err) };
    }

    const system = await this.getSystemStatus();

    return {
      healthy:
        providers[gateway.defaultProvider] === true && embeddingTest.success && system.stats.connected,
      providers,
      embeddingTest,
      system,
    };
  }

  private async vectorSearch(
    question: string,
    k: number,
    options: RetrievalOptions,
  ): Promise<ScoredChunk[]> {
    const { gateway, store } = this.deps;

    const batch = await gateway.embedWithStatus([question], {
      provider: options.provider,
      signal: options.signal,
    });
    // Zero vectors from the offline fallback would score every chunk alike
    if (batch.degraded) throw batch.error;
    const [vector] = batch.vectors;
    if (!vector) return [];

    const stored = await store.getStoredDimensions();
    if (stored !== null && stored !== vector.length) {
      throw new DimensionMismatchError(stored, vector.length, "query");
    }

    return store.search(vector, k);
  }
}
