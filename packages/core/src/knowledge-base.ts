import { CharacterChunker } from "@docweave/chunker";
import type { IChunker } from "@docweave/chunker";
import { DocumentCache } from "@docweave/document-cache";
import { EmbeddingGateway, createProviderRegistry } from "@docweave/embeddings";
import type { ProviderRegistry } from "@docweave/embeddings";
import { createChildLogger, createLogger } from "@docweave/logger";
import type { Logger } from "@docweave/logger";
import { DegradableVectorStore, createVectorStore } from "@docweave/vector-store";
import type { IVectorStore } from "@docweave/vector-store";
import type {
  AppConfig,
  IngestionInput,
  IngestionResult,
  RetrievalOptions,
  Source,
  StoreStatus,
} from "@docweave/types";
import { ingest, ingestFile } from "./ingestion-pipeline.js";
import type { IngestionDependencies, TextExtractor } from "./ingestion-pipeline.js";
import { KnowledgeExtractor } from "./knowledge-extractor.js";
import { Retriever } from "./retriever.js";

const MINUTE_MS = 60_000;

export interface KnowledgeBaseOptions {
  /** Default: a root logger at `config.logLevel`, pretty in development */
  logger?: Logger;
  /** Replaces the providers built from configuration. */
  providers?: ProviderRegistry;
  /** Replaces the backend built from configuration; it is still wrapped for degraded mode. */
  vectorStore?: IVectorStore;
  chunker?: IChunker;
}

export interface KnowledgeBase {
  readonly logger: Logger;
  readonly gateway: EmbeddingGateway;
  readonly store: DegradableVectorStore;
  readonly cache: DocumentCache;
  readonly retriever: Retriever;
  readonly extractor: KnowledgeExtractor;
  /** Checks store connectivity; an unreachable store leaves the base in degraded mode. */
  init(): Promise<StoreStatus>;
  ingest(input: IngestionInput): Promise<IngestionResult>;
  ingestFile(
    bytes: Uint8Array,
    filename: string,
    extractor: TextExtractor,
    options?: Pick<IngestionInput, "embeddingProvider" | "signal">,
  ): Promise<IngestionResult>;
  retrieve(question: string, options?: RetrievalOptions): Promise<Source[]>;
  /** Stops the cache reaper and closes the store connection. */
  close(): Promise<void>;
}

export function createKnowledgeBase(
  config: AppConfig,
  options: KnowledgeBaseOptions = {},
): KnowledgeBase {
  const logger =
    options.logger ??
    createLogger({ level: config.logLevel, pretty: config.nodeEnv === "development" });

  const gateway = new EmbeddingGateway(options.providers ?? createProviderRegistry(config), {
    ...config.embeddings,
    logger,
  });

  const backend = options.vectorStore ?? createVectorStore(config, { logger });
  const store = new DegradableVectorStore(backend, { logger });

  const cache = new DocumentCache({
    ttlMs: config.documentCache.ttlMinutes * MINUTE_MS,
    maxDocuments: config.documentCache.maxDocuments,
    cleanupIntervalMs: config.documentCache.cleanupIntervalMinutes * MINUTE_MS,
    logger,
  });

  const extractor = new KnowledgeExtractor(gateway, { logger });
  const retriever = new Retriever({ gateway, store, logger });

  const ingestion: IngestionDependencies = {
    chunker: options.chunker ?? new CharacterChunker(),
    chunking: config.chunking,
    gateway,
    store,
    extractor,
    indexName: config.vectorStore.indexName,
    metric: config.vectorStore.similarity,
    extractionEnabled: config.extraction.enabled,
    logger,
  };

  const baseLogger = createChildLogger(logger, "knowledge-base");
  let closed = false;

  return {
    logger,
    gateway,
    store,
    cache,
    retriever,
    extractor,

    async init() {
      const status = await store.connect();
      baseLogger.info(
        {
          store: backend.backend,
          mode: status.mode,
          defaultProvider: gateway.defaultProvider,
          providers: gateway.listProviders().map((provider) => provider.name),
        },
        "Knowledge base initialised",
      );
      return status;
    },

    ingest(input) {
      return ingest(input, ingestion);
    },

    ingestFile(bytes, filename, textExtractor, ingestOptions) {
      return ingestFile(bytes, filename, textExtractor, ingestion, ingestOptions);
    },

    retrieve(question, retrievalOptions) {
      return retriever.retrieve(question, retrievalOptions);
    },

    async close() {
      if (closed) return;
      closed = true;
      cache.close();
      await store.close();
      baseLogger.info("Knowledge base closed");
    },
  };
}
