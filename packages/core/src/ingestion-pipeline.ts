import { randomUUID } from "node:crypto";
import { AppError, ValidationError } from "@docweave/errors";
import type { IChunker } from "@docweave/chunker";
import { zeroVectors } from "@docweave/embeddings";
import type { EmbeddingGateway } from "@docweave/embeddings";
import { createChildLogger, createSilentLogger } from "@docweave/logger";
import type { Logger } from "@docweave/logger";
import type { DegradableVectorStore, PersistResult } from "@docweave/vector-store";
import { chunkIdFor, detectFileType } from "@docweave/types";
import type {
  Chunk,
  ChunkResult,
  ChunkingConfig,
  Document,
  DocumentFileType,
  ExtractionOutcome,
  IngestionInput,
  IngestionResult,
  ProviderName,
  SimilarityMetric,
} from "@docweave/types";
import { selectSample } from "./knowledge-extractor.js";
import type { KnowledgeExtractor } from "./knowledge-extractor.js";

export interface IngestionDependencies {
  chunker: IChunker;
  chunking: ChunkingConfig;
  gateway: EmbeddingGateway;
  store: DegradableVectorStore;
  extractor: KnowledgeExtractor;
  indexName: string;
  metric: SimilarityMetric;
  extractionEnabled: boolean;
  logger?: Logger;
  now?: () => Date;
  onChunked?: (chunks: ChunkResult[]) => Promise<void>;
  onStored?: (result: PersistResult) => Promise<void>;
}

/** Pulls plain text out of an uploaded file. */
export interface TextExtractor {
  extractText(bytes: Uint8Array, fileType: Exclude<DocumentFileType, "unknown">): Promise<string>;
}

/** Decodes `.txt` uploads as UTF-8; other formats need a dedicated extractor. */
export const utf8TextExtractor: TextExtractor = {
  async extractText(bytes, fileType) {
    if (fileType !== "txt") {
      throw new ValidationError(`No text extractor available for ${fileType} files`);
    }
    return new TextDecoder("utf-8").decode(bytes);
  },
};

/**
 * Ingestion pipeline: Chunk -> Embed -> Store -> Extract
 *
 * Only an input that yields no chunks aborts the run. A failed embedding call
 * stores zero vectors and sets `embeddingsDegraded`; a failed store write
 * yields `persisted: false` and a failed knowledge save is counted in
 * `failedSaves`. Dimension and count mismatches, missing provider credentials
 * and caller aborts still throw.
 */
export async function ingest(
  input: IngestionInput,
  deps: IngestionDependencies,
): Promise<IngestionResult> {
  const documentId = randomUUID();
  const now = deps.now ?? (() => new Date());
  const logger = createChildLogger(deps.logger ?? createSilentLogger(), "ingestion", {
    documentId,
    filename: input.filename,
  });

  const providerName = input.embeddingProvider ?? deps.gateway.defaultProvider;
  const provider = deps.gateway.provider(providerName);
  let dimensions = deps.gateway.dimensionsOf(providerName);

  logger.info({ provider: providerName }, "Starting ingestion");

  // Phase 1: Index
  await deps.store.ensureIndex({ name: deps.indexName, dimensions, metric: deps.metric });

  // Phase 2: Chunk
  const pieces = deps.chunker.chunk(input.content, deps.chunking);
  if (pieces.length === 0) {
    throw new ValidationError("No content to process after chunking", {
      content: "must contain text",
    });
  }
  if (deps.onChunked) await deps.onChunked(pieces);

  // Phase 3: Embed, falling back to zero vectors
  let embeddings: number[][];
  let embeddingsDegraded = false;
  try {
    const batch = await deps.gateway.embedWithStatus(
      pieces.map((piece) => piece.content),
      { provider: providerName, signal: input.signal },
    );
    embeddings = batch.vectors;
    if (batch.degraded) {
      logger.warn({ err: batch.error, provider: providerName }, "Stored zero vectors from the offline fallback");
      embeddingsDegraded = true;
    }
  } catch (err) {
    if (input.signal?.aborted || (AppError.isAppError(err) && !err.isOperational)) {
      throw err;
    }
    logger.warn({ err, provider: providerName }, "Embedding generation failed, storing zero vectors");
    embeddings = zeroVectors(pieces.length, dimensions);
    embeddingsDegraded = true;
  }

  const generated = embeddings[0]?.length ?? dimensions;
  if (generated !== dimensions) {
    // First vectors from this provider disagree with its configured size.
    dimensions = generated;
    await deps.store.ensureIndex({ name: deps.indexName, dimensions, metric: deps.metric });
  }

  // Phase 4: Store
  const ingestedAt = now();
  const document: Document = {
    id: documentId,
    filename: input.filename,
    filetype: detectFileType(input.filename),
    ingestedAt,
  };
  const chunks: Chunk[] = pieces.map((piece, ordinal) => ({
    id: chunkIdFor(documentId, ordinal),
    documentId,
    text: piece.content,
    embedding: embeddings[ordinal] ?? new Array<number>(dimensions).fill(0),
    ordinal,
    sourceFilename: input.filename,
    createdAt: ingestedAt,
  }));

  const persistResult = await deps.store.persistDocument(document, chunks);
  if (deps.onStored) await deps.onStored(persistResult);

  // Phase 5: Knowledge extraction
  const extraction = await runExtraction(input, chunks, persistResult.persisted, {
    deps,
    providerName,
    local: provider.kind === "local",
    logger,
  });

  logger.info(
    {
      chunkCount: chunks.length,
      persisted: persistResult.persisted,
      embeddingsDegraded,
      extraction: extraction.status,
    },
    "Ingestion completed",
  );

  return {
    documentId,
    filename: input.filename,
    chunkCount: chunks.length,
    persisted: persistResult.persisted,
    embeddingsDegraded,
    extraction,
  };
}

/**
 * Validates the file name, pulls the text out with `extractor` and ingests it.
 * Only `.txt` and `.pdf` uploads are accepted.
 */
export async function ingestFile(
  bytes: Uint8Array,
  filename: string,
  extractor: TextExtractor,
  deps: IngestionDependencies,
  options: Pick<IngestionInput, "embeddingProvider" | "signal"> = {},
): Promise<IngestionResult> {
  const fileType = detectFileType(filename);
  if (fileType === "unknown") {
    throw new ValidationError(`Unsupported file type: ${filename}`, {
      filename: "must end in .txt or .pdf",
    });
  }

  const content = await extractor.extractText(bytes, fileType);
  return ingest({ content, filename, ...options }, deps);
}

async function runExtraction(
  input: IngestionInput,
  chunks: Chunk[],
  persisted: boolean,
  ctx: { deps: IngestionDependencies; providerName: ProviderName; local: boolean; logger: Logger },
): Promise<ExtractionOutcome> {
  const { deps, providerName, logger } = ctx;

  let skipReason: string | null = null;
  if (!deps.extractionEnabled) {
    skipReason = "Knowledge extraction is disabled";
  } else if (!ctx.local) {
    skipReason = `Knowledge extraction runs with the local provider only, not ${providerName}`;
  } else if (!persisted) {
    skipReason = "Document was not persisted";
  } else if (!(await deps.gateway.healthCheck(providerName))) {
    skipReason = `${providerName} is not reachable`;
  }

  if (skipReason !== null) {
    logger.warn({ reason: skipReason }, "Skipping knowledge extraction");
    return { status: "skipped", reason: skipReason };
  }

  const callOptions = { provider: providerName, signal: input.signal };
  const schema = await deps.extractor.inferSchema(selectSample(input.content), callOptions);

  let entities = 0;
  let relationships = 0;
  let failedSaves = 0;
  for (const chunk of chunks) {
    const extraction = await deps.extractor.extract(chunk.text, schema, callOptions);
    if (extraction.entities.length === 0 && extraction.relationships.length === 0) continue;

    try {
      await deps.store.saveKnowledge(chunk.id, extraction);
    } catch (err) {
      failedSaves++;
      logger.warn({ err, chunkId: chunk.id }, "Failed to save extracted knowledge");
      continue;
    }
    entities += extraction.entities.length;
    relationships += extraction.relationships.length;
  }

  return {
    status: "completed",
    schema,
    chunksProcessed: chunks.length,
    entities,
    relationships,
    failedSaves,
  };
}
