import { randomUUID } from "node:crypto";
import { asc, count, desc, eq, ilike, sql } from "drizzle-orm";
import {
  chunkLinks,
  chunkMentions,
  chunks,
  documents,
  entities,
  entityRelations,
  getSchemaSql,
  toVectorLiteral,
} from "@docweave/db";
import type { DbClient } from "@docweave/db";
import { AppError, DimensionMismatchError, StoreUnavailableError } from "@docweave/errors";
import { createChildLogger, createSilentLogger } from "@docweave/logger";
import type { Logger } from "@docweave/logger";
import { CHUNK_LINK_TYPE } from "@docweave/types";
import type {
  Chunk,
  Document,
  DocumentSummary,
  KnowledgeExtraction,
  SimilarityMetric,
} from "@docweave/types";
import type { BackendStats, IVectorStore, IndexSpec, ScoredChunk } from "./vector-store.interface.js";
import {
  PG_METRICS,
  assertDimensions,
  assertIdentifier,
  escapeLike,
  indexDdl,
  scoreFromDistance,
} from "./similarity.js";

export interface PgVectorStoreOptions {
  client: DbClient;
  indexName: string;
  metric: SimilarityMetric;
  logger?: Logger;
}

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "CONNECT_TIMEOUT",
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
]);

/** True for socket-level failures from postgres.js, including ones wrapped as `cause`. */
export function isConnectionError(err: unknown, depth = 0): boolean {
  if (typeof err !== "object" || err === null || depth > 3) return false;
  if ("code" in err && typeof err.code === "string" && CONNECTION_ERROR_CODES.has(err.code)) {
    return true;
  }
  return "cause" in err && isConnectionError(err.cause, depth + 1);
}

const chunkColumns = {
  id: chunks.id,
  documentId: chunks.documentId,
  text: chunks.text,
  ordinal: chunks.ordinal,
  sourceFilename: chunks.sourceFilename,
  createdAt: chunks.createdAt,
};

/**
 * PostgreSQL + pgvector backend. Chunks live in one table with an untyped
 * `vector` column; the HNSW index is built on a fixed-dimension cast so one
 * deployment serves exactly one embedding size.
 */
export class PgVectorStore implements IVectorStore {
  readonly backend = "pgvector";
  private readonly client: DbClient;
  private readonly indexName: string;
  private metric: SimilarityMetric;
  private readonly logger: Logger;
  private schemaReady = false;

  constructor(options: PgVectorStoreOptions) {
    assertIdentifier(options.indexName);
    this.client = options.client;
    this.indexName = options.indexName;
    this.metric = options.metric;
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), "pgvector-store");
  }

  private get db() {
    return this.client.db;
  }

  async ensureIndex(spec: IndexSpec): Promise<void> {
    assertIdentifier(spec.name);
    assertDimensions(spec.dimensions);

    await this.run("ensureIndex", async () => {
      const stored = await this.storedDimensions();
      if (stored !== null && stored !== spec.dimensions) {
        throw new DimensionMismatchError(stored, spec.dimensions, "index");
      }

      const existing = await this.db.execute<{ indexdef: string }>(
        sql`SELECT indexdef FROM pg_indexes WHERE indexname = ${spec.name}`,
      );
      const definition = existing[0]?.indexdef;
      if (definition !== undefined && !definition.includes(`vector(${String(spec.dimensions)})`)) {
        // Empty store with an index built for another dimension
        this.logger.warn({ index: spec.name }, "Rebuilding similarity index for new dimensions");
        await this.db.execute(sql.raw(`DROP INDEX IF EXISTS ${spec.name}`));
      }

      await this.db.execute(sql.raw(indexDdl(spec)));
      this.metric = spec.metric;
      this.logger.info({ index: spec.name, dimensions: spec.dimensions, metric: spec.metric }, "Similarity index ready");
    });
  }

  async insertDocument(document: Document, items: Chunk[]): Promise<void> {
    await this.run("insertDocument", () =>
      this.db.transaction(async (tx) => {
        await tx.insert(documents).values({
          id: document.id,
          filename: document.filename,
          filetype: document.filetype,
          ingestedAt: document.ingestedAt,
        });

        if (items.length === 0) return;

        const ordered = [...items].sort((a, b) => a.ordinal - b.ordinal);
        await tx.insert(chunks).values(
          ordered.map((chunk) => ({
            id: chunk.id,
            documentId: chunk.documentId,
            text: chunk.text,
            embedding: chunk.embedding,
            ordinal: chunk.ordinal,
            sourceFilename: chunk.sourceFilename,
            createdAt: chunk.createdAt,
          })),
        );

        const links = ordered.slice(1).map((chunk, i) => ({
          fromChunkId: ordered[i]?.id ?? chunk.id,
          toChunkId: chunk.id,
          type: CHUNK_LINK_TYPE,
        }));
        if (links.length > 0) {
          await tx.insert(chunkLinks).values(links);
        }
      }),
    );
  }

  async search(vector: number[], k: number): Promise<ScoredChunk[]> {
    if (vector.length === 0 || k <= 0) return [];

    return this.run("search", async () => {
      const dims = sql.raw(String(vector.length));
      const operator = sql.raw(PG_METRICS[this.metric].operator);
      const distance = sql<number>`(${chunks.embedding}::vector(${dims}) ${operator} ${toVectorLiteral(vector)}::vector(${dims}))`;

      const rows = await this.db
        .select({ ...chunkColumns, distance })
        .from(chunks)
        .orderBy(distance)
        .limit(k);

      return rows.map(({ distance: d, ...chunk }) => ({
        chunk,
        score: scoreFromDistance(this.metric, Number(d)),
      }));
    });
  }

  async searchText(query: string, k: number): Promise<ScoredChunk[]> {
    if (query.length === 0 || k <= 0) return [];

    return this.run("searchText", async () => {
      const rows = await this.db
        .select(chunkColumns)
        .from(chunks)
        .innerJoin(documents, eq(chunks.documentId, documents.id))
        .where(ilike(chunks.text, `%${escapeLike(query)}%`))
        .orderBy(asc(documents.ingestedAt), asc(chunks.documentId), asc(chunks.ordinal))
        .limit(k);

      return rows.map((chunk) => ({ chunk, score: 1.0 }));
    });
  }

  async getStoredDimensions(): Promise<number | null> {
    return this.run("getStoredDimensions", () => this.storedDimensions());
  }

  async saveKnowledge(chunkId: string, extraction: KnowledgeExtraction): Promise<void> {
    if (extraction.entities.length === 0) return;

    await this.run("saveKnowledge", () =>
      this.db.transaction(async (tx) => {
        const unique = new Map(extraction.entities.map((e) => [`${e.label}\u0000${e.name}`, e]));
        const saved = await tx
          .insert(entities)
          .values([...unique.values()].map((e) => ({ id: randomUUID(), label: e.label, name: e.name })))
          .onConflictDoUpdate({
            target: [entities.label, entities.name],
            set: { name: sql`excluded.name` },
          })
          .returning({ id: entities.id, name: entities.name });

        await tx
          .insert(chunkMentions)
          .values(saved.map((entity) => ({ chunkId, entityId: entity.id })))
          .onConflictDoNothing();

        const idByName = new Map<string, string>();
        for (const entity of saved) {
          if (!idByName.has(entity.name)) idByName.set(entity.name, entity.id);
        }

        const relations = extraction.relationships.flatMap((rel) => {
          const source = idByName.get(rel.source);
          const target = idByName.get(rel.target);
          return source && target ? [{ sourceEntityId: source, targetEntityId: target, type: rel.type }] : [];
        });
        if (relations.length > 0) {
          await tx.insert(entityRelations).values(relations).onConflictDoNothing();
        }
      }),
    );
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    return this.run("listDocuments", async () => {
      const rows = await this.db
        .select({
          id: documents.id,
          filename: documents.filename,
          filetype: documents.filetype,
          ingestedAt: documents.ingestedAt,
          chunkCount: sql<number>`count(${chunks.id})::int`,
        })
        .from(documents)
        .leftJoin(chunks, eq(chunks.documentId, documents.id))
        .groupBy(documents.id)
        .orderBy(desc(documents.ingestedAt));
      return rows;
    });
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    return this.run("deleteDocument", async () => {
      const deleted = await this.db
        .delete(documents)
        .where(eq(documents.id, documentId))
        .returning({ id: documents.id });
      return deleted.length > 0;
    });
  }

  async clear(): Promise<void> {
    await this.run("clear", async () => {
      await this.db.execute(sql.raw(`DROP INDEX IF EXISTS ${this.indexName}`));
      await this.db.execute(
        sql`TRUNCATE entity_relations, chunk_mentions, entities, chunk_links, chunks, documents`,
      );
      this.logger.warn({ index: this.indexName }, "Vector store cleared");
    });
  }

  async getStats(): Promise<BackendStats> {
    return this.run("getStats", async () => {
      const [documentCount] = await this.db.select({ value: count() }).from(documents);
      const [chunkCount] = await this.db.select({ value: count() }).from(chunks);
      const index = await this.db.execute<{ exists: boolean }>(
        sql`SELECT EXISTS (SELECT 1 FROM pg_indexes WHERE indexname = ${this.indexName}) AS "exists"`,
      );

      return {
        totalDocuments: documentCount?.value ?? 0,
        totalChunks: chunkCount?.value ?? 0,
        indexExists: index[0]?.exists === true,
      };
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.db.execute(sql`SELECT 1`);
      return true;
    } catch (err) {
      this.logger.warn({ err }, "Vector store health check failed");
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private async storedDimensions(): Promise<number | null> {
    const [row] = await this.db
      .select({ dims: sql<number>`vector_dims(${chunks.embedding})` })
      .from(chunks)
      .limit(1);
    return row ? Number(row.dims) : null;
  }

  private async ensureSchema(): Promise<void> {
    if (this.schemaReady) return;
    await this.client.connection.unsafe(getSchemaSql());
    this.schemaReady = true;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      await this.ensureSchema();
      return await fn();
    } catch (err) {
      if (!AppError.isAppError(err) && isConnectionError(err)) {
        throw new StoreUnavailableError(`Vector store unreachable during ${operation}`, {
          details: { operation },
          cause: err,
        });
      }
      throw err;
    }
  }
}
