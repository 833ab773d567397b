import { createDbClient } from "@docweave/db";
import { maskConnectionString } from "@docweave/logger";
import type { Logger } from "@docweave/logger";
import type { AppConfig } from "@docweave/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { PgVectorStore } from "./pgvector-store.js";
import { InMemoryVectorStore } from "./in-memory-store.js";

export type VectorStoreFactoryConfig = Pick<AppConfig, "vectorStore" | "database">;

export function createVectorStore(
  config: VectorStoreFactoryConfig,
  options: { logger?: Logger } = {},
): IVectorStore {
  switch (config.vectorStore.type) {
    case "memory":
      return new InMemoryVectorStore(config.vectorStore.similarity);
    case "pgvector":
      if (!config.database.url) {
        throw new Error("database.url is required for pgvector store");
      }
      options.logger?.info(
        { url: maskConnectionString(config.database.url), poolMax: config.database.poolMax },
        "Using pgvector store",
      );
      return new PgVectorStore({
        client: createDbClient({
          url: config.database.url,
          maxConnections: config.database.poolMax,
          logger: options.logger,
        }),
        indexName: config.vectorStore.indexName,
        metric: config.vectorStore.similarity,
        logger: options.logger,
      });
    default:
      throw new Error(`Unknown vector store type: ${String(config.vectorStore.type)}`);
  }
}
