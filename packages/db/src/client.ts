import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import type { Logger } from "@docweave/logger";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
  /** Receives server notices such as "relation already exists, skipping". */
  logger?: Logger;
}

const DEFAULT_POOL = { max: 10 };

export function createDbClient(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_POOL.max,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: (notice) => {
      options.logger?.debug({ notice: notice.message }, "Postgres notice");
    },
  });

  return {
    db: drizzle(connection, { schema }),
    connection,
    close: (): Promise<void> => connection.end({ timeout: 5 }),
  };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient["db"];
