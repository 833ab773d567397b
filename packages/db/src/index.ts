export * from "./schema/index.js";
export { createDbClient, type DbClient, type DbClientOptions, type Database } from "./client.js";
export { getSchemaSql } from "./migrations.js";
