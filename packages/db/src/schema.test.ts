import { describe, it, expect } from "vitest";
import { getTableName } from "drizzle-orm";
import { getTableConfig } from "drizzle-orm/pg-core";
import { chunks, chunkLinks, documents, entities, parseVectorLiteral, toVectorLiteral } from "./schema/index.js";
import { getSchemaSql } from "./migrations.js";

describe("vector literal", () => {
  it("formats numbers in pgvector text form", () => {
    expect(toVectorLiteral([0.5, -1, 0])).toBe("[0.5,-1,0]");
  });

  it("parses pgvector text form", () => {
    expect(parseVectorLiteral("[0.5,-1,0]")).toEqual([0.5, -1, 0]);
    expect(parseVectorLiteral("[]")).toEqual([]);
  });
});

describe("schema", () => {
  it("names the tables", () => {
    expect(getTableName(documents)).toBe("documents");
    expect(getTableName(chunks)).toBe("chunks");
    expect(getTableName(chunkLinks)).toBe("chunk_links");
    expect(getTableName(entities)).toBe("entities");
  });

  it("cascades chunk deletion from documents", () => {
    const [fk] = getTableConfig(chunks).foreignKeys;
    expect(fk?.onDelete).toBe("cascade");
  });

  it("stores embeddings in a vector column", () => {
    expect(chunks.embedding.getSQLType()).toBe("vector");
  });

  it("creates every table in the DDL", () => {
    const ddl = getSchemaSql();
    for (const table of ["documents", "chunks", "chunk_links", "entities", "chunk_mentions", "entity_relations"]) {
      expect(ddl).toContain(`CREATE TABLE IF NOT EXISTS ${table} (`);
    }
    expect(ddl).toContain("CREATE EXTENSION IF NOT EXISTS vector;");
  });
});
