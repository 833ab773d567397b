import { pgTable, text, timestamp, integer, index, primaryKey } from "drizzle-orm/pg-core";
import { documents } from "./documents.js";
import { vector } from "./vector.js";

export const chunks = pgTable(
  "chunks",
  {
    id: text("id").primaryKey(), // `${documentId}-chunk-${ordinal}`
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    text: text("text").notNull(),
    embedding: vector("embedding").notNull(),
    ordinal: integer("ordinal").notNull(),
    sourceFilename: text("source_filename").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    documentOrdinalIdx: index("chunks_document_ordinal_idx").on(table.documentId, table.ordinal),
  }),
);

/** Reading-order edges between consecutive chunks of one document. */
export const chunkLinks = pgTable(
  "chunk_links",
  {
    fromChunkId: text("from_chunk_id")
      .notNull()
      .references(() => chunks.id, { onDelete: "cascade" }),
    toChunkId: text("to_chunk_id")
      .notNull()
      .references(() => chunks.id, { onDelete: "cascade" }),
    type: text("type").notNull().default("NEXT"),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.fromChunkId, table.toChunkId] }),
  }),
);
