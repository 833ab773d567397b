import { pgTable, text, timestamp, primaryKey, unique } from "drizzle-orm/pg-core";
import { chunks } from "./chunks.js";

export const entities = pgTable(
  "entities",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    label: text("label").notNull(), // e.g., "Person", "Concept"
    name: text("name").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    labelNameUnique: unique("entities_label_name_unique").on(table.label, table.name),
  }),
);

export const chunkMentions = pgTable(
  "chunk_mentions",
  {
    chunkId: text("chunk_id")
      .notNull()
      .references(() => chunks.id, { onDelete: "cascade" }),
    entityId: text("entity_id")
      .notNull()
      .references(() => entities.id, { onDelete: "cascade" }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.chunkId, table.entityId] }),
  }),
);

export const entityRelations = pgTable(
  "entity_relations",
  {
    sourceEntityId: text("source_entity_id")
      .notNull()
      .references(() => entities.id, { onDelete: "cascade" }),
    targetEntityId: text("target_entity_id")
      .notNull()
      .references(() => entities.id, { onDelete: "cascade" }),
    type: text("type").notNull(), // e.g., "RELATED_TO"
  },
  (table) => ({
    pk: primaryKey({ columns: [table.sourceEntityId, table.targetEntityId, table.type] }),
  }),
);
