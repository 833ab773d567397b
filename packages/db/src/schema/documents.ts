import { pgTable, text, timestamp } from "drizzle-orm/pg-core";
import type { DocumentFileType } from "@docweave/types";

export const documents = pgTable("documents", {
  id: text("id").primaryKey(),
  filename: text("filename").notNull(),
  filetype: text("filetype").$type<DocumentFileType>().notNull().default("unknown"),
  ingestedAt: timestamp("ingested_at", { withTimezone: true }).notNull().defaultNow(),
});
