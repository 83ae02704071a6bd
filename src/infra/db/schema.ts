import {
  index,
  jsonb,
  pgTable,
  primaryKey,
  real,
  text,
  timestamp,
  vector,
} from "drizzle-orm/pg-core";

export const SCORED_RECORD_EMBEDDING_DIMENSION = 768;

export const scoredRecordsTable = pgTable(
  "scored_records",
  {
    companyName: text("company_name").notNull(),
    recordId: text("record_id").notNull(),
    source: text("source").notNull(),
    title: text("title").notNull(),
    body: text("body").notNull(),
    url: text("url").notNull(),
    publishedAt: timestamp("published_at", { withTimezone: true }),
    metadata: jsonb("metadata").$type<Record<string, string>>().notNull(),
    score: real("score").notNull(),
    referenceQuery: text("reference_query").notNull(),
    embedding: vector("embedding", {
      dimensions: SCORED_RECORD_EMBEDDING_DIMENSION,
    }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.companyName, table.recordId] }),
    companySourceIdx: index("scored_records_company_source_idx").on(
      table.companyName,
      table.source,
    ),
  }),
);

export type ScoredRecordRow = typeof scoredRecordsTable.$inferInsert;
