import { pgSchema, text, timestamp, jsonb } from "drizzle-orm/pg-core";
import type { ResultEntry } from "../capabilities/types.js";

export const digestSchema = pgSchema("digest");

export const scrapeResults = digestSchema.table("scrape_results", {
  sourceUrl: text("source_url").primaryKey(),
  data: jsonb("data").$type<ResultEntry[]>().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export type ScrapeResultRow = typeof scrapeResults.$inferSelect;
export type NewScrapeResultRow = typeof scrapeResults.$inferInsert;
