import type { Database } from "../db/index.js";
import { scrapeResults } from "../db/schema.js";
import type { ResultSink, ScrapeArtifact } from "./types.js";

/**
 * Upserts one row per source URL. `created_at` is only set on first insert so
 * persisting identical results again leaves the row unchanged.
 */
export class PostgresResultSink implements ResultSink {
  constructor(private readonly db: Database) {}

  async persist(artifact: ScrapeArtifact): Promise<void> {
    await this.db
      .insert(scrapeResults)
      .values({ sourceUrl: artifact.source_url, data: artifact.data })
      .onConflictDoUpdate({
        target: scrapeResults.sourceUrl,
        set: { data: artifact.data },
      });
  }
}
