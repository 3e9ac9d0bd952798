import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig, type AppConfig } from "./lib/config.js";
import { createDatabase } from "./db/index.js";
import { HttpLinkDiscoverer } from "./capabilities/http-discoverer.js";
import { ReadabilityContentRetriever } from "./capabilities/readability-retriever.js";
import { LlmSummarizer } from "./capabilities/llm-summarizer.js";
import { JsonFileResultSink } from "./capabilities/file-sink.js";
import { PostgresResultSink } from "./capabilities/postgres-sink.js";
import type { ResultSink } from "./capabilities/types.js";
import { WorkflowEngine } from "./workflow/engine.js";
import { JobRegistry } from "./registry/job-registry.js";
import { createJobService } from "./services/job.service.js";

function createSink(config: AppConfig): { sink: ResultSink; close: () => Promise<void> } {
  if (config.resultSink === "postgres") {
    const { db, close } = createDatabase(config.databaseUrl);
    console.log("Persisting results to Postgres");
    return { sink: new PostgresResultSink(db), close };
  }

  console.log(`Persisting results to ${config.outputDir}`);
  return { sink: new JsonFileResultSink(config.outputDir), close: async () => {} };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const { sink, close } = createSink(config);

  const engine = new WorkflowEngine({
    options: config.workflow,
    capabilities: {
      discoverer: new HttpLinkDiscoverer({ userAgent: config.userAgent }),
      retriever: new ReadabilityContentRetriever({ userAgent: config.userAgent }),
      summarizer: new LlmSummarizer(config.openaiModel),
      sink,
    },
  });
  const registry = new JobRegistry((url, label) => engine.run(url, label));
  const app = createApp(createJobService(registry));

  const server = app.listen(config.port, () => {
    console.log(`Worker listening on port ${config.port}`);
  });

  process.on("SIGTERM", () => {
    console.log("Shutting down...");
    server.close(() => {
      close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error("Failed to close database:", error);
          process.exit(1);
        });
    });
  });
}

main().catch((error) => {
  console.error("Worker error:", error);
  process.exit(1);
});
