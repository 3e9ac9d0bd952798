import { createHash } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { serializeArtifact } from "../workflow/artifact.js";
import type { ResultSink, ScrapeArtifact } from "./types.js";

/** `example.com-1a2b3c4d5e6f.json`: readable host plus a stable hash of the full URL. */
export function artifactFileName(sourceUrl: string): string {
  const digest = createHash("sha256").update(sourceUrl).digest("hex").slice(0, 12);
  const host = URL.canParse(sourceUrl)
    ? new URL(sourceUrl).hostname.replace(/[^a-z0-9.-]/gi, "_")
    : "";
  return `${host || "source"}-${digest}.json`;
}

/**
 * One JSON file per source URL. Writing the same artifact twice leaves the
 * file byte-for-byte unchanged.
 */
export class JsonFileResultSink implements ResultSink {
  constructor(private readonly outputDir: string) {}

  pathFor(sourceUrl: string): string {
    return path.join(this.outputDir, artifactFileName(sourceUrl));
  }

  async persist(artifact: ScrapeArtifact, signal?: AbortSignal): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
    await writeFile(this.pathFor(artifact.source_url), serializeArtifact(artifact), {
      encoding: "utf8",
      signal,
    });
  }
}
