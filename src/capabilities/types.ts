export interface Summary {
  title: string;
  description: string;
}

export interface ResultEntry {
  url: string;
  response: Summary;
}

/** Stored once per completed job. Field names are part of the file format. */
export interface ScrapeArtifact {
  source_url: string;
  data: ResultEntry[];
}

/**
 * Every capability call receives an AbortSignal that fires when the engine's
 * per-call timeout expires; adapters stop outstanding I/O when it does.
 */
export interface LinkDiscoverer {
  discoverLinks(seedUrl: string, signal?: AbortSignal): Promise<string[]>;
}

export interface ContentRetriever {
  /**
   * One call per batch. URLs absent from the returned map produced no usable
   * text; the call only rejects when the batch as a whole failed.
   */
  retrieveContent(batch: readonly string[], signal?: AbortSignal): Promise<Map<string, string>>;
}

export interface Summarizer {
  summarize(text: string, signal?: AbortSignal): Promise<Summary>;
}

export interface ResultSink {
  persist(artifact: ScrapeArtifact, signal?: AbortSignal): Promise<void>;
}

export interface Capabilities {
  discoverer: LinkDiscoverer;
  retriever: ContentRetriever;
  summarizer: Summarizer;
  sink: ResultSink;
}
