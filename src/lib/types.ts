export interface WorkflowOptions {
  /**
   * Max number of eligible URLs kept after discovery. Earlier-discovered URLs
   * win when the cap binds.
   */
  urlLimit?: number;
  /**
   * Max number of URLs handed to a single retrieval call.
   */
  batchLimit?: number;
  /**
   * Automatic retries allowed for a failing step before the job gives up.
   */
  maxRetries?: number;
  /**
   * Backoff unit in ms; ErrorRecovery waits `retryCount * retryBackoffMs`.
   */
  retryBackoffMs?: number;
  /**
   * Upper bound for any single capability call (discovery, one retrieval
   * batch, one summary, persistence).
   */
  capabilityTimeoutMs?: number;
  /**
   * Delay between retrieval batches in ms (adds backpressure).
   */
  batchDelayMs?: number;
  /**
   * Random jitter (0..N ms) added to each batch delay.
   */
  batchJitterMs?: number;
  /**
   * Page text is cut to this many characters before summarization.
   */
  summaryInputChars?: number;
  /**
   * Ordered matchers; a URL whose path or query matches any of them is not
   * eligible.
   */
  excludedPatterns?: RegExp[];
}
