import { DEFAULT_EXCLUDED_PATTERNS } from "./url-filter.js";
import type { WorkflowOptions } from "./types.js";

export const DEFAULT_OPTIONS: Required<WorkflowOptions> = {
  urlLimit: 50,
  batchLimit: 10,
  maxRetries: 3,
  retryBackoffMs: 1000,
  capabilityTimeoutMs: 60000,
  batchDelayMs: 600,
  batchJitterMs: 400,
  summaryInputChars: 2000,
  excludedPatterns: DEFAULT_EXCLUDED_PATTERNS,
};

export function normalizeOptions(
  options?: WorkflowOptions
): Required<WorkflowOptions> {
  return {
    ...DEFAULT_OPTIONS,
    ...(options ?? {}),
  };
}
