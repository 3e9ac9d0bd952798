import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_OPTIONS } from "./options.js";
import type { WorkflowOptions } from "./types.js";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const EnvSchema = z.object({
  PORT: positiveInt(3001),
  URL_LIMIT: positiveInt(DEFAULT_OPTIONS.urlLimit),
  BATCH_LIMIT: positiveInt(DEFAULT_OPTIONS.batchLimit),
  MAX_RETRIES: nonNegativeInt(DEFAULT_OPTIONS.maxRetries),
  RETRY_BACKOFF_MS: nonNegativeInt(DEFAULT_OPTIONS.retryBackoffMs),
  CAPABILITY_TIMEOUT_MS: positiveInt(DEFAULT_OPTIONS.capabilityTimeoutMs),
  BATCH_DELAY_MS: nonNegativeInt(DEFAULT_OPTIONS.batchDelayMs),
  BATCH_JITTER_MS: nonNegativeInt(DEFAULT_OPTIONS.batchJitterMs),
  SUMMARY_INPUT_CHARS: positiveInt(DEFAULT_OPTIONS.summaryInputChars),
  EXCLUDED_PATTERNS: z.string().optional(),
  USER_AGENT: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  RESULT_SINK: z.enum(["file", "postgres"]).default("file"),
  OUTPUT_DIR: z.string().min(1).default("./output"),
  DATABASE_URL: z.string().url().optional(),
});

export interface AppConfig {
  port: number;
  workflow: Required<WorkflowOptions>;
  userAgent?: string;
  openaiModel: string;
  resultSink: "file" | "postgres";
  outputDir: string;
  databaseUrl?: string;
}

/** Comma-separated regular expressions, compiled case-insensitively. */
export function parsePatternList(raw: string): RegExp[] {
  return raw
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .map((p) => {
      try {
        return new RegExp(p, "i");
      } catch (error) {
        throw new ConfigError(`EXCLUDED_PATTERNS: invalid pattern "${p}" (${String(error)})`);
      }
    });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings from .env files mean "unset".
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${details}`);
  }

  const e = parsed.data;
  if (e.RESULT_SINK === "postgres" && !e.DATABASE_URL) {
    throw new ConfigError("DATABASE_URL is required when RESULT_SINK=postgres");
  }

  return {
    port: e.PORT,
    workflow: {
      urlLimit: e.URL_LIMIT,
      batchLimit: e.BATCH_LIMIT,
      maxRetries: e.MAX_RETRIES,
      retryBackoffMs: e.RETRY_BACKOFF_MS,
      capabilityTimeoutMs: e.CAPABILITY_TIMEOUT_MS,
      batchDelayMs: e.BATCH_DELAY_MS,
      batchJitterMs: e.BATCH_JITTER_MS,
      summaryInputChars: e.SUMMARY_INPUT_CHARS,
      excludedPatterns: e.EXCLUDED_PATTERNS
        ? parsePatternList(e.EXCLUDED_PATTERNS)
        : DEFAULT_OPTIONS.excludedPatterns,
    },
    userAgent: e.USER_AGENT,
    openaiModel: e.OPENAI_MODEL,
    resultSink: e.RESULT_SINK,
    outputDir: e.OUTPUT_DIR,
    databaseUrl: e.DATABASE_URL,
  };
}
