import { ZodError } from "zod";
import type { WorkingStep } from "../workflow/state.js";

export type CapabilityErrorKind = "retryable" | "terminal" | "parse";

/**
 * Raised by capability adapters. `kind` decides how the engine routes it:
 * retryable failures go through ErrorRecovery, terminal ones end the job and
 * parse failures are per-item skips where the step allows them.
 */
export class CapabilityError extends Error {
  public readonly kind: CapabilityErrorKind;

  constructor(message: string, kind: CapabilityErrorKind, options?: ErrorOptions) {
    super(message, options);
    this.name = "CapabilityError";
    this.kind = kind;
  }

  get retryable(): boolean {
    return this.kind === "retryable";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

export interface StepFailure {
  step: WorkingStep;
  message: string;
  retryable: boolean;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRetryable(error: unknown): boolean {
  if (error instanceof CapabilityError) return error.retryable;
  if (error instanceof TimeoutError) return true;
  if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
    return true;
  }
  // fetch() reports network trouble as TypeError("fetch failed") with a cause;
  // a bare TypeError (e.g. "Invalid URL") is malformed input.
  if (error instanceof TypeError) return error.cause !== undefined;
  if (error instanceof ConfigError || error instanceof RangeError) return false;
  if (error instanceof ZodError || error instanceof SyntaxError) return false;
  return true;
}

export function toStepFailure(step: WorkingStep, error: unknown): StepFailure {
  return {
    step,
    message: errorMessage(error),
    retryable: isRetryable(error),
  };
}
