import type { Capabilities } from "../../capabilities/types.js";
import type { StepFailure } from "../../lib/errors.js";
import type { WorkflowOptions } from "../../lib/types.js";
import type { WorkflowState, WorkingStep } from "../state.js";

export interface SkippedItem {
  url: string;
  reason: string;
}

/**
 * Skipped items are reported on both branches: a step that fails half-way
 * still hands back the per-URL skips it recorded before failing.
 */
export type StepResult =
  | { ok: true; state: WorkflowState; skipped: SkippedItem[] }
  | { ok: false; failure: StepFailure; skipped: SkippedItem[] };

export interface StepExecutor {
  readonly step: WorkingStep;
  execute(state: WorkflowState): Promise<StepResult>;
}

export interface StepContext {
  capabilities: Capabilities;
  options: Required<WorkflowOptions>;
  sleep: (ms: number) => Promise<void>;
  /** Log prefix, e.g. "Job 1f2e…". */
  label: string;
}
