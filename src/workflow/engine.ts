import { toStepFailure, type StepFailure } from "../lib/errors.js";
import { normalizeOptions } from "../lib/options.js";
import { sleep as defaultSleep } from "../lib/time.js";
import type { WorkflowOptions } from "../lib/types.js";
import type { Capabilities } from "../capabilities/types.js";
import {
  createInitialState,
  type NodeName,
  type WorkflowState,
  type WorkingStep,
} from "./state.js";
import { isWorkingStep, nextNode, type Outcome } from "./transitions.js";
import { createDiscoveryStep } from "./steps/discovery.js";
import { createRetrievalStep } from "./steps/retrieval.js";
import { createTransformationStep } from "./steps/transformation.js";
import { createPersistenceStep } from "./steps/persistence.js";
import type { StepContext, StepExecutor, StepResult } from "./steps/types.js";

export interface TransitionEvent {
  from: NodeName;
  to: NodeName;
  /** Value after the transition was applied. */
  retryCount: number;
}

export interface WorkflowEngineDeps {
  capabilities: Capabilities;
  options?: WorkflowOptions;
  sleep?: (ms: number) => Promise<void>;
  onTransition?: (event: TransitionEvent) => void;
}

export type RunWorkflow = (seedUrl: string, label?: string) => Promise<WorkflowState>;

export class WorkflowEngine {
  readonly options: Required<WorkflowOptions>;
  private readonly capabilities: Capabilities;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onTransition?: (event: TransitionEvent) => void;

  constructor({ capabilities, options, sleep, onTransition }: WorkflowEngineDeps) {
    this.capabilities = capabilities;
    this.options = normalizeOptions(options);
    this.sleep = sleep ?? defaultSleep;
    this.onTransition = onTransition;
  }

  /**
   * Drive a fresh state from Initialize to Complete. Never rejects because of
   * a step: every failure ends up in `errors` and, when it is the last one, in
   * `status = "failed"`. The returned state is not referenced afterwards.
   */
  async run(seedUrl: string, label = "Workflow"): Promise<WorkflowState> {
    const state = createInitialState(seedUrl);
    const executors = this.createExecutors(label);
    const maxRetries = this.options.maxRetries;

    let node: NodeName = "Initialize";
    let failure: StepFailure | undefined;

    while (node !== "Complete") {
      let outcome: Outcome = { kind: "success" };

      if (node === "ErrorRecovery") {
        if (failure) this.recordFailure(state, failure);
        const delay = state.retryCount * this.options.retryBackoffMs;
        console.warn(
          `${label}: [ErrorRecovery] Retry ${state.retryCount}/${maxRetries} of ${state.currentStep} in ${delay}ms`
        );
        await this.sleep(delay);
      } else if (isWorkingStep(node)) {
        state.currentStep = node;
        const result = await this.execute(executors[node], state);

        for (const item of result.skipped) {
          state.errors.push({
            step: node,
            message: item.reason,
            url: item.url,
            retryable: false,
            timestamp: new Date(),
          });
        }

        if (result.ok) {
          state.retryCount = 0;
          failure = undefined;
        } else {
          failure = result.failure;
          outcome = { kind: "failure", retryable: failure.retryable };
          console.error(`${label}: [${node}] Failed: ${failure.message}`);
        }
      }

      const next = nextNode(
        { node, currentStep: state.currentStep, retryCount: state.retryCount, outcome },
        maxRetries
      );

      if (next === "ErrorRecovery") {
        state.retryCount += 1;
      } else if (next === "Complete") {
        if (failure) {
          this.recordFailure(state, failure);
          state.status = "failed";
        } else {
          state.status = "completed";
        }
      }

      this.onTransition?.({ from: node, to: next, retryCount: state.retryCount });
      node = next;
    }

    console.log(
      `${label}: Workflow ${state.status} with ${state.formattedResults.length} results and ${state.errors.length} recorded errors`
    );
    return state;
  }

  private createExecutors(label: string): Record<WorkingStep, StepExecutor> {
    const context: StepContext = {
      capabilities: this.capabilities,
      options: this.options,
      sleep: this.sleep,
      label,
    };

    return {
      Discovery: createDiscoveryStep(context),
      Retrieval: createRetrievalStep(context),
      Transformation: createTransformationStep(context),
      Persistence: createPersistenceStep(context),
    };
  }

  private async execute(executor: StepExecutor, state: WorkflowState): Promise<StepResult> {
    try {
      return await executor.execute(state);
    } catch (error) {
      return { ok: false, failure: toStepFailure(executor.step, error), skipped: [] };
    }
  }

  private recordFailure(state: WorkflowState, failure: StepFailure): void {
    state.errors.push({
      step: failure.step,
      message: failure.message,
      retryable: failure.retryable,
      timestamp: new Date(),
    });
  }
}
