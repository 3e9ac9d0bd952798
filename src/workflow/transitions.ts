import { WORKING_STEPS, type NodeName, type WorkingStep } from "./state.js";

export type Outcome =
  | { kind: "success" }
  | { kind: "failure"; retryable: boolean };

export interface RoutingInput {
  node: NodeName;
  /** Last working node attempted; ErrorRecovery routes back to it. */
  currentStep: "Initialize" | WorkingStep;
  retryCount: number;
  outcome: Outcome;
}

const SUCCESSOR: Record<"Initialize" | WorkingStep, NodeName> = {
  Initialize: "Discovery",
  Discovery: "Retrieval",
  Retrieval: "Transformation",
  Transformation: "Persistence",
  Persistence: "Complete",
};

export function isWorkingStep(node: NodeName): node is WorkingStep {
  return WORKING_STEPS.some((step) => step === node);
}

/**
 * Routing table of the workflow. Pure: the engine owns every side effect,
 * including the retryCount increment that accompanies a move to ErrorRecovery.
 */
export function nextNode(input: RoutingInput, maxRetries: number): NodeName {
  const { node, currentStep, retryCount, outcome } = input;

  switch (node) {
    case "Complete":
      return "Complete";
    case "Initialize":
      return SUCCESSOR.Initialize;
    case "ErrorRecovery":
      return currentStep === "Initialize" ? SUCCESSOR.Initialize : currentStep;
    default:
      if (outcome.kind === "success") return SUCCESSOR[node];
      if (outcome.retryable && retryCount < maxRetries) return "ErrorRecovery";
      return "Complete";
  }
}
