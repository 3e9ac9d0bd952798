export const WORKING_STEPS = [
  "Discovery",
  "Retrieval",
  "Transformation",
  "Persistence",
] as const;

export type WorkingStep = (typeof WORKING_STEPS)[number];

export type NodeName = "Initialize" | WorkingStep | "ErrorRecovery" | "Complete";

export type WorkflowStatus = "running" | "completed" | "failed";

export interface FormattedResult {
  url: string;
  title: string;
  description: string;
}

export interface WorkflowError {
  step: WorkingStep;
  message: string;
  timestamp: Date;
  retryable: boolean;
  /** Set when the entry records a single skipped URL rather than a step failure. */
  url?: string;
}

export interface WorkflowState {
  readonly seedUrl: string;
  discoveredUrls: Set<string>;
  eligibleUrls: string[];
  scrapedContent: Map<string, string>;
  formattedResults: FormattedResult[];
  /** URLs given up on individually; retried steps never revisit them. */
  skippedUrls: Set<string>;
  errors: WorkflowError[];
  retryCount: number;
  currentStep: "Initialize" | WorkingStep;
  status: WorkflowStatus;
}

export function createInitialState(seedUrl: string): WorkflowState {
  return {
    seedUrl,
    discoveredUrls: new Set(),
    eligibleUrls: [],
    scrapedContent: new Map(),
    formattedResults: [],
    skippedUrls: new Set(),
    errors: [],
    retryCount: 0,
    currentStep: "Initialize",
    status: "running",
  };
}

export function isTerminal(state: WorkflowState): boolean {
  return state.status !== "running";
}
