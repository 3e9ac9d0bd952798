import { toStepFailure } from "../../lib/errors.js";
import { withTimeout } from "../../lib/time.js";
import { toArtifact } from "../artifact.js";
import type { StepContext, StepExecutor } from "./types.js";

export function createPersistenceStep({
  capabilities,
  options,
  label,
}: StepContext): StepExecutor {
  return {
    step: "Persistence",
    async execute(state) {
      const artifact = toArtifact(state);

      try {
        await withTimeout(
          (signal) => capabilities.sink.persist(artifact, signal),
          options.capabilityTimeoutMs,
          "Persisting results"
        );
      } catch (error) {
        return { ok: false, failure: toStepFailure("Persistence", error), skipped: [] };
      }

      console.log(`${label}: [Persistence] Saved ${artifact.data.length} results for ${state.seedUrl}`);
      return { ok: true, state, skipped: [] };
    },
  };
}
