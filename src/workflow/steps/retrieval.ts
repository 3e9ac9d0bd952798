import { toStepFailure } from "../../lib/errors.js";
import { planBatches } from "../../lib/batch.js";
import { jitter, withTimeout } from "../../lib/time.js";
import type { SkippedItem, StepContext, StepExecutor } from "./types.js";

export function createRetrievalStep({
  capabilities,
  options,
  sleep,
  label,
}: StepContext): StepExecutor {
  return {
    step: "Retrieval",
    async execute(state) {
      // On re-entry after ErrorRecovery only the URLs not yet settled are planned.
      const pending = state.eligibleUrls.filter(
        (u) => !state.scrapedContent.has(u) && !state.skippedUrls.has(u)
      );
      const batches = planBatches(pending, options.urlLimit, options.batchLimit);
      const skipped: SkippedItem[] = [];

      for (let i = 0; i < batches.length; i++) {
        const batch = batches[i];

        let pages: Map<string, string>;
        try {
          pages = await withTimeout(
            (signal) => capabilities.retriever.retrieveContent(batch, signal),
            options.capabilityTimeoutMs,
            `Retrieval batch ${i + 1}/${batches.length}`
          );
        } catch (error) {
          return { ok: false, failure: toStepFailure("Retrieval", error), skipped };
        }

        for (const url of batch) {
          const text = pages.get(url)?.trim();
          if (text) {
            state.scrapedContent.set(url, text);
          } else {
            state.skippedUrls.add(url);
            skipped.push({ url, reason: "No usable content retrieved" });
          }
        }

        console.log(
          `${label}: [Retrieval] Batch ${i + 1}/${batches.length} done, ${state.scrapedContent.size}/${state.eligibleUrls.length} pages retrieved`
        );

        if (i + 1 < batches.length) {
          await sleep(options.batchDelayMs + jitter(options.batchJitterMs));
        }
      }

      return { ok: true, state, skipped };
    },
  };
}
