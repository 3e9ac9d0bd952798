import { toStepFailure } from "../../lib/errors.js";
import { validateSummary } from "../../lib/summary.js";
import { withTimeout } from "../../lib/time.js";
import type { SkippedItem, StepContext, StepExecutor } from "./types.js";

export function createTransformationStep({
  capabilities,
  options,
  label,
}: StepContext): StepExecutor {
  return {
    step: "Transformation",
    async execute(state) {
      const done = new Set(state.formattedResults.map((r) => r.url));
      const pending = state.eligibleUrls.filter(
        (u) => state.scrapedContent.has(u) && !done.has(u) && !state.skippedUrls.has(u)
      );
      const skipped: SkippedItem[] = [];

      for (const url of pending) {
        const text = state.scrapedContent.get(url) ?? "";

        try {
          const summary = validateSummary(
            await withTimeout(
              (signal) =>
                capabilities.summarizer.summarize(text.slice(0, options.summaryInputChars), signal),
              options.capabilityTimeoutMs,
              `Summary of ${url}`
            )
          );
          state.formattedResults.push({ url, ...summary });
        } catch (error) {
          const failure = toStepFailure("Transformation", error);
          // Transient trouble goes through ErrorRecovery; the re-entered step
          // resumes at this URL. Anything else only costs this page.
          if (failure.retryable) {
            return { ok: false, failure, skipped };
          }
          console.warn(`${label}: [Transformation] Skipping ${url}: ${failure.message}`);
          state.skippedUrls.add(url);
          skipped.push({ url, reason: failure.message });
        }
      }

      if (
        pending.length > 0 &&
        skipped.length === pending.length &&
        state.formattedResults.length === 0
      ) {
        return {
          ok: false,
          failure: {
            step: "Transformation",
            message: `No summary could be produced for any of ${pending.length} pages`,
            retryable: false,
          },
          skipped,
        };
      }

      console.log(
        `${label}: [Transformation] ${state.formattedResults.length} summaries, ${skipped.length} skipped`
      );

      return { ok: true, state, skipped };
    },
  };
}
