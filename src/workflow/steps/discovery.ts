import { toStepFailure } from "../../lib/errors.js";
import { withTimeout } from "../../lib/time.js";
import { filterEligibleUrls, normalizeUrl } from "../../lib/url-filter.js";
import type { StepContext, StepExecutor } from "./types.js";

export function createDiscoveryStep({
  capabilities,
  options,
  label,
}: StepContext): StepExecutor {
  return {
    step: "Discovery",
    async execute(state) {
      let links: string[];
      try {
        links = await withTimeout(
          (signal) => capabilities.discoverer.discoverLinks(state.seedUrl, signal),
          options.capabilityTimeoutMs,
          "Link discovery"
        );
      } catch (error) {
        return { ok: false, failure: toStepFailure("Discovery", error), skipped: [] };
      }

      for (const link of links) {
        state.discoveredUrls.add(normalizeUrl(link, state.seedUrl) ?? link);
      }

      state.eligibleUrls = filterEligibleUrls(state.discoveredUrls, state.seedUrl, {
        patterns: options.excludedPatterns,
        urlLimit: options.urlLimit,
      });

      console.log(
        `${label}: [Discovery] ${state.discoveredUrls.size} links found, ${state.eligibleUrls.length} eligible (limit ${options.urlLimit})`
      );

      return { ok: true, state, skipped: [] };
    },
  };
}
