import type { ScrapeArtifact } from "../capabilities/types.js";
import type { WorkflowState } from "./state.js";

export function toArtifact(
  state: Pick<WorkflowState, "seedUrl" | "formattedResults">
): ScrapeArtifact {
  return {
    source_url: state.seedUrl,
    data: state.formattedResults.map(({ url, title, description }) => ({
      url,
      response: { title, description },
    })),
  };
}

/**
 * Key order is fixed here rather than inherited from the caller's objects, so
 * equal artifacts always serialize to the same bytes.
 */
export function serializeArtifact(artifact: ScrapeArtifact): string {
  const ordered: ScrapeArtifact = {
    source_url: artifact.source_url,
    data: artifact.data.map(({ url, response }) => ({
      url,
      response: { title: response.title, description: response.description },
    })),
  };
  return `${JSON.stringify(ordered, null, 4)}\n`;
}
