import { APICallError, generateText, type LanguageModel } from "ai";
import { openai } from "@ai-sdk/openai";
import { CapabilityError, errorMessage } from "../lib/errors.js";
import { isRetryableStatus } from "../lib/http.js";
import { parseSummary } from "../lib/summary.js";
import type { Summarizer, Summary } from "./types.js";

export function buildSummaryPrompt(content: string): string {
  return `
Analyze the provided information and generate a summarized output using the specified structure.

### Content:
${content}

### Structured JSON Output (MUST be valid JSON):
{
  "title": "A short title summarizing the topic",
  "description": "A 2/3 lines summary of the first couple of paragraphs of the content."
}

Return ONLY the JSON object, nothing else.
  `.trim();
}

export class LlmSummarizer implements Summarizer {
  private readonly model: LanguageModel;

  constructor(model: LanguageModel | string = "gpt-4o-mini") {
    this.model = typeof model === "string" ? openai(model) : model;
  }

  async summarize(text: string, signal?: AbortSignal): Promise<Summary> {
    let reply: string;
    try {
      const { text: output } = await generateText({
        model: this.model,
        prompt: buildSummaryPrompt(text),
        temperature: 0,
        abortSignal: signal,
        // Retries belong to the workflow engine.
        maxRetries: 0,
      });
      reply = output;
    } catch (error) {
      throw classifyModelError(error);
    }

    if (!reply.trim()) {
      throw new CapabilityError("Empty response from the model", "parse");
    }
    return parseSummary(reply);
  }
}

function classifyModelError(error: unknown): CapabilityError {
  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    const retryable = error.isRetryable || (status !== undefined && isRetryableStatus(status));
    return new CapabilityError(`Model call failed: ${error.message}`, retryable ? "retryable" : "terminal", {
      cause: error,
    });
  }
  return new CapabilityError(`Model call failed: ${errorMessage(error)}`, "retryable", { cause: error });
}
