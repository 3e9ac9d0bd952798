import { createOpenAI } from "@ai-sdk/openai";
import { describe, expect, it } from "vitest";
import { LlmSummarizer, buildSummaryPrompt } from "../src/capabilities/llm-summarizer.js";

function chatReply(content: string): Response {
  return new Response(
    JSON.stringify({
      id: "chatcmpl-test",
      object: "chat.completion",
      created: 1,
      model: "gpt-4o-mini",
      choices: [
        { index: 0, message: { role: "assistant", content }, finish_reason: "stop" },
      ],
      usage: { prompt_tokens: 10, completion_tokens: 10, total_tokens: 20 },
    }),
    { status: 200, headers: { "Content-Type": "application/json" } }
  );
}

function errorReply(status: number): Response {
  return new Response(
    JSON.stringify({ error: { message: "upstream said no", type: "test_error", param: null, code: null } }),
    { status, headers: { "Content-Type": "application/json" } }
  );
}

function summarizerWith(reply: () => Response) {
  const provider = createOpenAI({ apiKey: "test-secret", fetch: async () => reply() });
  return new LlmSummarizer(provider("gpt-4o-mini"));
}

describe("llm summarizer", () => {
  it("embeds the page text in the prompt", () => {
    expect(buildSummaryPrompt("Some page text")).toContain("### Content:\nSome page text\n");
  });

  it("parses the model's JSON reply", async () => {
    const summarizer = summarizerWith(() =>
      chatReply('```json\n{"title": "Pricing", "description": "Plans and prices."}\n```')
    );

    await expect(summarizer.summarize("page")).resolves.toEqual({
      title: "Pricing",
      description: "Plans and prices.",
    });
  });

  it("reports prose replies as parse failures", async () => {
    const summarizer = summarizerWith(() => chatReply("I could not find anything useful."));

    await expect(summarizer.summarize("page")).rejects.toMatchObject({ kind: "parse" });
  });

  it("classifies rate limits as retryable and bad requests as terminal", async () => {
    await expect(summarizerWith(() => errorReply(429)).summarize("page")).rejects.toMatchObject({
      kind: "retryable",
    });
    await expect(summarizerWith(() => errorReply(400)).summarize("page")).rejects.toMatchObject({
      kind: "terminal",
    });
  });
});
