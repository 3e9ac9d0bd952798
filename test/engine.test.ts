import { describe, expect, it, vi } from "vitest";
import { CapabilityError } from "../src/lib/errors.js";
import { WorkflowEngine, type TransitionEvent } from "../src/workflow/engine.js";
import type { Capabilities } from "../src/capabilities/types.js";
import type { WorkflowOptions } from "../src/lib/types.js";
import {
  FAST_OPTIONS,
  FakeDiscoverer,
  FakeRetriever,
  FakeSummarizer,
  MemorySink,
  fakeCapabilities,
  retryable,
} from "./fakes.js";

const SEED = "https://example.com";
const A = "https://example.com/a";
const B = "https://example.com/b";
const C = "https://example.com/c";
const LOGIN = "https://example.com/login";

function setup(overrides: Partial<Capabilities> = {}, options: WorkflowOptions = {}) {
  const capabilities = fakeCapabilities({
    discoverer: new FakeDiscoverer([A, B, LOGIN, C]),
    ...overrides,
  });
  const events: TransitionEvent[] = [];
  const sleep = vi.fn(async (_ms: number) => {});
  const engine = new WorkflowEngine({
    capabilities,
    options: { ...FAST_OPTIONS, ...options },
    sleep,
    onTransition: (event) => events.push(event),
  });
  return { engine, events, sleep, capabilities };
}

const recoveryVisits = (events: TransitionEvent[]) =>
  events.filter((e) => e.to === "ErrorRecovery").length;

describe("workflow engine", () => {
  it("runs every node in order and persists the summaries", async () => {
    const retriever = new FakeRetriever();
    const sink = new MemorySink();
    const { engine, events } = setup({ retriever, sink }, { batchLimit: 2 });

    const state = await engine.run(SEED);

    expect(state.status).toBe("completed");
    expect(events.map((e) => e.to)).toEqual([
      "Discovery",
      "Retrieval",
      "Transformation",
      "Persistence",
      "Complete",
    ]);
    expect(state.eligibleUrls).toEqual([A, B, C]);
    expect(retriever.batches).toEqual([[A, B], [C]]);
    expect(state.formattedResults.map((r) => r.url)).toEqual([A, B, C]);
    expect(state.errors).toEqual([]);
    expect(sink.saved).toEqual([
      {
        source_url: SEED,
        data: [A, B, C].map((url) => ({
          url,
          response: { title: `text for ${url}`, description: `about text for ${url}` },
        })),
      },
    ]);
  });

  it("keeps the state invariants", async () => {
    const { engine } = setup({}, { urlLimit: 2 });

    const state = await engine.run(SEED);

    for (const url of state.eligibleUrls) expect(state.discoveredUrls.has(url)).toBe(true);
    expect(state.eligibleUrls.length).toBeLessThanOrEqual(2);
    for (const url of state.scrapedContent.keys()) expect(state.eligibleUrls).toContain(url);
    for (const r of state.formattedResults) expect(state.scrapedContent.has(r.url)).toBe(true);
    expect(state.retryCount).toBe(0);
  });

  it("never retrieves URLs beyond the URL limit", async () => {
    const retriever = new FakeRetriever();
    const { engine } = setup({ retriever }, { urlLimit: 2 });

    const state = await engine.run(SEED);

    expect(state.eligibleUrls).toEqual([A, B]);
    expect(retriever.batches).toEqual([[A, B]]);
    expect(state.scrapedContent.has(C)).toBe(false);
  });

  it("retries a failing step and resets retryCount once it succeeds", async () => {
    const retriever = new FakeRetriever([retryable(), retryable()]);
    const { engine, events } = setup({ retriever });

    const state = await engine.run(SEED);

    const retrievalEvents = events.filter((e) => e.from === "Retrieval");
    expect(retrievalEvents.map((e) => [e.to, e.retryCount])).toEqual([
      ["ErrorRecovery", 1],
      ["ErrorRecovery", 2],
      ["Transformation", 0],
    ]);
    expect(events.filter((e) => e.from === "ErrorRecovery").map((e) => e.to)).toEqual([
      "Retrieval",
      "Retrieval",
    ]);
    expect(state.errors.map((e) => e.step)).toEqual(["Retrieval", "Retrieval"]);
    expect(state.retryCount).toBe(0);
    expect(state.status).toBe("completed");
  });

  it("gives up after maxRetries recovery visits with status failed", async () => {
    const sink = new MemorySink(Array.from({ length: 10 }, () => retryable("disk busy")));
    const { engine, events, sleep } = setup({ sink }, { retryBackoffMs: 100 });

    const state = await engine.run(SEED);

    expect(state.status).toBe("failed");
    expect(recoveryVisits(events)).toBe(3);
    expect(events.at(-1)).toEqual({ from: "Persistence", to: "Complete", retryCount: 3 });
    expect(sleep.mock.calls).toEqual([[100], [200], [300]]);
    expect(state.errors).toHaveLength(4);
    expect(state.errors.every((e) => e.step === "Persistence" && e.message === "disk busy")).toBe(true);
  });

  it.each(["Discovery", "Retrieval", "Transformation", "Persistence"] as const)(
    "always reaches Complete when %s keeps failing",
    async (step) => {
      const failures = () => Array.from({ length: 10 }, () => retryable());
      const overrides: Partial<Capabilities> = {
        Discovery: { discoverer: new FakeDiscoverer([A, B, C], failures()) },
        Retrieval: { retriever: new FakeRetriever(failures()) },
        Transformation: { summarizer: new FakeSummarizer([], failures()) },
        Persistence: { sink: new MemorySink(failures()) },
      }[step];
      const { engine, events } = setup(overrides, { maxRetries: 2 });

      const state = await engine.run(SEED);

      expect(state.status).toBe("failed");
      expect(recoveryVisits(events)).toBe(2);
      expect(state.errors.at(-1)?.step).toBe(step);
    }
  );

  it("fails at once on a terminal error", async () => {
    const retriever = new FakeRetriever();
    const discoverer = new FakeDiscoverer([], [new CapabilityError("GET https://example.com returned 404", "terminal")]);
    const { engine, events } = setup({ discoverer, retriever });

    const state = await engine.run(SEED);

    expect(state.status).toBe("failed");
    expect(recoveryVisits(events)).toBe(0);
    expect(discoverer.calls).toBe(1);
    expect(retriever.batches).toEqual([]);
    expect(state.errors).toEqual([
      expect.objectContaining({
        step: "Discovery",
        message: "GET https://example.com returned 404",
        retryable: false,
      }),
    ]);
  });

  it("skips a page whose summary cannot be parsed and still completes", async () => {
    const summarizer = new FakeSummarizer([`text for ${B}`]);
    const sink = new MemorySink();
    const { engine } = setup({ summarizer, sink });

    const state = await engine.run(SEED);

    expect(state.status).toBe("completed");
    expect(state.formattedResults.map((r) => r.url)).toEqual([A, C]);
    expect(state.errors).toEqual([
      expect.objectContaining({ step: "Transformation", url: B, retryable: false }),
    ]);
    expect(sink.saved[0].data.map((d) => d.url)).toEqual([A, C]);
  });

  it("fails when no summary at all can be parsed", async () => {
    const summarizer = new FakeSummarizer([A, B, C].map((u) => `text for ${u}`));
    const { engine, events } = setup({ summarizer });

    const state = await engine.run(SEED);

    expect(state.status).toBe("failed");
    expect(recoveryVisits(events)).toBe(0);
    expect(state.errors.map((e) => e.url)).toEqual([A, B, C, undefined]);
    expect(state.errors.at(-1)?.message).toBe("No summary could be produced for any of 3 pages");
  });

  it("skips a page the model rejects outright and keeps the other summaries", async () => {
    const summarizer = new FakeSummarizer(
      [],
      [undefined, new CapabilityError("Model call failed: Bad Request", "terminal")]
    );
    const sink = new MemorySink();
    const { engine, events } = setup({ summarizer, sink });

    const state = await engine.run(SEED);

    expect(state.status).toBe("completed");
    expect(recoveryVisits(events)).toBe(0);
    expect(state.formattedResults.map((r) => r.url)).toEqual([A, C]);
    expect(state.errors).toEqual([
      expect.objectContaining({
        step: "Transformation",
        url: B,
        message: "Model call failed: Bad Request",
        retryable: false,
      }),
    ]);
    expect(sink.saved[0].data.map((d) => d.url)).toEqual([A, C]);
  });

  it("completes when the pages left after a retry cannot be parsed but earlier ones were", async () => {
    const summarizer = new FakeSummarizer([B, C].map((u) => `text for ${u}`), [undefined, retryable()]);
    const sink = new MemorySink();
    const { engine, events } = setup({ summarizer, sink });

    const state = await engine.run(SEED);

    expect(state.status).toBe("completed");
    expect(recoveryVisits(events)).toBe(1);
    expect(state.formattedResults.map((r) => r.url)).toEqual([A]);
    expect(state.errors.map((e) => [e.step, e.url, e.retryable])).toEqual([
      ["Transformation", undefined, true],
      ["Transformation", B, false],
      ["Transformation", C, false],
    ]);
    expect(sink.saved[0].data.map((d) => d.url)).toEqual([A]);
  });

  it("keeps batches retrieved before a failure and only refetches the rest", async () => {
    const retriever = new FakeRetriever([undefined, retryable()]);
    const { engine } = setup({ retriever }, { batchLimit: 2 });

    const state = await engine.run(SEED);

    expect(retriever.batches).toEqual([[A, B], [C], [C]]);
    expect(Array.from(state.scrapedContent.keys())).toEqual([A, B, C]);
    expect(state.status).toBe("completed");
  });

  it("resumes summarizing after a transient model error without repeating work", async () => {
    const summarizer = new FakeSummarizer([], [undefined, new Error("socket hang up")]);
    const { engine } = setup({ summarizer });

    const state = await engine.run(SEED);

    expect(summarizer.inputs).toEqual([A, B, B, C].map((u) => `text for ${u}`));
    expect(state.formattedResults.map((r) => r.url)).toEqual([A, B, C]);
    expect(state.errors).toEqual([
      expect.objectContaining({ step: "Transformation", message: "socket hang up", retryable: true }),
    ]);
  });

  it("records pages without usable text as retrieval skips", async () => {
    const retriever = new FakeRetriever([], { [B]: "   " });
    const { engine } = setup({ retriever });

    const state = await engine.run(SEED);

    expect(state.status).toBe("completed");
    expect(state.formattedResults.map((r) => r.url)).toEqual([A, C]);
    expect(state.errors).toEqual([
      expect.objectContaining({ step: "Retrieval", url: B, message: "No usable content retrieved" }),
    ]);
  });

  it("treats an empty discovery as success with nothing to retrieve", async () => {
    const retriever = new FakeRetriever();
    const sink = new MemorySink();
    const { engine } = setup({ discoverer: new FakeDiscoverer([]), retriever, sink });

    const state = await engine.run(SEED);

    expect(state.status).toBe("completed");
    expect(retriever.batches).toEqual([]);
    expect(sink.saved).toEqual([{ source_url: SEED, data: [] }]);
  });

  it("classifies a capability timeout as retryable", async () => {
    const discoverer = { discoverLinks: () => new Promise<string[]>(() => {}) };
    const { engine } = setup({ discoverer }, { capabilityTimeoutMs: 20, maxRetries: 0 });

    const state = await engine.run(SEED);

    expect(state.status).toBe("failed");
    expect(state.errors).toEqual([
      expect.objectContaining({
        step: "Discovery",
        message: "Link discovery timed out after 20ms",
        retryable: true,
      }),
    ]);
  });

  it("truncates page text before summarizing", async () => {
    const summarizer = new FakeSummarizer();
    const { engine } = setup({ summarizer }, { summaryInputChars: 8 });

    await engine.run(SEED);

    expect(summarizer.inputs).toEqual(["text for", "text for", "text for"]);
  });
});
