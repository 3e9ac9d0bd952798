import { JSDOM, VirtualConsole } from "jsdom";
import { Readability } from "@mozilla/readability";
import { CapabilityError, errorMessage } from "../lib/errors.js";
import { fetchText } from "../lib/http.js";
import type { ContentRetriever } from "./types.js";

export interface ReadabilityRetrieverOptions {
  userAgent?: string;
  requestTimeoutMs?: number;
  /** Pages fetched in parallel inside one batch. */
  concurrency?: number;
}

export function extractMainText(url: string, html: string): string {
  // Page scripts are never run and CSS/parse noise is not echoed to stdout.
  const dom = new JSDOM(html, { url, virtualConsole: new VirtualConsole() });
  try {
    const document = dom.window.document;
    const article = new Readability(document).parse();
    const text = article?.textContent || document.body?.textContent || "";
    return text.replace(/[ \t]+/g, " ").replace(/\n\s*\n+/g, "\n\n").trim();
  } finally {
    dom.window.close();
  }
}

export class ReadabilityContentRetriever implements ContentRetriever {
  private readonly userAgent?: string;
  private readonly requestTimeoutMs: number;
  private readonly concurrency: number;

  constructor(options: ReadabilityRetrieverOptions = {}) {
    this.userAgent = options.userAgent;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 15000;
    this.concurrency = Math.max(1, options.concurrency ?? 3);
  }

  async retrieveContent(
    batch: readonly string[],
    signal?: AbortSignal
  ): Promise<Map<string, string>> {
    const pages = new Map<string, string>();
    const failures: CapabilityError[] = [];

    for (let i = 0; i < batch.length; i += this.concurrency) {
      signal?.throwIfAborted();
      const slice = batch.slice(i, i + this.concurrency);
      const settled = await Promise.allSettled(slice.map((url) => this.retrieve(url, signal)));

      settled.forEach((outcome, index) => {
        const url = slice[index];
        if (outcome.status === "fulfilled") {
          if (outcome.value) pages.set(url, outcome.value);
          return;
        }
        const reason: unknown = outcome.reason;
        console.warn(`Retrieval of ${url} failed: ${errorMessage(reason)}`);
        failures.push(
          reason instanceof CapabilityError
            ? reason
            : new CapabilityError(errorMessage(reason), "retryable", { cause: reason })
        );
      });
    }

    // Only a batch where every page failed transiently counts as a failed call.
    if (batch.length > 0 && failures.length === batch.length && failures.every((f) => f.retryable)) {
      throw new CapabilityError(
        `All ${batch.length} pages of the batch failed: ${failures[0].message}`,
        "retryable"
      );
    }

    return pages;
  }

  private async retrieve(url: string, signal?: AbortSignal): Promise<string> {
    const html = await fetchText(url, {
      userAgent: this.userAgent,
      timeoutMs: this.requestTimeoutMs,
      signal,
    });
    return extractMainText(url, html);
  }
}
