import { CapabilityError } from "./errors.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

export function isRetryableStatus(statusCode: number): boolean {
  // Rate limiting and server-side trouble are worth another attempt.
  if (statusCode === 408 || statusCode === 425 || statusCode === 429) return true;
  return statusCode >= 500 && statusCode < 600;
}

export interface FetchTextOptions {
  userAgent?: string;
  timeoutMs?: number;
  accept?: string;
  /** Caller's cancellation, combined with the per-request timeout. */
  signal?: AbortSignal;
}

/**
 * GET a URL as text. Non-2xx responses and network errors reject with a
 * CapabilityError classified by `isRetryableStatus`; a URL that cannot be
 * parsed is terminal.
 */
export async function fetchText(
  url: string,
  {
    userAgent = DEFAULT_USER_AGENT,
    timeoutMs = 10000,
    accept = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    signal,
  }: FetchTextOptions = {}
): Promise<string> {
  if (!URL.canParse(url)) {
    throw new CapabilityError(`GET ${url} failed: invalid URL`, "terminal");
  }

  const timeout = AbortSignal.timeout(timeoutMs);
  let response: Response;
  try {
    response = await fetch(url, {
      redirect: "follow",
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      headers: {
        "User-Agent": userAgent,
        Accept: accept,
        "Accept-Language": "en-US,en;q=0.9",
      },
    });
  } catch (error) {
    throw new CapabilityError(`GET ${url} failed: ${String(error)}`, "retryable", {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new CapabilityError(
      `GET ${url} returned ${response.status}`,
      isRetryableStatus(response.status) ? "retryable" : "terminal"
    );
  }

  return response.text();
}
