import { planBatches } from "./batch.js";

/**
 * Excluded-category matchers, tested in order against `pathname + search` of
 * the normalized candidate. The first match rejects.
 */
export const DEFAULT_EXCLUDED_PATTERNS: RegExp[] = [
  // auth
  /\/(?:log-?in|log-?out|sign-?in|sign-?up|sign-?out|register|auth|oauth|sso)(?:[/?.]|$)/i,
  // account / profile
  /\/(?:account|accounts|my-account|profile|profiles|settings)(?:[/?.]|$)/i,
  // cart / checkout / payment
  /\/(?:cart|basket|checkout|payment|payments|billing)(?:[/?.]|$)/i,
  // admin
  /\/(?:admin|wp-admin|wp-login\.php|administrator)(?:[/?.]|$)/i,
  // legal / privacy
  /\/(?:privacy|privacy-policy|terms|terms-of-service|terms-and-conditions|legal|cookie-policy|cookies|gdpr|imprint)(?:[/?.]|$)/i,
  // downloadable files
  /\.(?:pdf|docx?|xlsx?|pptx?|csv|zip|rar|7z|tar|gz|bz2|mp[34]|m4a|wav|ogg|mov|avi|webm|png|jpe?g|gif|webp|svg|ico|css|js|json|xml|rss|atom|woff2?|ttf|otf|eot|exe|dmg|apk)(?:\?|$)/i,
];

const TRACKING_PARAMS = new Set([
  "gclid",
  "fbclid",
  "msclkid",
]);

const ABSOLUTE_URL = /^[a-z][a-z\d+.-]*:/i;

function resolve(candidate: string, originUrl: string): URL | null {
  const raw = candidate.trim();
  if (!raw || raw.startsWith("#")) return null;
  if (!ABSOLUTE_URL.test(raw) && !raw.startsWith("/")) return null;

  try {
    return new URL(raw, originUrl);
  } catch {
    return null;
  }
}

/**
 * Canonical form used for de-duplication: no fragment, no tracking params,
 * no trailing slash on non-root paths. Returns null for anything that would
 * not resolve to an http(s) URL.
 */
export function normalizeUrl(candidate: string, originUrl: string): string | null {
  const parsed = resolve(candidate, originUrl);
  if (!parsed) return null;
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return null;

  parsed.hash = "";
  for (const key of Array.from(parsed.searchParams.keys())) {
    const lower = key.toLowerCase();
    if (lower.startsWith("utm_") || TRACKING_PARAMS.has(lower)) {
      parsed.searchParams.delete(key);
    }
  }
  if (parsed.pathname !== "/" && parsed.pathname.endsWith("/")) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, "") || "/";
  }

  return parsed.href;
}

export function isEligible(
  candidateUrl: string,
  originUrl: string,
  patterns: readonly RegExp[] = DEFAULT_EXCLUDED_PATTERNS
): boolean {
  let origin: URL;
  try {
    origin = new URL(originUrl);
  } catch {
    return false;
  }

  const normalized = normalizeUrl(candidateUrl, originUrl);
  if (!normalized) return false;

  const parsed = new URL(normalized);
  if (parsed.host !== origin.host) return false;

  const target = parsed.pathname + parsed.search;
  for (const pattern of patterns) {
    if (pattern.test(target)) return false;
  }

  return true;
}

export interface FilterEligibleArgs {
  patterns?: readonly RegExp[];
  urlLimit: number;
}

/**
 * Filter, de-duplicate by normalized form and cap, keeping discovery order.
 */
export function filterEligibleUrls(
  urls: Iterable<string>,
  originUrl: string,
  { patterns = DEFAULT_EXCLUDED_PATTERNS, urlLimit }: FilterEligibleArgs
): string[] {
  const seen = new Set<string>();
  const accepted: string[] = [];

  for (const u of urls) {
    if (!isEligible(u, originUrl, patterns)) continue;
    const normalized = normalizeUrl(u, originUrl);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    accepted.push(normalized);
  }

  // No batching at this stage: a single batch holding everything under the cap.
  return planBatches(accepted, urlLimit, Math.max(accepted.length, 1)).flat();
}
