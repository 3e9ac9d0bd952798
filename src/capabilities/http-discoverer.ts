import { fetchText } from "../lib/http.js";
import { errorMessage } from "../lib/errors.js";
import {
  extractLinksFromHtml,
  extractSitemapUrlsFromRobotsTxt,
  extractSitemapUrlsFromXml,
} from "../lib/sitemap.js";
import type { LinkDiscoverer } from "./types.js";

export interface HttpDiscovererOptions {
  userAgent?: string;
  requestTimeoutMs?: number;
  /** Also collect page URLs from the site's sitemaps. */
  useSitemaps?: boolean;
  /** Depth bound for nested sitemap indexes. */
  maxSitemapDepth?: number;
}

const COMMON_SITEMAP_PATHS = ["/sitemap.xml", "/sitemap_index.xml"];

/**
 * Links of the seed page first (document order), then sitemap entries. Only
 * the seed page itself is required to load; sitemap trouble is logged and
 * ignored.
 */
export class HttpLinkDiscoverer implements LinkDiscoverer {
  private readonly userAgent?: string;
  private readonly requestTimeoutMs: number;
  private readonly useSitemaps: boolean;
  private readonly maxSitemapDepth: number;

  constructor(options: HttpDiscovererOptions = {}) {
    this.userAgent = options.userAgent;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000;
    this.useSitemaps = options.useSitemaps ?? true;
    this.maxSitemapDepth = options.maxSitemapDepth ?? 2;
  }

  async discoverLinks(seedUrl: string, signal?: AbortSignal): Promise<string[]> {
    const html = await this.get(seedUrl, signal);
    const links = extractLinksFromHtml(html).map((href) => resolveHref(href, seedUrl));

    if (this.useSitemaps) {
      links.push(...(await this.discoverFromSitemaps(seedUrl, signal)));
    }

    return Array.from(new Set(links));
  }

  private get(url: string, signal?: AbortSignal, accept?: string): Promise<string> {
    return fetchText(url, {
      userAgent: this.userAgent,
      timeoutMs: this.requestTimeoutMs,
      accept,
      signal,
    });
  }

  private async discoverFromSitemaps(seedUrl: string, signal?: AbortSignal): Promise<string[]> {
    const origin = new URL(seedUrl).origin;
    const sitemapUrls = await this.sitemapsFromRobots(origin, signal);

    for (const path of COMMON_SITEMAP_PATHS) {
      const url = new URL(path, origin).href;
      if (!sitemapUrls.includes(url)) sitemapUrls.push(url);
    }

    const urls: string[] = [];
    for (const sitemapUrl of sitemapUrls) {
      urls.push(...(await this.parseSitemap(sitemapUrl, 0, signal)));
    }
    return urls;
  }

  private async sitemapsFromRobots(origin: string, signal?: AbortSignal): Promise<string[]> {
    try {
      const robotsTxt = await this.get(new URL("/robots.txt", origin).href, signal, "text/plain");
      return extractSitemapUrlsFromRobotsTxt(robotsTxt);
    } catch {
      return [];
    }
  }

  private async parseSitemap(
    sitemapUrl: string,
    depth: number,
    signal?: AbortSignal
  ): Promise<string[]> {
    signal?.throwIfAborted();
    let xml: string;
    try {
      xml = await this.get(sitemapUrl, signal, "application/xml,text/xml;q=0.9,*/*;q=0.8");
    } catch (error) {
      console.log(`Sitemap ${sitemapUrl} unavailable: ${errorMessage(error)}`);
      return [];
    }

    const { childSitemaps, urls } = extractSitemapUrlsFromXml(xml);
    if (childSitemaps.length === 0 || depth >= this.maxSitemapDepth) return urls;

    console.log(`Found sitemap index with ${childSitemaps.length} sitemaps`);
    const nested: string[] = [];
    for (const childUrl of childSitemaps) {
      nested.push(...(await this.parseSitemap(childUrl, depth + 1, signal)));
    }
    return nested;
  }
}

// Page-relative hrefs become absolute; fragment-only and non-resolvable ones
// stay as written so the URL filter can reject them.
function resolveHref(href: string, pageUrl: string): string {
  if (href.startsWith("#")) return href;
  try {
    return new URL(href, pageUrl).href;
  } catch {
    return href;
  }
}
