import * as cheerio from "cheerio";

export function extractSitemapUrlsFromRobotsTxt(robotsTxt: string): string[] {
  const sitemapUrls: string[] = [];

  for (const line of robotsTxt.split(/\r?\n/)) {
    const match = line.match(/^\s*Sitemap:\s*(\S+)\s*$/i);
    if (match) sitemapUrls.push(match[1]);
  }

  return sitemapUrls;
}

/**
 * Split a sitemap document into child sitemaps (for a sitemap index) and page
 * URLs (for a urlset). Namespaced documents parse the same way.
 */
export function extractSitemapUrlsFromXml(xml: string): {
  childSitemaps: string[];
  urls: string[];
} {
  const $ = cheerio.load(xml, { xml: true });
  const locs = (selector: string) =>
    $(selector)
      .map((_, el) => $(el).text().trim())
      .get()
      .filter((loc) => loc.length > 0);

  const childSitemaps = locs("sitemapindex > sitemap > loc");
  if (childSitemaps.length > 0) {
    return { childSitemaps, urls: [] };
  }

  return { childSitemaps: [], urls: locs("urlset > url > loc") };
}

export function extractLinksFromHtml(html: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];

  $("a[href]").each((_, el) => {
    const anchor = $(el);
    if (anchor.attr("download") !== undefined) return;
    if ((anchor.attr("rel") ?? "").toLowerCase().split(/\s+/).includes("nofollow")) return;

    const href = anchor.attr("href")?.trim();
    if (href) links.push(href);
  });

  return links;
}
