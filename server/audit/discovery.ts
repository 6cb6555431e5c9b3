import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import type { DiscoveryMethod, DiscoveryResult, RequestOptions } from "./types";
import { fetchText } from "./fetcher";
import { isAllowed, parseRobotsTxt } from "./robots";
import { getSection, getSitemapUrls, urlKey } from "./url-utils";
import { logger } from "../logger";

export const MAX_SITEMAP_URLS = 500;
export const MAX_CHILD_SITEMAPS = 10;
/** Agent whose robots.txt rules decide which discovered pages may be sampled. */
export const DISCOVERY_AGENT = "GPTBot";

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  isArray: (name) => name === "sitemap" || name === "url",
});

const locEntry = z.object({ loc: z.coerce.string().optional() });

const sitemapDocument = z.object({
  sitemapindex: z.object({ sitemap: z.array(locEntry).default([]) }).optional(),
  urlset: z.object({ url: z.array(locEntry).default([]) }).optional(),
});

interface ParsedSitemap {
  pageUrls: string[];
  childSitemaps: string[];
}

function locs(entries: Array<z.infer<typeof locEntry>>): string[] {
  return entries.map((e) => e.loc?.trim() ?? "").filter(Boolean);
}

/** Page `<url><loc>` and child `<sitemap><loc>` entries. Unparsable XML yields neither. */
export function parseSitemapXml(xml: string): ParsedSitemap {
  let raw: unknown;
  try {
    raw = xmlParser.parse(xml);
  } catch (e) {
    logger.debug("discovery", "Sitemap XML did not parse", e);
    return { pageUrls: [], childSitemaps: [] };
  }

  const parsed = sitemapDocument.safeParse(raw);
  if (!parsed.success) return { pageUrls: [], childSitemaps: [] };

  return {
    pageUrls: locs(parsed.data.urlset?.url ?? []),
    childSitemaps: locs(parsed.data.sitemapindex?.sitemap ?? []),
  };
}

async function fetchSitemapDocument(url: string, options: RequestOptions): Promise<ParsedSitemap | null> {
  const result = await fetchText(url, { ...options, accept: "application/xml,text/xml,*/*" });
  if ("error" in result) {
    logger.debug("discovery", `Sitemap fetch failed for ${url}: ${result.error}`);
    return null;
  }
  if (result.statusCode !== 200) return null;
  return parseSitemapXml(result.body);
}

/**
 * Page URLs from `/sitemap.xml`, else `/sitemap_index.xml`. Index files pull
 * in up to ten child sitemaps. The first location that yields any URL wins.
 */
export async function fetchSitemapUrls(seedUrl: string, options: RequestOptions): Promise<string[]> {
  for (const sitemapUrl of getSitemapUrls(seedUrl)) {
    const doc = await fetchSitemapDocument(sitemapUrl, options);
    if (!doc) continue;

    const urls = [...doc.pageUrls];
    for (const child of doc.childSitemaps.slice(0, MAX_CHILD_SITEMAPS)) {
      if (urls.length >= MAX_SITEMAP_URLS) break;
      const childDoc = await fetchSitemapDocument(child, options);
      if (childDoc) urls.push(...childDoc.pageUrls);
    }

    if (urls.length > 0) {
      logger.debug("discovery", `${urls.length} URLs from ${sitemapUrl}`);
      return urls.slice(0, MAX_SITEMAP_URLS);
    }
  }
  return [];
}

/**
 * Seed first, then a round-robin over site sections (first path segment,
 * sorted), taking URLs in their original order within a section.
 */
export function selectDiversePages(urls: string[], seedUrl: string, maxPages: number): string[] {
  const selected = [seedUrl];
  const seen = new Set([urlKey(seedUrl)]);
  if (maxPages <= 1) return selected;

  const groups = new Map<string, string[]>();
  for (const url of urls) {
    const key = urlKey(url);
    if (seen.has(key)) continue;
    seen.add(key);
    const section = getSection(url);
    const group = groups.get(section);
    if (group) {
      group.push(url);
    } else {
      groups.set(section, [url]);
    }
  }

  const queues = Array.from(groups.keys())
    .sort()
    .map((section) => groups.get(section) ?? []);

  while (selected.length < maxPages) {
    let took = false;
    for (const queue of queues) {
      const next = queue.shift();
      if (next === undefined) continue;
      selected.push(next);
      took = true;
      if (selected.length >= maxPages) break;
    }
    if (!took) break;
  }

  return selected;
}

export interface DiscoveryOptions extends RequestOptions {
  maxPages: number;
  robotsTxt: string | null;
  seedLinks: string[];
}

export async function discoverPages(seedUrl: string, options: DiscoveryOptions): Promise<DiscoveryResult> {
  let method: DiscoveryMethod = "sitemap";
  let candidates = await fetchSitemapUrls(seedUrl, options);

  if (candidates.length === 0) {
    method = "spider";
    candidates = [...options.seedLinks];
  }

  const urlsFound = candidates.length;

  if (options.robotsTxt && candidates.length > 0) {
    const rules = parseRobotsTxt(options.robotsTxt);
    candidates = candidates.filter((url) => isAllowed(rules, DISCOVERY_AGENT, url));
  }

  const seen = new Set<string>();
  const unique = candidates.filter((url) => {
    const key = urlKey(url);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  const urlsSampled = selectDiversePages(unique, seedUrl, options.maxPages);

  return {
    method,
    urlsFound,
    urlsSampled,
    summary: `method=${method}, found=${urlsFound}, sampled=${urlsSampled.length}`,
  };
}
