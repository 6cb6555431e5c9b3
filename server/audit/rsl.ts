import type { RslReport } from "./types";
import { AI_AGENTS } from "./robots";

const LINE_SPLIT_REGEX = /\r\n|\r|\n/;
const USER_AGENT_LINE = /^user-agent:\s*(.+)$/i;
const CRAWL_DELAY_LINE = /^crawl-delay:\s*(.+)$/i;
const SITEMAP_LINE = /^sitemap:\s*(.+)$/i;

export function emptyRslReport(summary: string): RslReport {
  return {
    hasCrawlDelay: false,
    crawlDelayValue: null,
    hasSitemapDirective: false,
    sitemapUrls: [],
    hasAiSpecificRules: false,
    aiSpecificAgents: [],
    summary,
  };
}

/**
 * Licensing-relevant signals in a raw robots.txt: the first valid
 * Crawl-delay, every Sitemap line and the known AI bots that get a
 * User-agent line of their own. Agent names match exactly.
 */
export function checkRsl(robotsTxt: string | null): RslReport {
  if (robotsTxt === null) {
    return emptyRslReport("No robots.txt available for RSL analysis");
  }

  let crawlDelay: number | null = null;
  const sitemapUrls: string[] = [];
  const aiAgents: string[] = [];

  for (const rawLine of robotsTxt.split(LINE_SPLIT_REGEX)) {
    const line = rawLine.trim();

    const sitemap = SITEMAP_LINE.exec(line);
    if (sitemap) {
      sitemapUrls.push(sitemap[1].trim());
      continue;
    }

    if (crawlDelay === null) {
      const delay = CRAWL_DELAY_LINE.exec(line);
      if (delay) {
        const seconds = Number(delay[1].trim());
        if (Number.isFinite(seconds)) crawlDelay = seconds;
        continue;
      }
    }

    const userAgent = USER_AGENT_LINE.exec(line);
    if (userAgent) {
      const agent = userAgent[1].trim();
      if (agent !== "*" && AI_AGENTS.includes(agent) && !aiAgents.includes(agent)) {
        aiAgents.push(agent);
      }
    }
  }

  const parts: string[] = [];
  if (crawlDelay !== null) parts.push(`Crawl-delay: ${crawlDelay}s`);
  if (sitemapUrls.length > 0) parts.push(`${sitemapUrls.length} Sitemap URL(s)`);
  if (aiAgents.length > 0) parts.push(`AI-specific rules for: ${aiAgents.join(", ")}`);

  return {
    hasCrawlDelay: crawlDelay !== null,
    crawlDelayValue: crawlDelay,
    hasSitemapDirective: sitemapUrls.length > 0,
    sitemapUrls,
    hasAiSpecificRules: aiAgents.length > 0,
    aiSpecificAgents: aiAgents,
    summary: parts.length > 0 ? parts.join("; ") : "No RSL signals found",
  };
}
