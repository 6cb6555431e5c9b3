import { describe, it, expect } from "vitest";
import { checkRsl } from "../server/audit/rsl";

describe("checkRsl", () => {
  it("reports missing robots.txt", () => {
    expect(checkRsl(null)).toEqual({
      hasCrawlDelay: false,
      crawlDelayValue: null,
      hasSitemapDirective: false,
      sitemapUrls: [],
      hasAiSpecificRules: false,
      aiSpecificAgents: [],
      summary: "No robots.txt available for RSL analysis",
    });
  });

  it("collects crawl delay, sitemaps and AI-specific groups", () => {
    const robots = [
      "User-agent: *",
      "Crawl-delay: 2.5",
      "Crawl-delay: 9",
      "",
      "User-agent: GPTBot",
      "User-agent: gptbot",
      "Disallow: /private",
      "User-agent: ClaudeBot",
      "User-agent: GPTBot",
      "Sitemap: https://example.com/sitemap.xml",
      "sitemap:https://example.com/news.xml",
    ].join("\r\n");

    expect(checkRsl(robots)).toEqual({
      hasCrawlDelay: true,
      crawlDelayValue: 2.5,
      hasSitemapDirective: true,
      sitemapUrls: ["https://example.com/sitemap.xml", "https://example.com/news.xml"],
      hasAiSpecificRules: true,
      aiSpecificAgents: ["GPTBot", "ClaudeBot"],
      summary:
        "Crawl-delay: 2.5s; 2 Sitemap URL(s); AI-specific rules for: GPTBot, ClaudeBot",
    });
  });

  it("skips unparseable delays and keeps looking", () => {
    const report = checkRsl("Crawl-delay: soon\nCrawl-delay: 4\n");
    expect(report.crawlDelayValue).toBe(4);
    expect(report.summary).toBe("Crawl-delay: 4s");
  });

  it("says so when nothing relevant is present", () => {
    expect(checkRsl("User-agent: *\nDisallow:\n").summary).toBe("No RSL signals found");
  });
});
