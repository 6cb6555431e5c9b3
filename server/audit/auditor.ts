import type {
  AuditConfig,
  AuditConfigInput,
  AuditPhase,
  AuditReport,
  ContentUsageReport,
  ContextFileReport,
  CrawlResult,
  PageScore,
  ProgressCallback,
  RequestOptions,
  RobotsReport,
  SiteAuditReport,
} from "./types";
import { AuditConfigSchema } from "./types";
import { checkRobots, robotsNotFound } from "./robots";
import type { RobotsCheck } from "./robots";
import { checkContextFile, contextFileNotFound } from "./context-file";
import { checkStructuredData, emptyStructuredDataReport } from "./structured-data";
import { checkContent, emptyContentReport } from "./content";
import { checkContentUsage } from "./content-usage";
import { checkRsl } from "./rsl";
import { checkEeat } from "./eeat";
import { crawlPage, crawlPages } from "./crawler";
import { discoverPages } from "./discovery";
import { aggregatePageScores } from "./aggregator";
import { overallScore } from "./scoring";
import { getDomain } from "./url-utils";
import { logger, errorMessage } from "../logger";

export function scorePage(crawl: CrawlResult): PageScore {
  return {
    url: crawl.url,
    structuredData: checkStructuredData(crawl.html),
    content: checkContent(crawl.markdown),
    errors: [],
  };
}

/** Zero-scored entry for a page that could not be crawled. */
export function failedPageScore(url: string, error: string): PageScore {
  return {
    url,
    structuredData: emptyStructuredDataReport("Crawl failed"),
    content: emptyContentReport("Crawl failed"),
    errors: [error],
  };
}

function requestOptions(config: AuditConfig, signal?: AbortSignal): RequestOptions {
  return { timeoutMs: config.timeoutMs, userAgent: config.userAgent, signal, ssrfGuard: config.ssrfGuard };
}

interface SiteWideChecks {
  robots: RobotsReport;
  robotsTxt: string | null;
  contextFile: ContextFileReport;
  /** Null when the header check itself rejected. */
  contentUsage: ContentUsageReport | null;
  /** Null when the crawl task itself rejected. */
  seed: CrawlResult | null;
  errors: string[];
}

/**
 * Robots, context file, the Content-Usage header and the seed crawl run
 * concurrently. A rejected task
 * becomes a "Check failed" report and never cancels its siblings.
 */
async function runSiteWideChecks(config: AuditConfig, signal?: AbortSignal): Promise<SiteWideChecks> {
  const options = requestOptions(config, signal);
  const [robotsOutcome, contextOutcome, usageOutcome, seedOutcome] = await Promise.allSettled([
    checkRobots(config.url, { ...options, agents: config.agents }),
    checkContextFile(config.url, options),
    checkContentUsage(config.url, options),
    crawlPage(config.url, { ...options, stripSelectors: config.stripSelectors }),
  ]);

  const errors: string[] = [];

  let robots: RobotsCheck;
  if (robotsOutcome.status === "fulfilled") {
    robots = robotsOutcome.value;
  } else {
    errors.push(`Robots check failed: ${errorMessage(robotsOutcome.reason)}`);
    robots = { report: robotsNotFound("Check failed"), rawText: null };
  }

  let contextFile: ContextFileReport;
  if (contextOutcome.status === "fulfilled") {
    contextFile = contextOutcome.value;
  } else {
    errors.push(`llms.txt check failed: ${errorMessage(contextOutcome.reason)}`);
    contextFile = contextFileNotFound("Check failed");
  }

  let contentUsage: ContentUsageReport | null = null;
  if (usageOutcome.status === "fulfilled") {
    contentUsage = usageOutcome.value;
  } else {
    errors.push(`Content-Usage check failed: ${errorMessage(usageOutcome.reason)}`);
  }

  let seed: CrawlResult | null = null;
  if (seedOutcome.status === "fulfilled") {
    seed = seedOutcome.value;
  } else {
    errors.push(`Seed crawl failed: ${errorMessage(seedOutcome.reason)}`);
  }

  return { robots: robots.report, robotsTxt: robots.rawText, contextFile, contentUsage, seed, errors };
}

/** Audits one page: site-wide checks plus that page's structured data and content. */
export async function runAudit(input: AuditConfigInput): Promise<AuditReport> {
  const startTime = Date.now();
  const config = AuditConfigSchema.parse(input);

  const checks = await runSiteWideChecks(config);
  const errors = [...checks.errors];
  const crawl = checks.seed;

  if (crawl && !crawl.success && crawl.error) {
    errors.push(`Crawl error: ${crawl.error}`);
  }

  const html = crawl?.success ? crawl.html : "";
  const markdown = crawl?.success ? crawl.markdown : "";
  const structuredData = checkStructuredData(html);
  const content = checkContent(markdown);

  return {
    url: config.url,
    overallScore: overallScore(checks.robots.score, checks.contextFile.score, structuredData.score, content.score),
    robots: checks.robots,
    contextFile: checks.contextFile,
    structuredData,
    content,
    rsl: checkRsl(checks.robotsTxt),
    contentUsage: checks.contentUsage,
    eeat: checkEeat(html, getDomain(config.url)),
    errors,
    durationMs: Date.now() - startTime,
  };
}

async function runSitePhases(
  config: AuditConfig,
  signal: AbortSignal,
  progress: (phase: AuditPhase, message: string) => void,
  startTime: number
): Promise<SiteAuditReport> {
  progress("site-wide-checks", "Running site-wide checks");
  const checks = await runSiteWideChecks(config, signal);
  const errors = [...checks.errors];
  const seed = checks.seed;

  progress("discovery", "Discovering pages");
  const discovery = await discoverPages(config.url, {
    ...requestOptions(config, signal),
    maxPages: config.maxPages,
    robotsTxt: checks.robotsTxt,
    seedLinks: seed?.success ? seed.internalLinks : [],
  });

  const remaining = discovery.urlsSampled.filter((u) => u !== config.url);
  progress("batch-crawl", `Crawling ${remaining.length} additional pages`);
  const crawled =
    remaining.length > 0
      ? await crawlPages(remaining, {
          ...requestOptions(config, signal),
          stripSelectors: config.stripSelectors,
          crawlDelayMs: config.crawlDelayMs,
          concurrency: config.concurrency,
        })
      : [];

  progress("per-page-scoring", `Scoring ${crawled.length + 1} pages`);
  const pages: PageScore[] = [];
  if (seed?.success) {
    pages.push(scorePage(seed));
  } else {
    const seedError = seed?.error ?? "Unknown crawl error";
    if (seed) errors.push(`Seed crawl error: ${seedError}`);
    pages.push(failedPageScore(config.url, seedError));
  }
  for (const result of crawled) {
    pages.push(result.success ? scorePage(result) : failedPageScore(result.url, result.error ?? "Unknown crawl error"));
  }

  progress("aggregation", "Aggregating page scores");
  const aggregate = aggregatePageScores(pages, checks.robots, checks.contextFile);

  return {
    url: config.url,
    domain: getDomain(config.url),
    overallScore: aggregate.overallScore,
    robots: checks.robots,
    contextFile: checks.contextFile,
    structuredData: aggregate.structuredData,
    content: aggregate.content,
    rsl: checkRsl(checks.robotsTxt),
    contentUsage: checks.contentUsage,
    eeat: checkEeat(seed?.success ? seed.html : "", getDomain(config.url)),
    discovery,
    pages,
    pagesAudited: pages.length,
    pagesFailed: pages.filter((p) => p.errors.length > 0).length,
    errors,
    durationMs: Date.now() - startTime,
  };
}

function timedOutReport(config: AuditConfig, startTime: number): SiteAuditReport {
  const summary = "Timed out";
  return {
    url: config.url,
    domain: getDomain(config.url),
    overallScore: 0,
    robots: robotsNotFound(summary),
    contextFile: contextFileNotFound(summary),
    structuredData: emptyStructuredDataReport(summary),
    content: emptyContentReport(summary),
    discovery: { method: "timeout", urlsFound: 0, urlsSampled: [], summary },
    pages: [],
    pagesAudited: 0,
    pagesFailed: 0,
    errors: [`Audit timed out after ${config.deadlineMs / 1000}s`],
    durationMs: Date.now() - startTime,
  };
}

/**
 * Multi-page audit: site-wide checks, discovery, a staggered batch crawl,
 * per-page scoring and depth-weighted aggregation. The whole run is bounded
 * by `deadlineMs`; on expiry in-flight requests are aborted, partial work is
 * discarded and a zero-scored "Timed out" report is returned.
 */
export async function runSiteAudit(input: AuditConfigInput, onProgress?: ProgressCallback): Promise<SiteAuditReport> {
  const startTime = Date.now();
  const config = AuditConfigSchema.parse(input);
  const controller = new AbortController();

  const progress = (phase: AuditPhase, message: string) => {
    if (controller.signal.aborted) return;
    logger.info("audit", `${phase}: ${message}`);
    onProgress?.(phase, message);
  };

  progress("init", `Auditing ${config.url}`);

  let deadlineTimer: NodeJS.Timeout | undefined;
  const deadline = new Promise<"timeout">((resolve) => {
    deadlineTimer = setTimeout(() => resolve("timeout"), config.deadlineMs);
  });

  try {
    const outcome = await Promise.race([runSitePhases(config, controller.signal, progress, startTime), deadline]);
    if (outcome === "timeout") {
      controller.abort();
      logger.warn("audit", `Deadline of ${config.deadlineMs}ms reached for ${config.url}`);
      onProgress?.("done", "Timed out");
      return timedOutReport(config, startTime);
    }
    progress("done", `Overall score ${outcome.overallScore}`);
    return outcome;
  } finally {
    clearTimeout(deadlineTimer);
  }
}
