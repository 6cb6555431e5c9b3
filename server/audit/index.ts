export { runAudit, runSiteAudit, scorePage, failedPageScore } from "./auditor";
export { runBatchAudit, parseUrlList } from "./batch";
export type { BatchAuditOptions, UrlListFormat } from "./batch";
export { aggregatePageScores, pageWeight, isSuccessfulPage } from "./aggregator";
export { discoverPages } from "./discovery";
export { crawlPage, crawlPages } from "./crawler";
export { convertHtmlToMarkdown, extractMainContent } from "./extractor";
export { checkRobots, parseRobotsTxt, isAllowed, AI_AGENTS } from "./robots";
export { checkContextFile } from "./context-file";
export { checkStructuredData } from "./structured-data";
export { checkContent } from "./content";
export { checkRsl } from "./rsl";
export { checkContentUsage } from "./content-usage";
export { checkEeat } from "./eeat";
export { AuditConfigSchema } from "./types";
export type {
  AuditConfig,
  AuditConfigInput,
  AuditPhase,
  AuditReport,
  BatchAuditReport,
  ContentReport,
  ContentUsageReport,
  ContextFileReport,
  CrawlResult,
  DiscoveryResult,
  EeatReport,
  PageScore,
  PillarReport,
  ProgressCallback,
  RobotsReport,
  RslReport,
  SiteAuditReport,
  StructuredDataReport,
} from "./types";
