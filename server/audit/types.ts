import { z } from "zod";

export const AuditConfigSchema = z.object({
  url: z.string().url(),
  maxPages: z.number().int().positive().default(10),
  timeoutMs: z.number().int().positive().default(15000),
  crawlDelayMs: z.number().int().nonnegative().default(1000),
  deadlineMs: z.number().int().positive().default(90000),
  concurrency: z.number().int().positive().default(3),
  userAgent: z.string().default("ai-readiness-audit/1.0"),
  agents: z.array(z.string().min(1)).min(1).optional(),
  stripSelectors: z.array(z.string()).default([]),
  /** Check every request and redirect hop against private addresses. */
  ssrfGuard: z.boolean().default(false),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type AuditConfigInput = z.input<typeof AuditConfigSchema>;

/** Options shared by everything that talks HTTP. */
export interface RequestOptions {
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
  ssrfGuard?: boolean;
}

// ─── Crawl ──────────────────────────────────────────────────────────────────

export interface CrawlResult {
  url: string;
  success: boolean;
  statusCode: number;
  html: string;
  markdown: string;
  internalLinks: string[];
  error?: string;
}

// ─── Pillar reports ─────────────────────────────────────────────────────────

export type PillarName = "robots" | "contextFile" | "structuredData" | "content";

interface PillarReportBase<P extends PillarName> {
  pillar: P;
  score: number;
  max: number;
  summary: string;
}

export interface AgentAccess {
  agent: string;
  allowed: boolean;
  reason: string;
}

export interface RobotsReport extends PillarReportBase<"robots"> {
  found: boolean;
  agents: AgentAccess[];
}

export interface ContextFileReport extends PillarReportBase<"contextFile"> {
  found: boolean;
  url: string | null;
  fullFound: boolean;
  fullUrl: string | null;
}

export interface SchemaEntry {
  type: string;
  properties: string[];
}

export interface StructuredDataReport extends PillarReportBase<"structuredData"> {
  blocksFound: number;
  schemas: SchemaEntry[];
}

export interface ContentReport extends PillarReportBase<"content"> {
  wordCount: number;
  charCount: number;
  hasHeadings: boolean;
  hasLists: boolean;
  hasCodeBlocks: boolean;
  headingCount: number;
  headingHierarchyValid: boolean;
  chunkCount: number;
  avgChunkWords: number;
  chunksInSweetSpot: number;
  /** Flesch-Kincaid grade level; null below 30 words. */
  readabilityGrade: number | null;
  answerFirstRatio: number;
}

export type PillarReport = RobotsReport | ContextFileReport | StructuredDataReport | ContentReport;

// ─── Informational signals (not scored) ─────────────────────────────────────

export interface RslReport {
  hasCrawlDelay: boolean;
  crawlDelayValue: number | null;
  hasSitemapDirective: boolean;
  sitemapUrls: string[];
  hasAiSpecificRules: boolean;
  /** Known AI bots that have a User-agent line of their own. */
  aiSpecificAgents: string[];
  summary: string;
}

export interface ContentUsageReport {
  headerFound: boolean;
  headerValue: string | null;
  allowsTraining: boolean | null;
  allowsSearch: boolean | null;
  summary: string;
}

export interface EeatReport {
  hasAuthor: boolean;
  authorName: string | null;
  hasDate: boolean;
  hasAboutPage: boolean;
  hasContactInfo: boolean;
  hasCitations: boolean;
  citationCount: number;
  trustSignals: string[];
  summary: string;
}

// ─── Pages and discovery ────────────────────────────────────────────────────

export interface PageScore {
  url: string;
  structuredData: StructuredDataReport;
  content: ContentReport;
  errors: string[];
}

export type DiscoveryMethod = "sitemap" | "spider" | "timeout";

export interface DiscoveryResult {
  method: DiscoveryMethod;
  urlsFound: number;
  urlsSampled: string[];
  summary: string;
}

// ─── Reports ────────────────────────────────────────────────────────────────

export interface AuditReport {
  url: string;
  overallScore: number;
  robots: RobotsReport;
  contextFile: ContextFileReport;
  structuredData: StructuredDataReport;
  content: ContentReport;
  rsl?: RslReport;
  /** Null when the header check itself failed. */
  contentUsage?: ContentUsageReport | null;
  eeat?: EeatReport;
  errors: string[];
  durationMs: number;
}

export interface SiteAuditReport extends AuditReport {
  domain: string;
  discovery: DiscoveryResult;
  pages: PageScore[];
  pagesAudited: number;
  pagesFailed: number;
}

export interface BatchAuditReport {
  urls: string[];
  reports: Array<AuditReport | SiteAuditReport>;
  errors: Record<string, string>;
}

export type AuditPhase =
  | "init"
  | "site-wide-checks"
  | "discovery"
  | "batch-crawl"
  | "per-page-scoring"
  | "aggregation"
  | "done";

export type ProgressCallback = (phase: AuditPhase, message: string) => void;
