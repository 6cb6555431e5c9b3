import type {
  ContentReport,
  ContextFileReport,
  PageScore,
  RobotsReport,
  StructuredDataReport,
} from "./types";
import { getPathDepth } from "./url-utils";
import { STRUCTURED_DATA_MAX, overallScore, round1 } from "./scoring";
import { emptyStructuredDataReport } from "./structured-data";
import { emptyContentReport } from "./content";

export const NO_SUCCESSFUL_PAGES = "No pages audited successfully";

/** Shallow pages count more: depth 0-1 weighs 3, depth 2 weighs 2, deeper pages 1. */
export function pageWeight(url: string): number {
  const depth = getPathDepth(url);
  if (depth <= 1) return 3;
  if (depth === 2) return 2;
  return 1;
}

/**
 * A page takes part in aggregation when it has no errors, or when it has
 * errors but still produced some content.
 */
export function isSuccessfulPage(page: PageScore): boolean {
  return page.errors.length === 0 || page.content.wordCount > 0;
}

export interface AggregateResult {
  structuredData: StructuredDataReport;
  content: ContentReport;
  overallScore: number;
}

function weightedAverage(values: Array<{ value: number; weight: number }>): number {
  const totalWeight = values.reduce((sum, v) => sum + v.weight, 0);
  if (totalWeight === 0) return 0;
  return round1(values.reduce((sum, v) => sum + v.value * v.weight, 0) / totalWeight);
}

export function aggregatePageScores(
  pages: PageScore[],
  robots: RobotsReport,
  contextFile: ContextFileReport
): AggregateResult {
  const successful = pages.filter(isSuccessfulPage);

  if (successful.length === 0) {
    return {
      structuredData: emptyStructuredDataReport(NO_SUCCESSFUL_PAGES),
      content: emptyContentReport(NO_SUCCESSFUL_PAGES),
      overallScore: overallScore(robots.score, contextFile.score),
    };
  }

  const weights = successful.map((p) => pageWeight(p.url));
  const n = successful.length;

  const sdScore = weightedAverage(successful.map((p, i) => ({ value: p.structuredData.score, weight: weights[i] })));
  const blocksFound = successful.reduce((sum, p) => sum + p.structuredData.blocksFound, 0);

  const structuredData: StructuredDataReport = {
    pillar: "structuredData",
    blocksFound,
    schemas: successful.flatMap((p) => p.structuredData.schemas),
    score: sdScore,
    max: STRUCTURED_DATA_MAX,
    summary: `${blocksFound} JSON-LD block(s) across ${n} pages (weighted avg score ${sdScore})`,
  };

  const contentScore = weightedAverage(successful.map((p, i) => ({ value: p.content.score, weight: weights[i] })));
  const avgWords = Math.floor(successful.reduce((sum, p) => sum + p.content.wordCount, 0) / n);
  const avgChars = Math.floor(successful.reduce((sum, p) => sum + p.content.charCount, 0) / n);
  const chunkCount = successful.reduce((sum, p) => sum + p.content.chunkCount, 0);

  const content: ContentReport = {
    ...emptyContentReport(`avg ${avgWords} words across ${n} pages (weighted avg score ${contentScore})`),
    wordCount: avgWords,
    charCount: avgChars,
    hasHeadings: successful.some((p) => p.content.hasHeadings),
    hasLists: successful.some((p) => p.content.hasLists),
    hasCodeBlocks: successful.some((p) => p.content.hasCodeBlocks),
    headingCount: successful.reduce((sum, p) => sum + p.content.headingCount, 0),
    headingHierarchyValid: successful.every((p) => p.content.headingHierarchyValid),
    chunkCount,
    avgChunkWords:
      chunkCount > 0
        ? Math.floor(successful.reduce((sum, p) => sum + p.content.avgChunkWords * p.content.chunkCount, 0) / chunkCount)
        : 0,
    chunksInSweetSpot: successful.reduce((sum, p) => sum + p.content.chunksInSweetSpot, 0),
    score: contentScore,
  };

  return {
    structuredData,
    content,
    overallScore: overallScore(robots.score, contextFile.score, structuredData.score, content.score),
  };
}
