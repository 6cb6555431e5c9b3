import type { AgentAccess } from "./types";

export const ROBOTS_MAX = 25;
export const CONTEXT_FILE_MAX = 10;
export const STRUCTURED_DATA_MAX = 25;
export const CONTENT_MAX = 40;

export const OVERALL_MAX = ROBOTS_MAX + CONTEXT_FILE_MAX + STRUCTURED_DATA_MAX + CONTENT_MAX;

/** (minWords, baseScore), evaluated top-down; the first match wins. */
export const CONTENT_WORD_TIERS: ReadonlyArray<readonly [number, number]> = [
  [1500, 25],
  [800, 20],
  [400, 15],
  [150, 8],
];

export const CONTENT_HEADING_BONUS = 7;
export const CONTENT_LIST_BONUS = 5;
export const CONTENT_CODE_BONUS = 3;

export const STRUCTURED_DATA_BASE = 8;
export const STRUCTURED_DATA_HIGH_VALUE_BONUS = 5;
export const STRUCTURED_DATA_STANDARD_BONUS = 3;
export const HIGH_VALUE_TYPES: ReadonlySet<string> = new Set([
  "FAQPage",
  "HowTo",
  "Article",
  "Product",
  "Recipe",
]);

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function scoreRobots(found: boolean, agents: AgentAccess[]): number {
  if (!found || agents.length === 0) return 0;
  const allowed = agents.filter((a) => a.allowed).length;
  return round1((ROBOTS_MAX * allowed) / agents.length);
}

export function scoreContextFile(found: boolean, fullFound: boolean): number {
  return found || fullFound ? CONTEXT_FILE_MAX : 0;
}

export function scoreStructuredData(types: string[]): number {
  if (types.length === 0) return 0;
  const unique = new Set(types);
  let high = 0;
  unique.forEach((t) => {
    if (HIGH_VALUE_TYPES.has(t)) high++;
  });
  const standard = unique.size - high;
  return Math.min(
    STRUCTURED_DATA_MAX,
    STRUCTURED_DATA_BASE + STRUCTURED_DATA_HIGH_VALUE_BONUS * high + STRUCTURED_DATA_STANDARD_BONUS * standard
  );
}

export function contentTierScore(wordCount: number): number {
  for (const [minWords, points] of CONTENT_WORD_TIERS) {
    if (wordCount >= minWords) return points;
  }
  return 0;
}

export function scoreContent(metrics: {
  wordCount: number;
  hasHeadings: boolean;
  hasLists: boolean;
  hasCodeBlocks: boolean;
}): number {
  let score = contentTierScore(metrics.wordCount);
  if (metrics.hasHeadings) score += CONTENT_HEADING_BONUS;
  if (metrics.hasLists) score += CONTENT_LIST_BONUS;
  if (metrics.hasCodeBlocks) score += CONTENT_CODE_BONUS;
  return Math.min(CONTENT_MAX, score);
}

export function overallScore(...pillarScores: number[]): number {
  return round1(pillarScores.reduce((sum, s) => sum + s, 0));
}
