import type { ContentReport } from "./types";
import { chunkMarkdown, countWords, getChunkStats } from "./chunker";
import { CONTENT_MAX, scoreContent } from "./scoring";

const HEADING_PATTERN = /^(#{1,6})\s/gm;
const LIST_PATTERN = /^\s*[-*+]\s/m;
const VOWEL_GROUPS = /[aeiouy]+/gi;

export function emptyContentReport(summary: string): ContentReport {
  return {
    pillar: "content",
    wordCount: 0,
    charCount: 0,
    hasHeadings: false,
    hasLists: false,
    hasCodeBlocks: false,
    headingCount: 0,
    headingHierarchyValid: true,
    chunkCount: 0,
    avgChunkWords: 0,
    chunksInSweetSpot: 0,
    readabilityGrade: null,
    answerFirstRatio: 0,
    score: 0,
    max: CONTENT_MAX,
    summary,
  };
}

/**
 * Heading count, and whether each heading goes at most one level deeper than
 * the heading before it. Going back up is always valid.
 */
export function analyzeHeadings(markdown: string): { headingCount: number; headingHierarchyValid: boolean } {
  const levels = Array.from(markdown.matchAll(HEADING_PATTERN), (m) => m[1].length);
  if (levels.length === 0) return { headingCount: 0, headingHierarchyValid: true };

  let previous = levels[0];
  for (const level of levels.slice(1)) {
    if (level > previous + 1) {
      return { headingCount: levels.length, headingHierarchyValid: false };
    }
    previous = level;
  }
  return { headingCount: levels.length, headingHierarchyValid: true };
}

function countSyllables(word: string): number {
  return Math.max(1, (word.match(VOWEL_GROUPS) ?? []).length);
}

/** Flesch-Kincaid grade level, or null for texts under 30 words. */
export function readabilityGrade(text: string): number | null {
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length < 30) return null;

  const sentences = text.split(/[.!?]+/).filter((s) => s.trim()).length || 1;
  const syllables = words.reduce((sum, w) => sum + countSyllables(w), 0);
  const grade = 0.39 * (words.length / sentences) + 11.8 * (syllables / words.length) - 15.59;
  return Math.round(grade * 10) / 10;
}

/** Share of heading-delimited sections whose first sentence is not a question. */
export function answerFirstRatio(markdown: string): number {
  const sections = chunkMarkdown(markdown);
  if (sections.length === 0) return 0;

  const answerFirst = sections.filter((section) => {
    const first = section.content.split(/(?<=[.!?])\s/, 1)[0].trim();
    return first.length > 0 && !first.endsWith("?");
  }).length;

  return Math.round((answerFirst / sections.length) * 100) / 100;
}

export function checkContent(markdown: string): ContentReport {
  if (!markdown) return emptyContentReport("No content extracted");

  const wordCount = countWords(markdown);
  const hasHeadings = /^#{1,6}\s/m.test(markdown);
  const hasLists = LIST_PATTERN.test(markdown);
  const hasCodeBlocks = markdown.includes("```");

  const parts = [`${wordCount} words`];
  if (hasHeadings) parts.push("has headings");
  if (hasLists) parts.push("has lists");
  if (hasCodeBlocks) parts.push("has code blocks");

  return {
    pillar: "content",
    wordCount,
    charCount: markdown.length,
    hasHeadings,
    hasLists,
    hasCodeBlocks,
    ...analyzeHeadings(markdown),
    ...getChunkStats(chunkMarkdown(markdown)),
    readabilityGrade: readabilityGrade(markdown),
    answerFirstRatio: answerFirstRatio(markdown),
    score: scoreContent({ wordCount, hasHeadings, hasLists, hasCodeBlocks }),
    max: CONTENT_MAX,
    summary: parts.join(", "),
  };
}
