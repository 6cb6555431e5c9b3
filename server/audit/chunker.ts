const HEADING_LINE = /^#{1,6}\s.*$/gm;

export const SWEET_SPOT_MIN_WORDS = 50;
export const SWEET_SPOT_MAX_WORDS = 150;

export interface ContentChunk {
  headingContext: string | null;
  content: string;
  wordCount: number;
  tokenEstimate: number;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Splits markdown into heading-delimited chunks. Text before the first
 * heading is its own chunk; whitespace-only chunks are dropped.
 */
export function chunkMarkdown(markdown: string): ContentChunk[] {
  const chunks: ContentChunk[] = [];
  let heading: string | null = null;
  let lastIndex = 0;

  const push = (text: string) => {
    const content = text.trim();
    if (!content) return;
    chunks.push({
      headingContext: heading,
      content,
      wordCount: countWords(content),
      tokenEstimate: estimateTokens(content),
    });
  };

  for (const match of markdown.matchAll(HEADING_LINE)) {
    const index = match.index ?? 0;
    push(markdown.slice(lastIndex, index));
    heading = match[0].replace(/^#{1,6}\s+/, "").trim();
    lastIndex = index + match[0].length;
  }
  push(markdown.slice(lastIndex));

  return chunks;
}

export function getChunkStats(chunks: ContentChunk[]): {
  chunkCount: number;
  avgChunkWords: number;
  chunksInSweetSpot: number;
} {
  if (chunks.length === 0) {
    return { chunkCount: 0, avgChunkWords: 0, chunksInSweetSpot: 0 };
  }

  const totalWords = chunks.reduce((sum, c) => sum + c.wordCount, 0);

  return {
    chunkCount: chunks.length,
    avgChunkWords: Math.floor(totalWords / chunks.length),
    chunksInSweetSpot: chunks.filter(
      (c) => c.wordCount >= SWEET_SPOT_MIN_WORDS && c.wordCount <= SWEET_SPOT_MAX_WORDS
    ).length,
  };
}
