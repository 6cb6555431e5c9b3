import type { ContextFileReport, RequestOptions } from "./types";
import { fetchTextFile } from "./fetcher";
import { getOrigin } from "./url-utils";
import { CONTEXT_FILE_MAX, scoreContextFile } from "./scoring";

export const CONTEXT_FILE_PATHS = ["/llms.txt", "/.well-known/llms.txt"] as const;
export const FULL_CONTEXT_FILE_PATHS = ["/llms-full.txt", "/.well-known/llms-full.txt"] as const;

/** First path (in order) that answers 200 with a non-blank body. */
async function probe(base: string, paths: readonly string[], options: RequestOptions): Promise<string | null> {
  for (const path of paths) {
    const probeUrl = `${base}${path}`;
    const content = await fetchTextFile(probeUrl, options);
    if (content !== null) return probeUrl;
  }
  return null;
}

export function contextFileNotFound(summary: string): ContextFileReport {
  return {
    pillar: "contextFile",
    found: false,
    url: null,
    fullFound: false,
    fullUrl: null,
    score: 0,
    max: CONTEXT_FILE_MAX,
    summary,
  };
}

export async function checkContextFile(url: string, options: RequestOptions): Promise<ContextFileReport> {
  const base = getOrigin(url);

  const found = await probe(base, CONTEXT_FILE_PATHS, options);
  const fullFound = await probe(base, FULL_CONTEXT_FILE_PATHS, options);

  const parts: string[] = [];
  if (found) parts.push(`llms.txt at ${found}`);
  if (fullFound) parts.push(`llms-full.txt at ${fullFound}`);

  return {
    pillar: "contextFile",
    found: found !== null,
    url: found,
    fullFound: fullFound !== null,
    fullUrl: fullFound,
    score: scoreContextFile(found !== null, fullFound !== null),
    max: CONTEXT_FILE_MAX,
    summary: parts.length > 0 ? `Found: ${parts.join(", ")}` : "llms.txt not found",
  };
}
