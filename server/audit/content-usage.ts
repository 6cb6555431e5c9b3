import type { ContentUsageReport, RequestOptions } from "./types";
import { fetchText } from "./fetcher";

const KEY_VALUE = /(\w+)\s*=\s*(\w+)/g;

function notFound(summary: string): ContentUsageReport {
  return { headerFound: false, headerValue: null, allowsTraining: null, allowsSearch: null, summary };
}

/** "yes" and "no" in any case; anything else is unknown. */
function parseYesNo(value: string | undefined): boolean | null {
  const lower = value?.trim().toLowerCase();
  if (lower === "yes") return true;
  if (lower === "no") return false;
  return null;
}

export function parseContentUsage(raw: string): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const match of raw.matchAll(KEY_VALUE)) {
    pairs.set(match[1].toLowerCase(), match[2]);
  }
  return pairs;
}

/** Reads the IETF `Content-Usage` response header with a HEAD request. */
export async function checkContentUsage(url: string, options: RequestOptions): Promise<ContentUsageReport> {
  const result = await fetchText(url, { ...options, method: "HEAD" });

  if ("error" in result) {
    return notFound(`Content-Usage check failed: ${result.error}`);
  }
  if (result.statusCode !== 200) {
    return notFound("Content-Usage header not found (non-200 response)");
  }

  const raw = (result.headers.get("content-usage") ?? "").trim();
  if (!raw) return notFound("Content-Usage header not found");

  const pairs = parseContentUsage(raw);
  const allowsTraining = parseYesNo(pairs.get("training"));
  const allowsSearch = parseYesNo(pairs.get("search"));

  const parts = [`Content-Usage: ${raw}`];
  if (allowsTraining !== null) parts.push(`training=${allowsTraining ? "allowed" : "blocked"}`);
  if (allowsSearch !== null) parts.push(`search=${allowsSearch ? "allowed" : "blocked"}`);

  return {
    headerFound: true,
    headerValue: raw,
    allowsTraining,
    allowsSearch,
    summary: parts.join("; "),
  };
}
