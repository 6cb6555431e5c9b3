import pLimit from "p-limit";
import type { AuditConfigInput, AuditReport, BatchAuditReport, SiteAuditReport } from "./types";
import { runAudit, runSiteAudit } from "./auditor";
import { logger, errorMessage } from "../logger";

export type UrlListFormat = "txt" | "csv";

const CSV_HEADER_CELLS = new Set(["url", "urls", "uri", "link", "website"]);

function ensureScheme(url: string): string {
  return url.startsWith("http") ? url : `https://${url}`;
}

/** First CSV cell of a line, with surrounding quotes and doubled quotes undone. */
function firstCsvCell(line: string): string {
  const trimmed = line.trim();
  if (!trimmed.startsWith('"')) return trimmed.split(",")[0].trim();

  let cell = "";
  for (let i = 1; i < trimmed.length; i++) {
    const ch = trimmed[i];
    if (ch === '"') {
      if (trimmed[i + 1] === '"') {
        cell += '"';
        i++;
      } else {
        break;
      }
    } else {
      cell += ch;
    }
  }
  return cell.trim();
}

/**
 * URLs from a `.txt` list (one per line) or the first column of a `.csv`.
 * Blank lines, `#` comments and CSV header cells are skipped; bare hosts get
 * `https://`.
 */
export function parseUrlList(text: string, format: UrlListFormat): string[] {
  const urls: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const cell = format === "csv" ? firstCsvCell(line) : line.trim();
    if (!cell || cell.startsWith("#")) continue;
    if (format === "csv" && CSV_HEADER_CELLS.has(cell.toLowerCase())) continue;
    urls.push(ensureScheme(cell));
  }
  return urls;
}

export interface BatchAuditOptions extends Omit<AuditConfigInput, "url" | "concurrency"> {
  /** Run single-page audits instead of site audits. */
  single?: boolean;
  /** Audits in flight at once. */
  concurrency?: number;
  /** Per-site crawl concurrency, passed through to each audit. */
  pageConcurrency?: number;
  onProgress?: (message: string) => void;
}

/**
 * Audits every URL with at most `concurrency` audits running at once. A
 * failing URL is recorded in `errors` and does not stop the others. Reports
 * keep input order.
 */
export async function runBatchAudit(urls: string[], options: BatchAuditOptions = {}): Promise<BatchAuditReport> {
  const { single = false, concurrency = 3, pageConcurrency, onProgress, ...config } = options;
  const limit = pLimit(concurrency);
  const errors: Record<string, string> = {};

  const auditOne = async (url: string): Promise<AuditReport | SiteAuditReport | null> => {
    onProgress?.(`Auditing ${url}`);
    const input: AuditConfigInput = { ...config, url, concurrency: pageConcurrency };
    try {
      return single ? await runAudit(input) : await runSiteAudit(input);
    } catch (e) {
      logger.warn("batch", `Audit failed for ${url}`, e);
      errors[url] = errorMessage(e);
      return null;
    }
  };

  const results = await Promise.all(urls.map((url) => limit(() => auditOne(url))));
  const reports = results.filter((r): r is AuditReport | SiteAuditReport => r !== null);

  return { urls, reports, errors };
}
