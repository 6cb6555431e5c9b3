import pLimit from "p-limit";
import type { CrawlResult, RequestOptions } from "./types";
import { fetchText } from "./fetcher";
import { convertHtmlToMarkdown, extractInternalLinks } from "./extractor";
import { logger, errorMessage } from "../logger";

export interface CrawlOptions extends RequestOptions {
  stripSelectors?: string[];
}

export interface BatchCrawlOptions extends CrawlOptions {
  /** Delay between task launches; task `i` starts after `crawlDelayMs * i`. */
  crawlDelayMs: number;
  concurrency: number;
}

function failedCrawl(url: string, error: string, statusCode = 0): CrawlResult {
  return {
    url,
    success: false,
    statusCode,
    html: "",
    markdown: "",
    internalLinks: [],
    error,
  };
}

/** Resolves after `ms`, or rejects as soon as the signal aborts. */
function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("Request aborted"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("Request aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function isHtmlContentType(contentType: string): boolean {
  if (!contentType) return true;
  return contentType.includes("text/html") || contentType.includes("application/xhtml");
}

/** Fetches one page and turns it into markdown plus its same-site links. Never throws. */
export async function crawlPage(url: string, options: CrawlOptions): Promise<CrawlResult> {
  const result = await fetchText(url, {
    ...options,
    accept: "text/html,application/xhtml+xml",
  });

  if ("error" in result) {
    return failedCrawl(url, result.error);
  }
  if (result.statusCode >= 400) {
    return failedCrawl(url, `HTTP ${result.statusCode}`, result.statusCode);
  }
  if (!isHtmlContentType(result.contentType)) {
    return failedCrawl(url, `Non-HTML content type: ${result.contentType}`, result.statusCode);
  }

  try {
    return {
      url,
      success: true,
      statusCode: result.statusCode,
      html: result.body,
      markdown: convertHtmlToMarkdown(result.body, { stripSelectors: options.stripSelectors }),
      internalLinks: extractInternalLinks(result.body, result.finalUrl),
    };
  } catch (e) {
    logger.warn("crawler", `Extraction failed for ${url}`, e);
    return failedCrawl(url, `Extraction failed: ${errorMessage(e)}`, result.statusCode);
  }
}

/**
 * Crawls every URL with staggered starts and at most `concurrency` requests
 * in flight. Returns one result per input URL, in input order.
 */
export async function crawlPages(urls: string[], options: BatchCrawlOptions): Promise<CrawlResult[]> {
  const limit = pLimit(options.concurrency);

  const crawlOne = async (url: string, index: number): Promise<CrawlResult> => {
    try {
      if (options.crawlDelayMs > 0 && index > 0) {
        await delay(options.crawlDelayMs * index, options.signal);
      }
      return await limit(() => crawlPage(url, options));
    } catch (e) {
      return failedCrawl(url, errorMessage(e));
    }
  };

  return Promise.all(urls.map((url, index) => crawlOne(url, index)));
}
