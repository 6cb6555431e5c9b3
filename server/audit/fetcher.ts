import type { RequestOptions } from "./types";
import { isSSRFSafe } from "./url-utils";

export const MAX_REDIRECTS = 5;

export type FetchErrorKind = "timeout" | "aborted" | "network";

export interface FetchSuccess {
  body: string;
  statusCode: number;
  finalUrl: string;
  contentType: string;
  headers: Headers;
}

export interface FetchFailure {
  error: string;
  kind: FetchErrorKind;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

export interface FetchTextOptions extends RequestOptions {
  accept?: string;
  method?: "GET" | "HEAD";
}

function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === "AbortError" || e.name === "TimeoutError");
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

/**
 * GET (or HEAD) with redirect following and a per-request timeout. Any HTTP status is a
 * success here; callers decide what a 404 means. Never throws.
 *
 * With `ssrfGuard` set, redirects are followed by hand (at most
 * {@link MAX_REDIRECTS}) and every hop is checked against private and
 * loopback addresses before it is requested.
 */
export async function fetchText(url: string, options: FetchTextOptions): Promise<FetchOutcome> {
  if (options.signal?.aborted) {
    return { error: "Request aborted", kind: "aborted" };
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onOuterAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onOuterAbort, { once: true });

  const method = options.method ?? "GET";
  const init: RequestInit = {
    method,
    signal: controller.signal,
    redirect: options.ssrfGuard ? "manual" : "follow",
    headers: {
      "User-Agent": options.userAgent,
      Accept: options.accept ?? "*/*",
    },
  };

  try {
    let currentUrl = url;
    let redirects = 0;
    let response: Response;

    while (true) {
      if (options.ssrfGuard) {
        const check = await isSSRFSafe(currentUrl);
        if (!check.safe) {
          return { error: `SSRF protection: ${check.reason ?? currentUrl}`, kind: "network" };
        }
      }

      response = await fetch(currentUrl, init);
      const location = response.headers.get("location");
      if (!options.ssrfGuard || !isRedirect(response.status) || !location) break;

      await response.body?.cancel();
      if (redirects >= MAX_REDIRECTS) {
        return { error: "Too many redirects", kind: "network" };
      }
      currentUrl = new URL(location, currentUrl).toString();
      redirects++;
    }

    const body = method === "HEAD" ? "" : await response.text();
    return {
      body,
      statusCode: response.status,
      finalUrl: options.ssrfGuard ? currentUrl : response.url || url,
      contentType: response.headers.get("content-type") || "",
      headers: response.headers,
    };
  } catch (e) {
    if (timedOut) {
      return { error: `Request timeout after ${options.timeoutMs}ms`, kind: "timeout" };
    }
    if (isAbortError(e) || options.signal?.aborted) {
      return { error: "Request aborted", kind: "aborted" };
    }
    const message = e instanceof Error ? e.message : String(e);
    return { error: message || "Unknown fetch error", kind: "network" };
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener("abort", onOuterAbort);
  }
}

/** Body of a 200 response with non-blank content, otherwise null. */
export async function fetchTextFile(url: string, options: RequestOptions): Promise<string | null> {
  const result = await fetchText(url, { ...options, accept: "text/plain,*/*" });
  if ("error" in result) return null;
  if (result.statusCode !== 200 || !result.body.trim()) return null;
  return result.body;
}
