import { vi } from "vitest";

export interface MockRoute {
  body: string;
  status?: number;
  contentType?: string;
  headers?: Record<string, string>;
}

/** A URL's canned response, or an error the fetch should reject with. */
export type RouteValue = string | MockRoute | Error;

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

/**
 * A `fetch` stand-in answering from a URL table. Strings are 200 text/html
 * bodies; anything not listed is a 404.
 */
export function routeFetch(routes: Record<string, RouteValue>) {
  return vi.fn(async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const route = routes[requestUrl(input)];
    if (route === undefined) {
      return new Response("Not found", { status: 404, headers: { "content-type": "text/plain" } });
    }
    if (route instanceof Error) throw route;
    const { body, status = 200, contentType = "text/html; charset=utf-8", headers = {} } =
      typeof route === "string" ? { body: route } : route;
    return new Response(body, { status, headers: { ...headers, "content-type": contentType } });
  });
}

/** A `fetch` that never answers and rejects only when its signal aborts. */
export function hangingFetch() {
  return vi.fn(
    (_input: string | URL | Request, init?: RequestInit): Promise<Response> =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new DOMException("The operation was aborted.", "AbortError")));
      })
  );
}

export function fetchedUrls(mock: { mock: { calls: Array<[string | URL | Request, RequestInit?]> } }): string[] {
  return mock.mock.calls.map(([input]) => requestUrl(input));
}

export const REQUEST = { timeoutMs: 1000, userAgent: "test-agent/1.0" };

export function words(count: number, word = "word"): string {
  return Array.from({ length: count }, () => word).join(" ");
}

export function htmlPage(body: string, head = ""): string {
  return `<!DOCTYPE html><html><head><title>Test page</title>${head}</head><body>${body}</body></html>`;
}

export function jsonLd(data: unknown): string {
  return `<script type="application/ld+json">${JSON.stringify(data)}</script>`;
}
