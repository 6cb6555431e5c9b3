import { describe, it, expect, vi, afterEach } from "vitest";
import { crawlPage, crawlPages } from "../server/audit/crawler";
import { REQUEST, htmlPage, routeFetch } from "./helpers";

afterEach(() => {
  vi.unstubAllGlobals();
});

const ARTICLE = htmlPage(
  `<main><h1>Docs</h1><p>${"Plenty of useful words about the product. ".repeat(4)}</p><a href="/guide">Guide</a><a href="https://elsewhere.org/">Out</a></main>`
);

describe("crawlPage", () => {
  it("returns html, markdown and internal links", async () => {
    vi.stubGlobal("fetch", routeFetch({ "https://example.com/docs": ARTICLE }));

    const result = await crawlPage("https://example.com/docs", REQUEST);

    expect(result.success).toBe(true);
    expect(result.statusCode).toBe(200);
    expect(result.html).toBe(ARTICLE);
    expect(result.markdown).toContain("Plenty of useful words about the product.");
    expect(result.internalLinks).toEqual(["https://example.com/guide"]);
    expect(result.error).toBeUndefined();
  });

  it("fails on HTTP errors", async () => {
    vi.stubGlobal("fetch", routeFetch({ "https://example.com/gone": { body: "Gone", status: 410 } }));

    const result = await crawlPage("https://example.com/gone", REQUEST);

    expect(result).toMatchObject({ success: false, statusCode: 410, markdown: "", error: "HTTP 410" });
  });

  it("fails on non-HTML content", async () => {
    vi.stubGlobal(
      "fetch",
      routeFetch({ "https://example.com/file.pdf": { body: "%PDF-1.7", contentType: "application/pdf" } })
    );

    const result = await crawlPage("https://example.com/file.pdf", REQUEST);

    expect(result.success).toBe(false);
    expect(result.error).toBe("Non-HTML content type: application/pdf");
  });

  it("reports network errors without throwing", async () => {
    vi.stubGlobal("fetch", routeFetch({ "https://example.com/": new Error("connect ECONNREFUSED") }));

    const result = await crawlPage("https://example.com/", REQUEST);

    expect(result).toMatchObject({ success: false, statusCode: 0, error: "connect ECONNREFUSED" });
  });
});

describe("crawlPages", () => {
  it("returns one result per URL in input order and isolates failures", async () => {
    vi.stubGlobal(
      "fetch",
      routeFetch({
        "https://example.com/a": ARTICLE,
        "https://example.com/b": new Error("socket hang up"),
        "https://example.com/c": ARTICLE,
      })
    );

    const results = await crawlPages(["https://example.com/a", "https://example.com/b", "https://example.com/c"], {
      ...REQUEST,
      crawlDelayMs: 0,
      concurrency: 2,
    });

    expect(results.map((r) => [r.url, r.success])).toEqual([
      ["https://example.com/a", true],
      ["https://example.com/b", false],
      ["https://example.com/c", true],
    ]);
    expect(results[1].error).toBe("socket hang up");
  });

  it("staggers task starts by the crawl delay", async () => {
    const started: number[] = [];
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        started.push(Date.now());
        return new Response("Not found", { status: 404, headers: { "content-type": "text/plain" } });
      })
    );

    const results = await crawlPages(["https://example.com/1", "https://example.com/2", "https://example.com/3"], {
      ...REQUEST,
      crawlDelayMs: 40,
      concurrency: 3,
    });

    expect(started).toHaveLength(3);
    expect(started[1] - started[0]).toBeGreaterThanOrEqual(30);
    expect(started[2] - started[0]).toBeGreaterThanOrEqual(70);
    expect(results.map((r) => r.error)).toEqual(["HTTP 404", "HTTP 404", "HTTP 404"]);
  });

  it("never runs more fetches at once than the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return new Response(ARTICLE, { status: 200, headers: { "content-type": "text/html" } });
      })
    );

    const urls = Array.from({ length: 6 }, (_, i) => `https://example.com/p${i}`);
    const results = await crawlPages(urls, { ...REQUEST, crawlDelayMs: 0, concurrency: 2 });

    expect(results.every((r) => r.success)).toBe(true);
    expect(peak).toBe(2);
  });

  it("turns an aborted stagger into a failed result", async () => {
    const controller = new AbortController();
    controller.abort();
    vi.stubGlobal("fetch", routeFetch({}));

    const results = await crawlPages(["https://example.com/1", "https://example.com/2"], {
      ...REQUEST,
      crawlDelayMs: 1000,
      concurrency: 1,
      signal: controller.signal,
    });

    expect(results.map((r) => r.success)).toEqual([false, false]);
    expect(results[0].error).toBe("Request aborted");
  });
});
