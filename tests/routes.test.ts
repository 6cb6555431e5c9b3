import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from "vitest";
import type { Server } from "http";

vi.mock("../server/audit", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../server/audit")>();
  return { ...actual, runAudit: vi.fn(), runSiteAudit: vi.fn(), runBatchAudit: vi.fn() };
});

import { createApp } from "../server/app";
import { runAudit, runBatchAudit, runSiteAudit } from "../server/audit";
import { robotsNotFound } from "../server/audit/robots";
import { contextFileNotFound } from "../server/audit/context-file";
import { emptyStructuredDataReport } from "../server/audit/structured-data";
import { emptyContentReport } from "../server/audit/content";
import type { AuditReport } from "../server/audit/types";

// Public IP literal: passes the private-address guard without a DNS lookup.
const PUBLIC_TARGET = "http://93.184.216.34/";

const REPORT: AuditReport = {
  url: PUBLIC_TARGET,
  overallScore: 0,
  robots: robotsNotFound("robots.txt returned HTTP 404"),
  contextFile: contextFileNotFound("llms.txt not found"),
  structuredData: emptyStructuredDataReport("No HTML to analyze"),
  content: emptyContentReport("No content extracted"),
  errors: [],
  durationMs: 3,
};

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = createApp().listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("Server has no TCP address");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

beforeEach(() => {
  vi.mocked(runAudit).mockReset();
  vi.mocked(runSiteAudit).mockReset();
  vi.mocked(runBatchAudit).mockReset();
});

async function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("HTTP API", () => {
  it("answers health checks", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("runs a single-page audit", async () => {
    vi.mocked(runAudit).mockResolvedValue(REPORT);

    const res = await post("/api/audit", { url: PUBLIC_TARGET, mode: "single", timeoutMs: 5000 });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(REPORT);
    expect(runAudit).toHaveBeenCalledWith({ url: PUBLIC_TARGET, timeoutMs: 5000, ssrfGuard: true });
    expect(runSiteAudit).not.toHaveBeenCalled();
  });

  it("defaults to a site audit", async () => {
    vi.mocked(runSiteAudit).mockRejectedValue(new Error("boom"));

    const res = await post("/api/audit", { url: PUBLIC_TARGET });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: true, message: "boom" });
    expect(runSiteAudit).toHaveBeenCalledWith({ url: PUBLIC_TARGET, ssrfGuard: true });
  });

  it("rejects invalid bodies with 400", async () => {
    const res = await post("/api/audit", { url: "nope", mode: "deep" });

    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.error).toBe(true);
    expect(body.message).toBe("Invalid request body");
  });

  it("rejects malformed JSON with 400", async () => {
    const res = await fetch(`${baseUrl}/api/audit`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });

    expect(res.status).toBe(400);
  });

  it("refuses private targets with 403", async () => {
    const res = await post("/api/audit", { url: "http://127.0.0.1:8080/admin" });

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ error: true, message: "SSRF protection: Blocked host: 127.0.0.1" });
    expect(runSiteAudit).not.toHaveBeenCalled();
  });

  it("runs batch audits and guards every target", async () => {
    vi.mocked(runBatchAudit).mockResolvedValue({ urls: [PUBLIC_TARGET], reports: [REPORT], errors: {} });

    const ok = await post("/api/audit/batch", { urls: [PUBLIC_TARGET], mode: "single", concurrency: 2 });
    expect(ok.status).toBe(200);
    expect(runBatchAudit).toHaveBeenCalledWith([PUBLIC_TARGET], { single: true, concurrency: 2, ssrfGuard: true });

    const blocked = await post("/api/audit/batch", { urls: [PUBLIC_TARGET, "http://10.0.0.5/"] });
    expect(blocked.status).toBe(403);
    expect(await blocked.json()).toEqual({ error: true, message: "SSRF protection: Private IP blocked: 10.0.0.5" });
  });
});
