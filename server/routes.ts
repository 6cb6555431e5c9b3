import type { Express, Request, Response } from "express";
import { z } from "zod";
import { runAudit, runBatchAudit, runSiteAudit } from "./audit";
import { isSSRFSafe } from "./audit/url-utils";
import { logger, errorMessage } from "./logger";

const AuditOptionsSchema = z.object({
  mode: z.enum(["site", "single"]).default("site"),
  maxPages: z.coerce.number().int().positive().max(50).optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  crawlDelayMs: z.coerce.number().int().nonnegative().optional(),
  deadlineMs: z.coerce.number().int().positive().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  userAgent: z.string().optional(),
  agents: z.array(z.string().min(1)).min(1).optional(),
});

const AuditRequestSchema = AuditOptionsSchema.extend({
  url: z.string().url(),
});

const BatchAuditRequestSchema = AuditOptionsSchema.extend({
  urls: z.array(z.string().url()).min(1).max(50),
});

function invalidBody(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: true,
    message: "Invalid request body",
    details: error.errors,
  });
}

/** First unsafe target, or null when every URL may be fetched. */
async function findUnsafeTarget(urls: string[]): Promise<string | null> {
  for (const url of urls) {
    const check = await isSSRFSafe(url);
    if (!check.safe) return check.reason ?? `Blocked: ${url}`;
  }
  return null;
}

export function registerRoutes(app: Express): void {
  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.post("/api/audit", async (req: Request, res: Response) => {
    const parsed = AuditRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      invalidBody(res, parsed.error);
      return;
    }

    try {
      const unsafe = await findUnsafeTarget([parsed.data.url]);
      if (unsafe) {
        res.status(403).json({ error: true, message: `SSRF protection: ${unsafe}` });
        return;
      }

      const { mode, ...options } = parsed.data;
      const config = { ...options, ssrfGuard: true };
      const report = mode === "single" ? await runAudit(config) : await runSiteAudit(config);
      res.json(report);
    } catch (error) {
      logger.error("routes", `Audit failed for ${parsed.data.url}`, error);
      res.status(500).json({
        error: true,
        message: errorMessage(error) || "An error occurred during the audit",
      });
    }
  });

  app.post("/api/audit/batch", async (req: Request, res: Response) => {
    const parsed = BatchAuditRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      invalidBody(res, parsed.error);
      return;
    }

    try {
      const unsafe = await findUnsafeTarget(parsed.data.urls);
      if (unsafe) {
        res.status(403).json({ error: true, message: `SSRF protection: ${unsafe}` });
        return;
      }

      const { mode, urls, ...config } = parsed.data;
      const report = await runBatchAudit(urls, { ...config, single: mode === "single", ssrfGuard: true });
      res.json(report);
    } catch (error) {
      logger.error("routes", "Batch audit failed", error);
      res.status(500).json({
        error: true,
        message: errorMessage(error) || "An error occurred during the batch audit",
      });
    }
  });
}
