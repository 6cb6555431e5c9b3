import { readFileSync } from "fs";
import { Command, InvalidArgumentError } from "commander";
import { ZodError } from "zod";
import { AuditConfigSchema, parseUrlList, runAudit, runBatchAudit, runSiteAudit } from "./audit";
import type { AuditConfigInput } from "./audit";
import { errorMessage } from "./logger";

export interface ProgramIO {
  out: (text: string) => void;
  err: (text: string) => void;
  readFile: (path: string) => string;
}

const defaultIO: ProgramIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  readFile: (path) => readFileSync(path, "utf8"),
};

interface CliOptions {
  single?: boolean;
  batch?: boolean;
  maxPages?: number;
  timeout?: number;
  delay?: number;
  deadline?: number;
  concurrency?: number;
  bots?: string[];
  userAgent?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/** Seconds on the command line, milliseconds in the config. */
function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of seconds.");
  }
  return Math.round(parsed * 1000);
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
  }
  return errorMessage(error) || "Unknown error occurred";
}

/** Run settings shared by single, site and batch audits. */
function sharedConfig(options: CliOptions): Omit<AuditConfigInput, "url" | "concurrency"> {
  return {
    maxPages: options.maxPages,
    timeoutMs: options.timeout,
    crawlDelayMs: options.delay,
    deadlineMs: options.deadline,
    userAgent: options.userAgent,
    agents: options.bots,
  };
}

export function createProgram(io: ProgramIO = defaultIO): Command {
  const program = new Command();

  program
    .name("ai-readiness-audit")
    .description("Audit a website for AI agent and LLM readiness")
    .version("1.0.0")
    .argument("<url>", "URL to audit, or with --batch a .txt/.csv file of URLs")
    .option("--single", "Audit only the given page instead of sampling the site")
    .option("--batch", "Treat the argument as a file with one URL per line (.txt) or per row (.csv)")
    .option("--max-pages <n>", "Maximum pages to sample in a site audit", parsePositiveInt)
    .option("--timeout <seconds>", "Per-request timeout", parseSeconds)
    .option("--delay <seconds>", "Stagger between page requests", parseSeconds)
    .option("--deadline <seconds>", "Overall deadline for a site audit", parseSeconds)
    .option("--concurrency <n>", "Concurrent page fetches, or concurrent audits with --batch", parsePositiveInt)
    .option("--bots <list>", "Comma-separated AI agent names to check in robots.txt", parseList)
    .option("--user-agent <ua>", "User-Agent header for requests")
    .action(async (target: string, options: CliOptions) => {
      try {
        if (options.batch) {
          const format = target.toLowerCase().endsWith(".csv") ? "csv" : "txt";
          const urls = parseUrlList(io.readFile(target), format);
          const report = await runBatchAudit(urls, {
            ...sharedConfig(options),
            single: options.single,
            concurrency: options.concurrency,
          });
          io.out(JSON.stringify(report, null, 2));
          return;
        }

        const config = AuditConfigSchema.parse({
          ...sharedConfig(options),
          url: target,
          concurrency: options.concurrency,
        });
        const report = options.single ? await runAudit(config) : await runSiteAudit(config);
        io.out(JSON.stringify(report, null, 2));
      } catch (error) {
        io.err(JSON.stringify({ error: true, message: describeError(error) }, null, 2));
        process.exitCode = 1;
      }
    });

  return program;
}
