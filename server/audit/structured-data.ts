import * as cheerio from "cheerio";
import type { SchemaEntry, StructuredDataReport } from "./types";
import { STRUCTURED_DATA_MAX, scoreStructuredData } from "./scoring";
import { logger } from "../logger";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function schemaType(value: unknown): string {
  if (Array.isArray(value)) return value.map(String).join(", ");
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "Unknown";
  return String(value);
}

function toEntry(item: Record<string, unknown>): SchemaEntry {
  return {
    type: schemaType(item["@type"]),
    properties: Object.keys(item).filter((key) => !key.startsWith("@")),
  };
}

/** Every JSON-LD object on the page; top-level arrays give one entry per object. */
export function extractJsonLd(html: string): SchemaEntry[] {
  const $ = cheerio.load(html);
  const entries: SchemaEntry[] = [];

  $('script[type="application/ld+json"]').each((index, el) => {
    const raw = $(el).text().trim();
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      logger.debug("structured-data", `Skipping malformed JSON-LD block #${index + 1}`);
      return;
    }

    const items = Array.isArray(data) ? data : [data];
    for (const item of items) {
      if (isRecord(item)) entries.push(toEntry(item));
    }
  });

  return entries;
}

export function emptyStructuredDataReport(summary: string): StructuredDataReport {
  return {
    pillar: "structuredData",
    blocksFound: 0,
    schemas: [],
    score: 0,
    max: STRUCTURED_DATA_MAX,
    summary,
  };
}

export function checkStructuredData(html: string): StructuredDataReport {
  if (!html) return emptyStructuredDataReport("No HTML to analyze");

  const schemas = extractJsonLd(html);
  const blocksFound = schemas.length;

  return {
    pillar: "structuredData",
    blocksFound,
    schemas,
    score: scoreStructuredData(schemas.map((s) => s.type)),
    max: STRUCTURED_DATA_MAX,
    summary: blocksFound ? `${blocksFound} JSON-LD block(s) found` : "No JSON-LD found",
  };
}
