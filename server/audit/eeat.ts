import * as cheerio from "cheerio";
import type { EeatReport } from "./types";
import { strippedText } from "./extractor";

const ABOUT_HREF = /\/about(?:-us)?(?:\/|$)/i;
const CONTACT_HREF = /\/contact(?:-us)?(?:\/|$)/i;
const BYLINE_CLASS = /byline|author/i;

const DATE_META_SELECTORS = [
  'meta[property="article:published_time"]',
  'meta[property="article:modified_time"]',
  'meta[property="datePublished"]',
  'meta[property="dateModified"]',
  'meta[property="og:updated_time"]',
  'meta[name="date"]',
  'meta[name="dcterms.date"]',
  'meta[name="dc.date"]',
  "time[datetime]",
];

function detectAuthor($: cheerio.CheerioAPI): { found: boolean; name: string | null } {
  const meta = ($('meta[name="author"]').first().attr("content") ?? "").trim();
  if (meta) return { found: true, name: meta };

  const relAuthor = $('a[rel~="author"]').first();
  if (relAuthor.length) {
    return { found: true, name: strippedText(relAuthor) || null };
  }

  const itemprop = $('[itemprop="author"]').first();
  if (itemprop.length) {
    const name = itemprop.find('[itemprop="name"]').first();
    return { found: true, name: name.length ? strippedText(name) || null : null };
  }

  const byline = $("[class]")
    .toArray()
    .some((el) => BYLINE_CLASS.test($(el).attr("class") ?? ""));
  return { found: byline, name: null };
}

function hrefs($: cheerio.CheerioAPI): string[] {
  return $("a[href]")
    .toArray()
    .map((el) => $(el).attr("href") ?? "");
}

/** Absolute links whose host differs from the page's own. */
function countExternalCitations(links: string[], baseDomain: string | null): number {
  let count = 0;
  for (const href of links) {
    let host: string;
    try {
      host = new URL(href).host;
    } catch {
      continue;
    }
    if (!host) continue;
    if (baseDomain && host === baseDomain) continue;
    count++;
  }
  return count;
}

function detectTrustSignals($: cheerio.CheerioAPI): string[] {
  const signals: string[] = [];
  $("a[href]").each((_, el) => {
    const link = $(el);
    const combined = `${link.attr("href") ?? ""} ${strippedText(link).toLowerCase()}`;
    if (/privacy/i.test(combined) && !signals.includes("privacy policy")) signals.push("privacy policy");
    if (/terms/i.test(combined) && !signals.includes("terms of service")) signals.push("terms of service");
  });
  return signals;
}

export function emptyEeatReport(summary: string): EeatReport {
  return {
    hasAuthor: false,
    authorName: null,
    hasDate: false,
    hasAboutPage: false,
    hasContactInfo: false,
    hasCitations: false,
    citationCount: 0,
    trustSignals: [],
    summary,
  };
}

/**
 * Experience, expertise, authority and trust signals in a page's HTML:
 * author attribution, dates, about and contact links, external citations
 * and privacy or terms links. Informational only, never scored.
 */
export function checkEeat(html: string, baseDomain: string | null = null): EeatReport {
  if (!html.trim()) return emptyEeatReport("No HTML content for E-E-A-T analysis");

  const $ = cheerio.load(html);
  const links = hrefs($);

  const author = detectAuthor($);
  const hasDate = DATE_META_SELECTORS.some((selector) => $(selector).length > 0);
  const hasAboutPage = links.some((href) => ABOUT_HREF.test(href));
  const hasContactInfo = links.some(
    (href) => href.startsWith("mailto:") || href.startsWith("tel:") || CONTACT_HREF.test(href)
  );
  const citationCount = countExternalCitations(links, baseDomain);
  const trustSignals = detectTrustSignals($);

  const found: string[] = [];
  if (author.found) found.push(author.name ? `author: ${author.name}` : "author found");
  if (hasDate) found.push("publication date");
  if (hasAboutPage) found.push("about page");
  if (hasContactInfo) found.push("contact info");
  if (citationCount > 0) found.push(`${citationCount} external citation(s)`);
  if (trustSignals.length > 0) found.push(`trust: ${trustSignals.join(", ")}`);

  return {
    hasAuthor: author.found,
    authorName: author.name,
    hasDate,
    hasAboutPage,
    hasContactInfo,
    hasCitations: citationCount > 0,
    citationCount,
    trustSignals,
    summary: found.length > 0 ? `E-E-A-T signals: ${found.join(", ")}` : "No E-E-A-T signals detected",
  };
}
