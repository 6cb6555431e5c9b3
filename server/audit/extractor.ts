import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { JSDOM, VirtualConsole } from "jsdom";
import { Readability } from "@mozilla/readability";
import TurndownService from "turndown";
import { tables } from "turndown-plugin-gfm";
import { logger } from "../logger";

export const READABILITY_MIN_CHARS = 100;
export const LANDMARK_MIN_CHARS = 50;

export const BOILERPLATE_SELECTORS = [
  "script",
  "style",
  "noscript",
  "iframe",
  "svg",
  "nav",
  "header",
  "footer",
  "aside",
  ".sidebar",
  ".navigation",
  ".menu",
  ".breadcrumb",
  ".cookie-banner",
  ".cookie-consent",
  "#cookie-banner",
  ".ad",
  ".ads",
  ".advertisement",
  "[role='navigation']",
  "[role='banner']",
  "[role='contentinfo']",
];

export function plainText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * A selection's text with every text node trimmed and the pieces joined
 * without separators. Script and style text does not count.
 */
export function strippedText<T extends AnyNode>(selection: cheerio.Cheerio<T>): string {
  return selection
    .find("*")
    .addBack()
    .not("script, style")
    .contents()
    .toArray()
    .map((node) => (node.nodeType === 3 && "data" in node ? node.data.trim() : ""))
    .join("");
}

function readabilityContent(html: string): string | null {
  try {
    const dom = new JSDOM(html, { virtualConsole: new VirtualConsole() });
    try {
      const article = new Readability(dom.window.document).parse();
      const content = article?.content ?? "";
      const text = plainText(article?.textContent ?? "");
      return content && text.length > READABILITY_MIN_CHARS ? content : null;
    } finally {
      dom.window.close();
    }
  } catch (e) {
    logger.debug("extractor", "Readability failed, falling back to landmarks", e);
    return null;
  }
}

/**
 * Main-content HTML of a page. The first candidate whose text is strictly
 * longer than its threshold wins: Readability (>100), `<main>` (>50),
 * the longest `<article>` (>50), `[role="main"]` (>50), then `<body>`, then
 * the input itself.
 */
export function extractMainContent(html: string): string {
  if (!html || !html.trim()) return "";

  const readable = readabilityContent(html);
  if (readable !== null) return readable;

  const $ = cheerio.load(html);

  const main = $("main").first();
  if (main.length && strippedText(main).length > LANDMARK_MIN_CHARS) {
    return $.html(main);
  }

  const articles = $("article");
  let longestIndex = -1;
  let longestLength = -1;
  articles.each((i, el) => {
    const length = strippedText($(el)).length;
    if (length > longestLength) {
      longestIndex = i;
      longestLength = length;
    }
  });
  if (longestIndex !== -1 && longestLength > LANDMARK_MIN_CHARS) {
    return $.html(articles.eq(longestIndex));
  }

  const roleMain = $('[role="main"]').first();
  if (roleMain.length && strippedText(roleMain).length > LANDMARK_MIN_CHARS) {
    return $.html(roleMain);
  }

  if (/<body[\s>]/i.test(html)) {
    return $.html($("body"));
  }

  return html;
}

export function sanitizeHtml(html: string, extraSelectors: string[] = []): string {
  const $ = cheerio.load(html);
  for (const selector of [...BOILERPLATE_SELECTORS, ...extraSelectors]) {
    try {
      $(selector).remove();
    } catch {
      logger.debug("extractor", `Ignoring invalid strip selector: ${selector}`);
    }
  }
  return $("body").html() ?? "";
}

const turndown = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
});
turndown.use(tables);

turndown.addRule("pre-code", {
  filter: (node) => node.nodeName === "PRE" && node.querySelector("code") !== null,
  replacement: (content, node) => {
    const code = node.querySelector("code");
    if (!code) return content;
    const lang = code.className.match(/(?:language-|lang-)(\w+)/)?.[1] ?? "";
    return `\n\n\`\`\`${lang}\n${(code.textContent ?? "").replace(/\n$/, "")}\n\`\`\`\n\n`;
  },
});

/**
 * Trailing whitespace is stripped per line, at most one blank line separates
 * blocks, and non-empty output ends with exactly one newline.
 */
export function normalizeMarkdown(markdown: string): string {
  const collapsed = markdown
    .split("\n")
    .map((line) => line.replace(/\s+$/, ""))
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
  return collapsed ? `${collapsed}\n` : "";
}

export function htmlToMarkdown(html: string): string {
  if (!html.trim()) return "";
  return normalizeMarkdown(turndown.turndown(html));
}

export interface ConvertOptions {
  stripSelectors?: string[];
}

export function convertHtmlToMarkdown(html: string, options: ConvertOptions = {}): string {
  if (!html || !html.trim()) return "";
  const main = extractMainContent(html);
  const clean = sanitizeHtml(main, options.stripSelectors);
  return htmlToMarkdown(clean);
}

/** Same-host http(s) links in document order, fragments removed, de-duplicated. */
export function extractInternalLinks(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const base = new URL(baseUrl);
  const seen = new Set<string>();
  const links: string[] = [];

  $("a[href]").each((_, el) => {
    const href = $(el).attr("href");
    if (!href) return;
    let resolved: URL;
    try {
      resolved = new URL(href, base);
    } catch {
      return;
    }
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") return;
    if (resolved.host !== base.host) return;
    resolved.hash = "";
    const absolute = resolved.toString();
    if (!seen.has(absolute)) {
      seen.add(absolute);
      links.push(absolute);
    }
  });

  return links;
}
