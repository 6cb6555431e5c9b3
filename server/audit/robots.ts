import type { AgentAccess, RequestOptions, RobotsReport } from "./types";
import { fetchText } from "./fetcher";
import { getRobotsUrl } from "./url-utils";
import { ROBOTS_MAX, scoreRobots } from "./scoring";
import { logger } from "../logger";

export const AI_AGENTS: readonly string[] = [
  "GPTBot",
  "ChatGPT-User",
  "Google-Extended",
  "ClaudeBot",
  "PerplexityBot",
  "Amazonbot",
  "OAI-SearchBot",
  "DeepSeek-AI",
  "Grok",
  "Meta-ExternalAgent",
  "cohere-ai",
  "AI2Bot",
  "ByteSpider",
];

interface RobotsRule {
  allow: boolean;
  pattern: string;
  regex: RegExp;
}

interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
  crawlDelay: number | null;
}

export interface RobotsRules {
  groups: RobotsGroup[];
  sitemaps: string[];
}

const LINE_SPLIT_REGEX = /\r\n|\r|\n/;

function productToken(agent: string): string {
  return agent.split("/")[0].trim().toLowerCase();
}

function patternToRegex(pattern: string): RegExp {
  const anchored = pattern.endsWith("$");
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${source}${anchored ? "$" : ""}`);
}

export function parseRobotsTxt(text: string): RobotsRules {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];
  let current: RobotsGroup | null = null;
  let collectingAgents = false;

  for (const rawLine of text.split(LINE_SPLIT_REGEX)) {
    const line = rawLine.split("#", 1)[0].trim();
    if (!line) continue;

    const colon = line.indexOf(":");
    if (colon === -1) continue;
    const directive = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();

    switch (directive) {
      case "user-agent": {
        if (!current || !collectingAgents) {
          current = { agents: [], rules: [], crawlDelay: null };
          groups.push(current);
        }
        current.agents.push(productToken(value));
        collectingAgents = true;
        break;
      }
      case "allow":
      case "disallow": {
        collectingAgents = false;
        if (!current || !value) break;
        const pattern = value.startsWith("/") || value.startsWith("*") ? value : `/${value}`;
        current.rules.push({ allow: directive === "allow", pattern, regex: patternToRegex(pattern) });
        break;
      }
      case "crawl-delay": {
        collectingAgents = false;
        const seconds = Number.parseFloat(value);
        if (current && Number.isFinite(seconds)) {
          current.crawlDelay = seconds;
        }
        break;
      }
      case "sitemap": {
        if (value) sitemaps.push(value);
        break;
      }
      default:
        break;
    }
  }

  return { groups, sitemaps };
}

function groupsFor(rules: RobotsRules, agent: string): RobotsGroup[] {
  const token = productToken(agent);
  const specific = rules.groups.filter((g) => g.agents.includes(token));
  if (specific.length > 0) return specific;
  return rules.groups.filter((g) => g.agents.includes("*"));
}

function toPath(target: string): string {
  if (target.startsWith("/")) return target;
  try {
    const url = new URL(target);
    return `${url.pathname}${url.search}`;
  } catch {
    return "/";
  }
}

/**
 * Longest matching rule wins; `Allow` wins a tie. No applicable group or no
 * matching rule means the path is allowed.
 */
export function isAllowed(rules: RobotsRules, agent: string, target: string): boolean {
  const path = toPath(target);
  if (path === "/robots.txt") return true;

  let best: RobotsRule | null = null;
  for (const group of groupsFor(rules, agent)) {
    for (const rule of group.rules) {
      if (!rule.regex.test(path)) continue;
      if (
        !best ||
        rule.pattern.length > best.pattern.length ||
        (rule.pattern.length === best.pattern.length && rule.allow && !best.allow)
      ) {
        best = rule;
      }
    }
  }

  return best ? best.allow : true;
}

export function getCrawlDelay(rules: RobotsRules, agent: string): number | null {
  for (const group of groupsFor(rules, agent)) {
    if (group.crawlDelay !== null) return group.crawlDelay;
  }
  return null;
}

export function evaluateAgents(rules: RobotsRules, agents: readonly string[], path = "/"): AgentAccess[] {
  return agents.map((agent) => {
    const allowed = isAllowed(rules, agent, path);
    return { agent, allowed, reason: allowed ? "Allowed" : "Blocked by robots.txt" };
  });
}

export function robotsNotFound(summary: string): RobotsReport {
  return { pillar: "robots", found: false, agents: [], score: 0, max: ROBOTS_MAX, summary };
}

export interface RobotsCheck {
  report: RobotsReport;
  /** Raw robots.txt text, handed to discovery for URL filtering. */
  rawText: string | null;
}

export async function checkRobots(
  url: string,
  options: RequestOptions & { agents?: readonly string[] }
): Promise<RobotsCheck> {
  const robotsUrl = getRobotsUrl(url);
  const result = await fetchText(robotsUrl, { ...options, accept: "text/plain,*/*" });

  if ("error" in result) {
    logger.debug("robots", `Failed to fetch ${robotsUrl}: ${result.error}`);
    return { report: robotsNotFound(`Failed to fetch robots.txt: ${result.error}`), rawText: null };
  }
  if (result.statusCode !== 200) {
    return { report: robotsNotFound(`robots.txt returned HTTP ${result.statusCode}`), rawText: null };
  }

  const agents = options.agents && options.agents.length > 0 ? options.agents : AI_AGENTS;
  const access = evaluateAgents(parseRobotsTxt(result.body), agents);
  const allowedCount = access.filter((a) => a.allowed).length;

  return {
    report: {
      pillar: "robots",
      found: true,
      agents: access,
      score: scoreRobots(true, access),
      max: ROBOTS_MAX,
      summary: `${allowedCount}/${agents.length} AI bots allowed`,
    },
    rawText: result.body,
  };
}
