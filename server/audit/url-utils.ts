import * as dns from "dns";
import * as net from "net";

const PRIVATE_IP_RANGES = [
  /^127\./,
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[01])\./,
  /^192\.168\./,
  /^169\.254\./,
  /^0\./,
  /^::1$/,
  /^fe80:/i,
  /^fc00:/i,
  /^fd00:/i,
];

const BLOCKED_HOSTS = ["localhost", "127.0.0.1", "0.0.0.0", "::1", "[::1]"];

export function isPrivateIP(ip: string): boolean {
  return PRIVATE_IP_RANGES.some((regex) => regex.test(ip));
}

export function isBlockedHost(hostname: string): boolean {
  const lower = hostname.toLowerCase();
  return BLOCKED_HOSTS.includes(lower) || lower.endsWith(".local");
}

export async function resolveHostToIP(hostname: string): Promise<string[]> {
  return new Promise((resolve) => {
    dns.lookup(hostname, { all: true }, (err, addresses) => {
      if (err) {
        resolve([]);
      } else {
        resolve(addresses.map((a) => a.address));
      }
    });
  });
}

/** Rejects targets that would make the audit fetch from a private network. */
export async function isSSRFSafe(urlString: string): Promise<{ safe: boolean; reason?: string }> {
  let parsed: URL;
  try {
    parsed = new URL(urlString);
  } catch {
    return { safe: false, reason: `Invalid URL: ${urlString}` };
  }

  if (!["http:", "https:"].includes(parsed.protocol)) {
    return { safe: false, reason: `Blocked protocol: ${parsed.protocol}` };
  }

  const hostname = parsed.hostname.replace(/^\[|\]$/g, "");
  if (isBlockedHost(parsed.hostname)) {
    return { safe: false, reason: `Blocked host: ${parsed.hostname}` };
  }

  if (net.isIP(hostname)) {
    if (isPrivateIP(hostname)) {
      return { safe: false, reason: `Private IP blocked: ${hostname}` };
    }
    return { safe: true };
  }

  const ips = await resolveHostToIP(hostname);
  for (const ip of ips) {
    if (isPrivateIP(ip)) {
      return { safe: false, reason: `Hostname resolves to private IP: ${ip}` };
    }
  }

  return { safe: true };
}

/**
 * Identity of a page for de-duplication: scheme, host and path only.
 * `https://Example.com/docs/?a=1#x` and `https://example.com/docs` share a key.
 */
export function urlKey(urlString: string): string {
  try {
    const url = new URL(urlString);
    const path = url.pathname.replace(/\/+$/, "") || "/";
    return `${url.protocol}//${url.host}${path}`;
  } catch {
    return urlString;
  }
}

export function getOrigin(urlString: string): string {
  const parsed = new URL(urlString);
  return `${parsed.protocol}//${parsed.host}`;
}

export function getDomain(urlString: string): string {
  try {
    return new URL(urlString).host;
  } catch {
    return urlString;
  }
}

/** Number of non-empty path segments: `/` is 0, `/docs/intro` is 2. */
export function getPathDepth(urlString: string): number {
  try {
    return new URL(urlString).pathname.split("/").filter(Boolean).length;
  } catch {
    return 0;
  }
}

/** First path segment, used to group URLs by site section. */
export function getSection(urlString: string): string {
  try {
    return new URL(urlString).pathname.split("/").filter(Boolean)[0] ?? "";
  } catch {
    return "";
  }
}

export function getSitemapUrls(rootUrl: string): string[] {
  const base = getOrigin(rootUrl);
  return [`${base}/sitemap.xml`, `${base}/sitemap_index.xml`];
}

export function getRobotsUrl(rootUrl: string): string {
  return `${getOrigin(rootUrl)}/robots.txt`;
}
