import pLimit from "p-limit";
import type { CrawlConfig, CrawlResult, PageAttributes } from "./types";
import { checkUrlSafety, normalizeUrl, isSameHost, getDiscoveryUrls } from "./url-utils";
import { extractPageData, type ExtractedPage } from "./extractor";

const MAX_REDIRECTS = 5;
const MAX_SITEMAP_DEPTH = 2;

type Fetched<T> = { ok: true; value: T } | { ok: false; error: string };

interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
  accept: string;
}

function describeError(e: unknown): string {
  if (e instanceof Error) {
    return e.name === "AbortError" ? "Request timeout" : e.message || "Unknown fetch error";
  }
  return String(e);
}

/**
 * GET that follows redirects by hand so every hop passes the URL safety
 * check. The timeout stays armed until `read` has consumed the body.
 */
async function guardedFetch<T>(
  url: string,
  options: FetchOptions,
  read: (response: Response) => Promise<Fetched<T>>
): Promise<Fetched<T>> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    let currentUrl = url;

    for (let hop = 0; hop < MAX_REDIRECTS; hop++) {
      const safety = await checkUrlSafety(currentUrl);
      if (!safety.safe) {
        return { ok: false, error: `SSRF protection: ${safety.reason}` };
      }

      const response = await fetch(currentUrl, {
        signal: controller.signal,
        headers: { "User-Agent": options.userAgent, Accept: options.accept },
        redirect: "manual",
      });

      if (response.status >= 300 && response.status < 400) {
        const location = response.headers.get("location");
        if (!location) {
          return { ok: false, error: "Redirect without location header" };
        }
        currentUrl = new URL(location, currentUrl).toString();
        continue;
      }

      return await read(response);
    }

    return { ok: false, error: "Too many redirects" };
  } catch (e) {
    return { ok: false, error: describeError(e) };
  } finally {
    clearTimeout(timeoutId);
  }
}

function fetchPage(url: string, config: CrawlConfig): Promise<Fetched<string>> {
  const options = { timeoutMs: config.timeoutMs, userAgent: config.userAgent, accept: "text/html,application/xhtml+xml" };

  return guardedFetch<string>(url, options, async (response) => {
    if (response.status !== 200) {
      return { ok: false, error: `Status ${response.status}` };
    }

    const contentType = response.headers.get("content-type") || "";
    if (!contentType.includes("text/html") && !contentType.includes("application/xhtml")) {
      return { ok: false, error: `Non-HTML content type: ${contentType}` };
    }

    return { ok: true, value: await response.text() };
  });
}

/** Body of a sitemap or robots.txt; null when it is missing or unreachable. */
async function fetchText(url: string, config: CrawlConfig): Promise<string | null> {
  const options = { timeoutMs: config.timeoutMs, userAgent: config.userAgent, accept: "application/xml,text/xml,text/plain,*/*" };

  const outcome = await guardedFetch<string | null>(url, options, async (response) => ({
    ok: true,
    value: response.status === 200 ? await response.text() : null,
  }));

  if (!outcome.ok) {
    console.warn(`[crawler] Could not fetch ${url}: ${outcome.error}`);
    return null;
  }
  return outcome.value;
}

export function parseSitemapLocs(xml: string): string[] {
  return Array.from(xml.matchAll(/<loc>\s*([^<]+?)\s*<\/loc>/gi), (match) => match[1]);
}

export function parseRobotsSitemaps(robotsTxt: string): string[] {
  const sitemaps: string[] = [];
  for (const line of robotsTxt.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.toLowerCase().startsWith("sitemap:")) {
      const url = trimmed.slice(trimmed.indexOf(":") + 1).trim();
      if (url) sitemaps.push(url);
    }
  }
  return sitemaps;
}

async function expandSitemap(xml: string, config: CrawlConfig, depth: number): Promise<string[]> {
  const urls: string[] = [];

  for (const loc of parseSitemapLocs(xml)) {
    if (loc.endsWith(".xml")) {
      if (depth >= MAX_SITEMAP_DEPTH) continue;
      const nested = await fetchText(loc, config);
      if (nested) urls.push(...(await expandSitemap(nested, config, depth + 1)));
    } else {
      urls.push(loc);
    }
  }

  return urls;
}

/**
 * Page URLs listed by the site's sitemap, found directly or through the
 * Sitemap lines of robots.txt. Returns at most `maxPages` same-host URLs.
 */
export async function discoverSitemapUrls(rootUrl: string, config: CrawlConfig): Promise<string[]> {
  const discovery = getDiscoveryUrls(rootUrl);
  if (!discovery) return [];

  const candidates = [
    ...discovery.sitemaps.map((url) => ({ url, robots: false })),
    { url: discovery.robots, robots: true },
  ];

  const seen = new Set<string>();
  const urls: string[] = [];

  for (const candidate of candidates) {
    const text = await fetchText(candidate.url, config);
    if (text === null) continue;

    let listed: string[] = [];
    if (candidate.robots) {
      for (const sitemapUrl of parseRobotsSitemaps(text)) {
        const xml = await fetchText(sitemapUrl, config);
        if (xml) listed.push(...(await expandSitemap(xml, config, 1)));
      }
    } else {
      listed = await expandSitemap(text, config, 0);
    }

    for (const url of listed) {
      const normalized = normalizeUrl(url);
      if (normalized && isSameHost(normalized, rootUrl) && !seen.has(normalized)) {
        seen.add(normalized);
        urls.push(normalized);
      }
    }

    if (urls.length > 0) break;
  }

  return urls.slice(0, config.maxPages);
}

export async function crawlSite(config: CrawlConfig): Promise<CrawlResult> {
  const rootSafety = await checkUrlSafety(config.url);
  if (!rootSafety.safe) {
    throw new Error(`SSRF protection: ${rootSafety.reason}`);
  }

  const rootUrl = normalizeUrl(config.url);
  if (!rootUrl) {
    throw new Error("Invalid root URL");
  }

  const limit = pLimit(config.concurrency);
  let errorCount = 0;
  let skippedCount = 0;

  const processUrl = async (url: string): Promise<ExtractedPage | null> => {
    const safety = await checkUrlSafety(url);
    if (!safety.safe) {
      skippedCount++;
      return null;
    }

    const result = await fetchPage(url, config);
    if (!result.ok) {
      errorCount++;
      console.warn(`[crawler] Failed to fetch ${url}: ${result.error}`);
      return null;
    }

    return extractPageData(result.value, url);
  };

  const sitemapUrls = await discoverSitemapUrls(rootUrl, config);
  if (sitemapUrls.length > 0) {
    const results = await Promise.all(sitemapUrls.map((url) => limit(() => processUrl(url))));
    const pages: PageAttributes[] = [];
    for (const result of results) {
      if (result) pages.push(result.attributes);
    }
    return { pages, source: "sitemap", errorCount, skippedCount };
  }

  console.warn(`[crawler] No sitemap found for ${rootUrl}, crawling links instead.`);

  const pages: PageAttributes[] = [];
  const visited = new Set<string>([rootUrl]);
  const toVisit: string[] = [rootUrl];

  while (toVisit.length > 0 && pages.length < config.maxPages) {
    const remaining = config.maxPages - pages.length;
    const batch = toVisit.splice(0, Math.min(config.concurrency, remaining));

    // Promise.all keeps batch order, so discovery order is deterministic.
    const results = await Promise.all(batch.map((url) => limit(() => processUrl(url))));

    for (const result of results) {
      if (!result || pages.length >= config.maxPages) continue;
      pages.push(result.attributes);

      let queued = 0;
      for (const link of result.internalLinks) {
        if (queued >= config.linksPerPage) break;
        if (visited.has(link)) continue;
        visited.add(link);
        toVisit.push(link);
        queued++;
      }
    }
  }

  return { pages, source: "crawl", errorCount, skippedCount };
}
