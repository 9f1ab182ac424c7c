import * as cheerio from "cheerio";
import { setTimeout as sleep } from "node:timers/promises";
import type { RankMethod, RankResult, RankSummary } from "@shared/audit-types";
import { roundToTenth } from "./scorer";
import { getHost } from "./url-utils";

const SERPAPI_URL = "https://serpapi.com/search";
const SEARCH_URL = "https://www.google.com/search";

export interface RankCheckerConfig {
  serpApiKey?: string;
  userAgent: string;
  timeoutMs: number;
  delayMs: number;
}

export interface RankLookupOptions {
  country?: string;
  language?: string;
}

interface OrganicResult {
  link?: string;
  title?: string;
  snippet?: string;
}

function stringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
}

function toOrganicResults(data: unknown): OrganicResult[] {
  if (typeof data !== "object" || data === null || !("organic_results" in data)) return [];
  const results = data.organic_results;
  if (!Array.isArray(results)) return [];

  return results.flatMap((item: unknown) =>
    typeof item === "object" && item !== null
      ? [{ link: stringField(item, "link"), title: stringField(item, "title"), snippet: stringField(item, "snippet") }]
      : []
  );
}

function hostMatches(link: string, domain: string): boolean {
  return getHost(link).toLowerCase().includes(domain.toLowerCase());
}

export class RankChecker {
  constructor(private readonly config: RankCheckerConfig) {}

  get method(): RankMethod {
    return this.config.serpApiKey ? "serpapi" : "scraping";
  }

  async checkKeyword(domain: string, keyword: string, options: RankLookupOptions = {}): Promise<RankResult> {
    const method = this.method;
    try {
      return method === "serpapi"
        ? await this.checkWithSerpApi(domain, keyword, options)
        : await this.checkWithScraping(domain, keyword);
    } catch (error) {
      return {
        keyword,
        domain,
        rank: null,
        error: error instanceof Error ? error.message : String(error),
        method,
      };
    }
  }

  async checkKeywords(domain: string, keywords: string[], options: RankLookupOptions = {}): Promise<RankResult[]> {
    const results: RankResult[] = [];
    for (const [index, keyword] of keywords.entries()) {
      if (index > 0 && this.config.delayMs > 0) await sleep(this.config.delayMs);
      results.push(await this.checkKeyword(domain, keyword, options));
    }
    return results;
  }

  /** The timeout covers `read` as well, so a stalled body is aborted too. */
  private async request<T>(
    url: string,
    headers: Record<string, string>,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const response = await fetch(url, { signal: controller.signal, headers });
      return await read(response);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async checkWithSerpApi(domain: string, keyword: string, options: RankLookupOptions): Promise<RankResult> {
    const params = new URLSearchParams({
      engine: "google",
      q: keyword,
      gl: options.country ?? "us",
      hl: options.language ?? "en",
      num: "100",
      api_key: this.config.serpApiKey ?? "",
    });

    const { status, payload } = await this.request(
      `${SERPAPI_URL}?${params.toString()}`,
      { "User-Agent": this.config.userAgent },
      async (response): Promise<{ status: number; payload: unknown }> => ({
        status: response.status,
        payload: response.status === 200 ? await response.json() : null,
      })
    );
    if (status !== 200) {
      return { keyword, domain, rank: null, error: `API Error: ${status}`, method: "serpapi" };
    }

    const organic = toOrganicResults(payload);

    for (const [index, result] of organic.entries()) {
      if (result.link && hostMatches(result.link, domain)) {
        return {
          keyword,
          domain,
          rank: index + 1,
          url: result.link,
          title: result.title,
          snippet: result.snippet,
          method: "serpapi",
        };
      }
    }

    return { keyword, domain, rank: null, message: "Not found in top 100 results", method: "serpapi" };
  }

  private async checkWithScraping(domain: string, keyword: string): Promise<RankResult> {
    const params = new URLSearchParams({ q: keyword, num: "50" });
    const { status, html } = await this.request(
      `${SEARCH_URL}?${params.toString()}`,
      {
        "User-Agent": this.config.userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.5",
      },
      async (response) => ({ status: response.status, html: response.status === 200 ? await response.text() : "" })
    );
    if (status !== 200) {
      return { keyword, domain, rank: null, error: `HTTP Error: ${status}`, method: "scraping" };
    }

    const $ = cheerio.load(html);
    const blocks = $("div.g").toArray();

    for (const [index, block] of blocks.entries()) {
      const $block = $(block);
      const link = $block.find("a[href]").first().attr("href");
      if (!link || !hostMatches(link, domain)) continue;

      const title = $block.find("h3").first().text().trim();
      const snippet = $block.find("span.st, span.aCOpRe").first().text().trim();
      return {
        keyword,
        domain,
        rank: index + 1,
        url: link,
        title: title || "No title",
        snippet: snippet || "No snippet",
        method: "scraping",
      };
    }

    return {
      keyword,
      domain,
      rank: null,
      message: `Not found in top ${blocks.length} results`,
      method: "scraping",
    };
  }
}

export function summarizeRanks(results: RankResult[]): RankSummary {
  const ranks = results.flatMap((r) => (r.rank !== null ? [r.rank] : []));

  return {
    totalKeywords: results.length,
    rankedKeywords: ranks.length,
    notRanked: results.length - ranks.length,
    top10Positions: ranks.filter((rank) => rank <= 10).length,
    top50Positions: ranks.filter((rank) => rank <= 50).length,
    averageRank: ranks.length > 0 ? roundToTenth(ranks.reduce((sum, rank) => sum + rank, 0) / ranks.length) : null,
    bestRank: ranks.length > 0 ? Math.min(...ranks) : null,
    worstRank: ranks.length > 0 ? Math.max(...ranks) : null,
  };
}
