import type { SiteReport, SuggestionOutcome } from "@shared/audit-types";
import type { PageAttributes, SiteAuditConfig } from "./types";
import { SiteAuditConfigSchema } from "./types";
import { crawlSite } from "./crawler";
import { auditPages } from "./aggregator";
import { SuggestionGenerator, DISABLED_SUGGESTIONS } from "./suggestions";
import { RankChecker, summarizeRanks } from "./rank-checker";
import { getHost } from "./url-utils";

export interface SiteAuditServices {
  suggestions: SuggestionGenerator;
  rankChecker: RankChecker;
}

type SiteAuditInput = Partial<SiteAuditConfig> & { url: string };

function defaultServices(config: SiteAuditConfig): SiteAuditServices {
  return {
    suggestions: new SuggestionGenerator(DISABLED_SUGGESTIONS),
    rankChecker: new RankChecker({
      userAgent: config.userAgent,
      timeoutMs: config.timeoutMs,
      delayMs: 2000,
    }),
  };
}

async function collectSuggestions(
  generator: SuggestionGenerator,
  pages: PageAttributes[],
  limit: number
): Promise<SuggestionOutcome[]> {
  const outcomes: SuggestionOutcome[] = [];
  for (const page of pages.slice(0, limit)) {
    try {
      outcomes.push(await generator.suggestForPage(page));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[audit] Suggestions failed for ${page.url}: ${message}`);
      outcomes.push({ url: page.url, error: message });
    }
  }
  return outcomes;
}

export async function runSiteAudit(
  input: SiteAuditInput,
  services?: Partial<SiteAuditServices>
): Promise<SiteReport> {
  const startTime = Date.now();
  const config = SiteAuditConfigSchema.parse(input);
  const defaults = defaultServices(config);
  const suggestions = services?.suggestions ?? defaults.suggestions;
  const rankChecker = services?.rankChecker ?? defaults.rankChecker;

  const crawl = await crawlSite(config);
  if (crawl.pages.length === 0) {
    throw new Error("No pages could be crawled. Please check the URL.");
  }

  const audit = auditPages(crawl.pages);

  const suggestionOutcomes = config.ai
    ? await collectSuggestions(suggestions, crawl.pages, config.aiPageLimit)
    : null;

  let ranks: SiteReport["ranks"] = null;
  if (config.keywords.length > 0) {
    const results = await rankChecker.checkKeywords(getHost(config.url), config.keywords, {
      country: config.country,
      language: config.language,
    });
    ranks = { results, summary: summarizeRanks(results) };
  }

  return {
    websiteUrl: config.url,
    analysisDate: new Date().toISOString(),
    crawl: {
      source: crawl.source,
      errorCount: crawl.errorCount,
      skippedCount: crawl.skippedCount,
      durationMs: Date.now() - startTime,
    },
    audit,
    suggestions: suggestionOutcomes,
    ranks,
  };
}

export { auditPage, calculateOverallScore } from "./scorer";
export { auditPages, summarizeAudits } from "./aggregator";
export { SiteAuditConfigSchema, PageAttributesSchema, SiteReportSchema } from "./types";
export type { SiteAuditConfig } from "./types";
