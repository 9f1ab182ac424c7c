import { randomUUID } from "crypto";
import type { Category, SiteReport } from "@shared/audit-types";
import type {
  AnalyticsSummary,
  DomainHistory,
  ReportAnalyticsEntry,
  ReportSortField,
  ScoreBand,
  ShowcaseResponse,
  SortOrder,
} from "@shared/analytics-types";
import { CATEGORY_ORDER, roundToTenth } from "./audit/scorer";

const MAX_ENTRIES = 1000;
const TOP_DOMAIN_LIMIT = 10;

export interface ShowcaseQueryOptions {
  page: number;
  limit: number;
  sortBy: ReportSortField;
  sortDir: SortOrder;
}

function emptySummary(): AnalyticsSummary {
  return {
    totalAudits: 0,
    avgScore: 0,
    topDomains: [],
    scoreDistribution: { "0-20": 0, "21-40": 0, "41-60": 0, "61-80": 0, "81-100": 0 },
    recentAudits: [],
  };
}

export interface IAnalyticsStore {
  recordReport(report: SiteReport): Promise<ReportAnalyticsEntry>;
  getSummary(): Promise<AnalyticsSummary>;
  getAll(sortBy?: ReportSortField, sortDir?: SortOrder): Promise<ReportAnalyticsEntry[]>;
  getShowcase(options: ShowcaseQueryOptions): Promise<ShowcaseResponse>;
  getReportById(id: string): Promise<SiteReport | undefined>;
}

export function getDomainFromUrl(url: string): string {
  try {
    const hostname = new URL(url).hostname.toLowerCase().replace(/\.$/, "");
    return hostname.startsWith("www.") ? hostname.slice(4) : hostname;
  } catch {
    return url.toLowerCase().replace(/\.$/, "");
  }
}

/** Per-category mean across the report's pages. */
function toCategoryScores(report: SiteReport): Partial<Record<Category, number>> {
  const categoryScores: Partial<Record<Category, number>> = {};
  const pages = report.audit.pages;
  if (pages.length === 0) return categoryScores;

  for (const category of CATEGORY_ORDER) {
    const scores = pages.flatMap((page) => {
      const score = page.scores[category];
      return score === undefined ? [] : [score];
    });
    if (scores.length > 0) {
      categoryScores[category] = roundToTenth(scores.reduce((sum, s) => sum + s, 0) / scores.length);
    }
  }
  return categoryScores;
}

function getSortedEntries(
  entries: ReportAnalyticsEntry[],
  sortBy: ReportSortField,
  sortDir: SortOrder,
): ReportAnalyticsEntry[] {
  const sorted = [...entries].sort((a, b) => {
    if (sortBy === "score" && b.score !== a.score) {
      return b.score - a.score;
    }
    return new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime();
  });

  if (sortDir === "asc") {
    sorted.reverse();
  }

  return sorted;
}

function scoreBand(score: number): ScoreBand {
  if (score <= 20) return "0-20";
  if (score <= 40) return "21-40";
  if (score <= 60) return "41-60";
  if (score <= 80) return "61-80";
  return "81-100";
}

interface DomainTally {
  auditCount: number;
  scoreTotal: number;
  bestScore: number;
  latestScore: number;
}

/**
 * Keeps the latest report per domain, newest first, and a running tally of
 * every audit of each stored domain.
 */
export class MemoryAnalyticsStore implements IAnalyticsStore {
  private entries: ReportAnalyticsEntry[] = [];
  private reports: Map<string, SiteReport> = new Map();
  private tallies: Map<string, DomainTally> = new Map();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async recordReport(report: SiteReport): Promise<ReportAnalyticsEntry> {
    const domain = getDomainFromUrl(report.websiteUrl);

    for (const replaced of this.entries.filter((entry) => entry.domain === domain)) {
      this.reports.delete(replaced.id);
    }
    this.entries = this.entries.filter((entry) => entry.domain !== domain);

    const entry: ReportAnalyticsEntry = {
      id: randomUUID(),
      url: report.websiteUrl,
      domain,
      score: report.audit.summary.averageScore,
      totalPages: report.audit.summary.totalPages,
      totalIssues: report.audit.summary.totalIssues,
      categoryScores: toCategoryScores(report),
      durationMs: report.crawl.durationMs,
      errorCount: report.crawl.errorCount,
      createdAt: this.now().toISOString(),
    };

    this.entries.unshift(entry);
    this.reports.set(entry.id, report);

    const tally = this.tallies.get(domain);
    this.tallies.set(domain, {
      auditCount: (tally?.auditCount ?? 0) + 1,
      scoreTotal: (tally?.scoreTotal ?? 0) + entry.score,
      bestScore: Math.max(tally?.bestScore ?? entry.score, entry.score),
      latestScore: entry.score,
    });

    if (this.entries.length > MAX_ENTRIES) {
      for (const removed of this.entries.splice(MAX_ENTRIES)) {
        this.reports.delete(removed.id);
        this.tallies.delete(removed.domain);
      }
    }

    return entry;
  }

  async getSummary(): Promise<AnalyticsSummary> {
    const totalAudits = this.entries.length;
    if (totalAudits === 0) {
      return emptySummary();
    }

    const avgScore = roundToTenth(this.entries.reduce((sum, item) => sum + item.score, 0) / totalAudits);

    const topDomains: DomainHistory[] = Array.from(this.tallies.entries(), ([domain, tally]) => ({
      domain,
      auditCount: tally.auditCount,
      averageScore: roundToTenth(tally.scoreTotal / tally.auditCount),
      bestScore: tally.bestScore,
      latestScore: tally.latestScore,
    }))
      .sort((a, b) => b.auditCount - a.auditCount || b.averageScore - a.averageScore)
      .slice(0, TOP_DOMAIN_LIMIT);

    const scoreDistribution = emptySummary().scoreDistribution;
    for (const entry of this.entries) {
      scoreDistribution[scoreBand(entry.score)] += 1;
    }

    return {
      totalAudits,
      avgScore,
      topDomains,
      scoreDistribution,
      recentAudits: getSortedEntries(this.entries, "createdAt", "desc").slice(0, 20),
    };
  }

  async getAll(sortBy: ReportSortField = "createdAt", sortDir: SortOrder = "desc"): Promise<ReportAnalyticsEntry[]> {
    return getSortedEntries(this.entries, sortBy, sortDir);
  }

  async getShowcase({ page, limit, sortBy, sortDir }: ShowcaseQueryOptions): Promise<ShowcaseResponse> {
    const ordered = getSortedEntries(this.entries, sortBy, sortDir);
    const totalItems = ordered.length;
    const totalPages = Math.ceil(totalItems / limit);
    const offset = (page - 1) * limit;

    return {
      items: ordered.slice(offset, offset + limit),
      pagination: {
        page,
        limit,
        totalItems,
        totalPages,
        hasNext: page < totalPages,
        hasPrev: page > 1,
      },
    };
  }

  async getReportById(id: string): Promise<SiteReport | undefined> {
    return this.reports.get(id);
  }
}

export const analyticsStore: IAnalyticsStore = new MemoryAnalyticsStore();
