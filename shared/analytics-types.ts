import type { Category } from "./audit-types";

/** Stored summary of one site report. */
export interface ReportAnalyticsEntry {
  id: string;
  url: string;
  domain: string;
  score: number;
  totalPages: number;
  totalIssues: number;
  categoryScores: Partial<Record<Category, number>>;
  durationMs: number;
  errorCount: number;
  createdAt: string;
}

export type ReportSortField = "createdAt" | "score";
export type SortOrder = "asc" | "desc";

export interface PageInfo {
  page: number;
  limit: number;
  totalItems: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export interface Paginated<T> {
  items: T[];
  pagination: PageInfo;
}

export type ShowcaseResponse = Paginated<ReportAnalyticsEntry>;

/** Every audit recorded for a domain, including reports since replaced. */
export interface DomainHistory {
  domain: string;
  auditCount: number;
  averageScore: number;
  bestScore: number;
  latestScore: number;
}

export type ScoreBand = "0-20" | "21-40" | "41-60" | "61-80" | "81-100";

export interface AnalyticsSummary {
  totalAudits: number;
  avgScore: number;
  topDomains: DomainHistory[];
  scoreDistribution: Record<ScoreBand, number>;
  recentAudits: ReportAnalyticsEntry[];
}
