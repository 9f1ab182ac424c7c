export type Category =
  | "title"
  | "metaDescription"
  | "headings"
  | "content"
  | "images"
  | "links";

export type IssueKind =
  | "missing_title"
  | "title_too_short"
  | "title_too_long"
  | "title_duplicate_words"
  | "missing_meta_description"
  | "meta_description_too_short"
  | "meta_description_too_long"
  | "missing_h1"
  | "multiple_h1"
  | "h1_too_short"
  | "h1_too_long"
  | "low_word_count"
  | "images_missing_alt";

export interface PageAttributes {
  url: string;
  title?: string | null;
  metaDescription?: string | null;
  h1Tags?: string[];
  h2Tags?: string[];
  wordCount?: number;
  images?: number;
  imagesWithoutAlt?: number;
  internalLinks?: number;
  externalLinks?: number;
}

export interface AuditIssue {
  kind: IssueKind;
  category: Category;
  message: string;
}

export interface CategoryResult {
  score: number;
  issues: AuditIssue[];
  recommendations: string[];
}

export interface SeoData {
  title: string | null;
  metaDescription: string | null;
  h1Tags: string[];
  wordCount: number;
  url: string;
}

export interface PageAudit {
  url: string;
  scores: Partial<Record<Category, number>>;
  issues: string[];
  findings: AuditIssue[];
  recommendations: string[];
  overallScore: number;
  seoData: SeoData;
}

export interface BatchSummary {
  totalPages: number;
  averageScore: number;
  commonIssues: Record<string, number>;
  totalIssues: number;
}

export interface BatchResult {
  pages: PageAudit[];
  summary: BatchSummary;
}

export type CrawlSource = "sitemap" | "crawl";

export interface CrawlMeta {
  source: CrawlSource;
  errorCount: number;
  skippedCount: number;
  durationMs: number;
}

export interface PageSuggestions {
  url: string;
  title: string;
  metaDescription: string;
  content: string;
}

export interface SuggestionFailure {
  url: string;
  error: string;
}

export type SuggestionOutcome = PageSuggestions | SuggestionFailure;

export type RankMethod = "serpapi" | "scraping";

export interface RankResult {
  keyword: string;
  domain: string;
  rank: number | null;
  method: RankMethod;
  url?: string;
  title?: string;
  snippet?: string;
  message?: string;
  error?: string;
}

export interface RankSummary {
  totalKeywords: number;
  rankedKeywords: number;
  notRanked: number;
  top10Positions: number;
  top50Positions: number;
  averageRank: number | null;
  bestRank: number | null;
  worstRank: number | null;
}

export interface RankReport {
  results: RankResult[];
  summary: RankSummary;
}

export interface SiteReport {
  websiteUrl: string;
  analysisDate: string;
  crawl: CrawlMeta;
  audit: BatchResult;
  suggestions: SuggestionOutcome[] | null;
  ranks: RankReport | null;
}
