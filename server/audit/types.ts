import { z } from "zod";
import type { CrawlSource, PageAttributes, SiteReport } from "@shared/audit-types";

export const DEFAULT_USER_AGENT = "site-seo-audit/1.0";

export const CrawlConfigSchema = z.object({
  url: z.string().url(),
  maxPages: z.number().int().positive().default(10),
  concurrency: z.number().int().positive().default(4),
  timeoutMs: z.number().int().positive().default(30000),
  userAgent: z.string().default(DEFAULT_USER_AGENT),
  linksPerPage: z.number().int().positive().default(3),
});

export type CrawlConfig = z.infer<typeof CrawlConfigSchema>;

export const SiteAuditConfigSchema = CrawlConfigSchema.extend({
  keywords: z.array(z.string().trim().min(1)).default([]),
  ai: z.boolean().default(false),
  aiPageLimit: z.number().int().nonnegative().default(3),
  country: z.string().default("us"),
  language: z.string().default("en"),
});

export type SiteAuditConfig = z.infer<typeof SiteAuditConfigSchema>;

export const PageAttributesSchema = z
  .object({
    url: z.string().min(1),
    title: z.string().nullable().default(null),
    metaDescription: z.string().nullable().default(null),
    h1Tags: z.array(z.string()).default([]),
    h2Tags: z.array(z.string()).default([]),
    wordCount: z.number().int().nonnegative().default(0),
    images: z.number().int().nonnegative().default(0),
    imagesWithoutAlt: z.number().int().nonnegative().default(0),
    internalLinks: z.number().int().nonnegative().default(0),
    externalLinks: z.number().int().nonnegative().default(0),
  })
  .refine((page) => page.imagesWithoutAlt <= page.images, {
    message: "imagesWithoutAlt cannot exceed images",
    path: ["imagesWithoutAlt"],
  });

const CategorySchema = z.enum(["title", "metaDescription", "headings", "content", "images", "links"]);

const IssueKindSchema = z.enum([
  "missing_title",
  "title_too_short",
  "title_too_long",
  "title_duplicate_words",
  "missing_meta_description",
  "meta_description_too_short",
  "meta_description_too_long",
  "missing_h1",
  "multiple_h1",
  "h1_too_short",
  "h1_too_long",
  "low_word_count",
  "images_missing_alt",
]);

const PageAuditSchema = z.object({
  url: z.string(),
  scores: z.object({
    title: z.number().optional(),
    metaDescription: z.number().optional(),
    headings: z.number().optional(),
    content: z.number().optional(),
    images: z.number().optional(),
    links: z.number().optional(),
  }),
  issues: z.array(z.string()),
  findings: z.array(z.object({ kind: IssueKindSchema, category: CategorySchema, message: z.string() })),
  recommendations: z.array(z.string()),
  overallScore: z.number(),
  seoData: z.object({
    title: z.string().nullable(),
    metaDescription: z.string().nullable(),
    h1Tags: z.array(z.string()),
    wordCount: z.number(),
    url: z.string(),
  }),
});

const RankResultSchema = z.object({
  keyword: z.string(),
  domain: z.string(),
  rank: z.number().nullable(),
  method: z.enum(["serpapi", "scraping"]),
  url: z.string().optional(),
  title: z.string().optional(),
  snippet: z.string().optional(),
  message: z.string().optional(),
  error: z.string().optional(),
});

/** A complete site report, as posted back to the export endpoints. */
export const SiteReportSchema: z.ZodType<SiteReport> = z.object({
  websiteUrl: z.string(),
  analysisDate: z.string(),
  crawl: z.object({
    source: z.enum(["sitemap", "crawl"]),
    errorCount: z.number(),
    skippedCount: z.number(),
    durationMs: z.number(),
  }),
  audit: z.object({
    pages: z.array(PageAuditSchema),
    summary: z.object({
      totalPages: z.number(),
      averageScore: z.number(),
      commonIssues: z.record(z.string(), z.number()),
      totalIssues: z.number(),
    }),
  }),
  suggestions: z
    .array(
      z.union([
        z.object({ url: z.string(), title: z.string(), metaDescription: z.string(), content: z.string() }),
        z.object({ url: z.string(), error: z.string() }),
      ])
    )
    .nullable(),
  ranks: z
    .object({
      results: z.array(RankResultSchema),
      summary: z.object({
        totalKeywords: z.number(),
        rankedKeywords: z.number(),
        notRanked: z.number(),
        top10Positions: z.number(),
        top50Positions: z.number(),
        averageRank: z.number().nullable(),
        bestRank: z.number().nullable(),
        worstRank: z.number().nullable(),
      }),
    })
    .nullable(),
});

export interface CrawlResult {
  pages: PageAttributes[];
  source: CrawlSource;
  errorCount: number;
  skippedCount: number;
}

export type {
  AuditIssue,
  BatchResult,
  BatchSummary,
  Category,
  CategoryResult,
  IssueKind,
  PageAttributes,
  PageAudit,
  SeoData,
  SiteReport,
} from "@shared/audit-types";
