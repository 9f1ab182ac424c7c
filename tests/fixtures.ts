import type { PageAttributes, SiteReport } from "@shared/audit-types";
import { auditPages } from "../server/audit/aggregator";

/** Scores 100 in every category. */
export const WELL_FORMED_PAGE: PageAttributes = {
  url: "https://example.com/guide",
  title: "Complete Guide to Technical Search Optimization",
  metaDescription: "x".repeat(140),
  h1Tags: ["Technical SEO guide for modern websites"],
  h2Tags: ["Crawling", "Indexing"],
  wordCount: 800,
  images: 4,
  imagesWithoutAlt: 0,
  internalLinks: 5,
  externalLinks: 2,
};

export function siteReport(websiteUrl: string, pages: PageAttributes[]): SiteReport {
  return {
    websiteUrl,
    analysisDate: "2026-03-01T12:00:00.000Z",
    crawl: { source: "crawl", errorCount: 1, skippedCount: 0, durationMs: 2500 },
    audit: auditPages(pages),
    suggestions: null,
    ranks: null,
  };
}
