import type { BatchResult, BatchSummary, IssueKind, PageAttributes, PageAudit } from "./types";
import { auditPage, roundToTenth } from "./scorer";

const COMMON_ISSUES_LIMIT = 5;

/**
 * Issue kinds roll up into these report-level types. Each one matches the
 * leading word of the kind's message, except missing alt text, whose message
 * leads with a count.
 */
export const ISSUE_SUMMARY_TYPES: Record<IssueKind, string> = {
  missing_title: "missing",
  title_too_short: "title",
  title_too_long: "title",
  title_duplicate_words: "title",
  missing_meta_description: "missing",
  meta_description_too_short: "meta",
  meta_description_too_long: "meta",
  missing_h1: "missing",
  multiple_h1: "multiple",
  h1_too_short: "h1",
  h1_too_long: "h1",
  low_word_count: "low",
  images_missing_alt: "images",
};

export function countCommonIssues(audits: PageAudit[], limit = COMMON_ISSUES_LIMIT): Record<string, number> {
  const counts = new Map<string, number>();
  for (const audit of audits) {
    for (const finding of audit.findings) {
      const type = ISSUE_SUMMARY_TYPES[finding.kind];
      counts.set(type, (counts.get(type) ?? 0) + 1);
    }
  }

  // Array.prototype.sort is stable, so equal counts keep first-seen order.
  const top = Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);

  return Object.fromEntries(top);
}

export function summarizeAudits(audits: PageAudit[]): BatchSummary {
  const totalScore = audits.reduce((sum, audit) => sum + audit.overallScore, 0);

  return {
    totalPages: audits.length,
    averageScore: audits.length > 0 ? roundToTenth(totalScore / audits.length) : 0,
    commonIssues: countCommonIssues(audits),
    totalIssues: audits.reduce((sum, audit) => sum + audit.findings.length, 0),
  };
}

export function auditPages(pages: PageAttributes[]): BatchResult {
  const audited = pages.map((page) => auditPage(page));
  return {
    pages: audited,
    summary: summarizeAudits(audited),
  };
}
