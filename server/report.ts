import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { Category, SiteReport, SuggestionFailure, SuggestionOutcome } from "@shared/audit-types";
import { CATEGORY_ORDER } from "./audit/scorer";

const RULE = "=".repeat(60);
const CONSOLE_PAGE_LIMIT = 5;
const CONSOLE_ISSUE_LIMIT = 3;
const CONSOLE_SUGGESTION_LIMIT = 2;
const PREVIEW_LENGTH = 100;

export const CATEGORY_LABELS: Record<Category, string> = {
  title: "Title",
  metaDescription: "Meta description",
  headings: "Headings",
  content: "Content",
  images: "Images",
  links: "Links",
};

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function formatScore(score: number): string {
  return `${score.toFixed(1)}/100`;
}

function preview(text: string): string {
  return `${text.slice(0, PREVIEW_LENGTH)}...`;
}

function isFailure(outcome: SuggestionOutcome): outcome is SuggestionFailure {
  return "error" in outcome;
}

export function formatConsoleReport(report: SiteReport): string {
  const { summary, pages } = report.audit;
  const lines: string[] = ["", RULE, "SEO ANALYSIS RESULTS", RULE];

  lines.push("", "SUMMARY:");
  lines.push(`   • Overall Score: ${formatScore(summary.averageScore)}`);
  lines.push(`   • Pages Analyzed: ${summary.totalPages}`);
  lines.push(`   • Total Issues: ${summary.totalIssues}`);

  const common = Object.entries(summary.commonIssues);
  if (common.length > 0) {
    lines.push("", "MOST COMMON ISSUES:");
    for (const [type, count] of common) {
      lines.push(`   • ${capitalize(type)}: ${count} occurrences`);
    }
  }

  lines.push("", "PAGE DETAILS:");
  pages.slice(0, CONSOLE_PAGE_LIMIT).forEach((page, index) => {
    lines.push("", `   ${index + 1}. ${page.url}`);
    lines.push(`      Score: ${formatScore(page.overallScore)}`);
    const issues = page.issues.length > 0 ? page.issues.slice(0, CONSOLE_ISSUE_LIMIT).join(", ") : "None";
    lines.push(`      Issues: ${issues}`);
  });

  if (report.suggestions && report.suggestions.length > 0) {
    lines.push("", "AI SUGGESTIONS:");
    for (const outcome of report.suggestions.slice(0, CONSOLE_SUGGESTION_LIMIT)) {
      lines.push("", `   URL: ${outcome.url}`);
      if (isFailure(outcome)) {
        lines.push(`   Error: ${outcome.error}`);
      } else {
        lines.push(`   Title: ${preview(outcome.title)}`);
        lines.push(`   Meta: ${preview(outcome.metaDescription)}`);
      }
    }
  }

  if (report.ranks && report.ranks.results.length > 0) {
    lines.push("", "KEYWORD RANKINGS:");
    for (const result of report.ranks.results) {
      lines.push(`   • ${result.keyword}: Position ${result.rank ?? "Not Found"}`);
    }
  }

  return lines.join("\n");
}

function timestamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function reportFilename(date: Date, format: "json" | "csv" = "json"): string {
  return format === "csv" ? `seo_pages_${timestamp(date)}.csv` : `seo_report_${timestamp(date)}.json`;
}

async function writeReportFile(outputDir: string, filename: string, contents: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const filepath = path.join(outputDir, filename);
  await writeFile(filepath, contents, "utf-8");
  return filepath;
}

export async function writeJsonReport(report: SiteReport, outputDir: string, now = new Date()): Promise<string> {
  return writeReportFile(outputDir, reportFilename(now), JSON.stringify(report, null, 2));
}

export async function writeCsvReport(report: SiteReport, outputDir: string, now = new Date()): Promise<string> {
  return writeReportFile(outputDir, reportFilename(now, "csv"), generateCsv(report));
}

const CSV_COLUMNS = [
  "URL",
  "Overall Score",
  "Issues Count",
  "Issues",
  "Recommendations",
  "Title",
  "Meta Description",
  "H1 Tags",
  "Word Count",
];

function csvCell(value: string | number): string {
  return `"${String(value).replace(/"/g, '""')}"`;
}

/** One row per audited page. List cells are joined with "; ". */
export function generateCsv(report: SiteReport): string {
  const rows = report.audit.pages.map((page) =>
    [
      page.url,
      page.overallScore,
      page.issues.length,
      page.issues.join("; "),
      page.recommendations.join("; "),
      page.seoData.title ?? "",
      page.seoData.metaDescription ?? "",
      page.seoData.h1Tags.join("; "),
      page.seoData.wordCount,
    ]
      .map(csvCell)
      .join(",")
  );

  return [CSV_COLUMNS.join(","), ...rows].join("\n");
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\n/g, " ");
}

export function generateMarkdown(report: SiteReport): string {
  const { summary, pages } = report.audit;
  const lines: string[] = [];

  lines.push(`# SEO Audit Report: ${report.websiteUrl}`, "");
  lines.push(`Analyzed ${report.analysisDate} from ${report.crawl.source} (${summary.totalPages} pages).`, "");

  lines.push("## Summary", "");
  lines.push("| Metric | Value |", "| --- | --- |");
  lines.push(`| Average score | ${formatScore(summary.averageScore)} |`);
  lines.push(`| Pages analyzed | ${summary.totalPages} |`);
  lines.push(`| Total issues | ${summary.totalIssues} |`, "");

  const common = Object.entries(summary.commonIssues);
  if (common.length > 0) {
    lines.push("## Most common issues", "");
    for (const [type, count] of common) {
      lines.push(`- **${type}**: ${count}`);
    }
    lines.push("");
  }

  lines.push("## Pages", "");
  for (const page of pages) {
    lines.push(`### ${page.url} (${formatScore(page.overallScore)})`, "");
    lines.push("| Category | Score |", "| --- | --- |");
    for (const category of CATEGORY_ORDER) {
      const score = page.scores[category];
      if (score !== undefined) lines.push(`| ${CATEGORY_LABELS[category]} | ${score} |`);
    }
    lines.push("");

    if (page.issues.length > 0) {
      lines.push("**Issues**", "");
      page.issues.forEach((issue) => lines.push(`- ${issue}`));
      lines.push("");
    }
    if (page.recommendations.length > 0) {
      lines.push("**Recommendations**", "");
      page.recommendations.forEach((rec) => lines.push(`- ${rec}`));
      lines.push("");
    }
  }

  if (report.suggestions && report.suggestions.length > 0) {
    lines.push("## AI suggestions", "");
    for (const outcome of report.suggestions) {
      lines.push(`### ${outcome.url}`, "");
      if (isFailure(outcome)) {
        lines.push(`_Suggestions unavailable: ${outcome.error}_`, "");
        continue;
      }
      lines.push(`**Title:** ${outcome.title}`, "");
      lines.push(`**Meta description:** ${outcome.metaDescription}`, "");
      lines.push("**Content:**", "", outcome.content, "");
    }
  }

  if (report.ranks && report.ranks.results.length > 0) {
    lines.push("## Keyword rankings", "");
    lines.push("| Keyword | Position | URL |", "| --- | --- | --- |");
    for (const result of report.ranks.results) {
      const position = result.rank ?? (result.error ? `Error: ${result.error}` : "Not found");
      lines.push(`| ${escapeCell(result.keyword)} | ${escapeCell(String(position))} | ${result.url ?? ""} |`);
    }
    lines.push("");
  }

  return lines.join("\n");
}
