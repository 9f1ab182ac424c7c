import type {
  AuditIssue,
  Category,
  CategoryResult,
  IssueKind,
  PageAttributes,
  PageAudit,
} from "./types";

const MAX_CATEGORY_SCORE = 100;

export const CATEGORY_ORDER: readonly Category[] = [
  "title",
  "metaDescription",
  "headings",
  "content",
  "images",
  "links",
];

export const CATEGORY_WEIGHTS: Record<Category, number> = {
  title: 0.25,
  metaDescription: 0.2,
  headings: 0.2,
  content: 0.15,
  images: 0.1,
  links: 0.1,
};

export interface ScoredPage {
  url: string;
  title: string | null;
  metaDescription: string | null;
  h1Tags: string[];
  h2Tags: string[];
  wordCount: number;
  images: number;
  imagesWithoutAlt: number;
  internalLinks: number;
  externalLinks: number;
}

type PageNumber = number | ((page: ScoredPage) => number);
type PageText = string | ((page: ScoredPage) => string);

/**
 * One check within a category. Rules are evaluated in declaration order and
 * every rule whose predicate holds deducts its points; a terminal rule zeroes
 * the category and ends its evaluation.
 */
export interface ScoringRule {
  when: (page: ScoredPage) => boolean;
  deduction?: PageNumber;
  terminal?: boolean;
  issue?: { kind: IssueKind; message: PageText };
  recommendation: string;
}

function deductionFor(rule: ScoringRule, page: ScoredPage): number {
  const deduction = rule.deduction ?? 0;
  return typeof deduction === "number" ? deduction : deduction(page);
}

function messageFor(message: PageText, page: ScoredPage): string {
  return typeof message === "string" ? message : message(page);
}

function charLength(text: string | null): number {
  return text ? Array.from(text).length : 0;
}

function hasDuplicateWords(text: string | null): boolean {
  if (!text) return false;
  const words = text.toLowerCase().split(/\s+/).filter(Boolean);
  return words.length !== new Set(words).size;
}

function singleH1Length(page: ScoredPage): number | null {
  return page.h1Tags.length === 1 ? charLength(page.h1Tags[0]) : null;
}

export const TITLE_RULES: ScoringRule[] = [
  {
    when: (p) => !p.title,
    terminal: true,
    issue: { kind: "missing_title", message: "Missing title tag" },
    recommendation: "Add a descriptive title tag (50-60 characters)",
  },
  {
    when: (p) => charLength(p.title) < 30,
    deduction: 30,
    issue: { kind: "title_too_short", message: (p) => `Title too short (${charLength(p.title)} characters)` },
    recommendation: "Expand title to 50-60 characters for better SEO",
  },
  {
    when: (p) => charLength(p.title) > 60,
    deduction: 20,
    issue: { kind: "title_too_long", message: (p) => `Title too long (${charLength(p.title)} characters)` },
    recommendation: "Shorten title to under 60 characters to avoid truncation",
  },
  {
    when: (p) => hasDuplicateWords(p.title),
    deduction: 10,
    issue: { kind: "title_duplicate_words", message: "Title contains duplicate words" },
    recommendation: "Remove duplicate words from title",
  },
];

export const META_DESCRIPTION_RULES: ScoringRule[] = [
  {
    when: (p) => !p.metaDescription,
    terminal: true,
    issue: { kind: "missing_meta_description", message: "Missing meta description" },
    recommendation: "Add a compelling meta description (150-160 characters)",
  },
  {
    when: (p) => charLength(p.metaDescription) < 120,
    deduction: 30,
    issue: {
      kind: "meta_description_too_short",
      message: (p) => `Meta description too short (${charLength(p.metaDescription)} characters)`,
    },
    recommendation: "Expand meta description to 150-160 characters",
  },
  {
    when: (p) => charLength(p.metaDescription) > 160,
    deduction: 20,
    issue: {
      kind: "meta_description_too_long",
      message: (p) => `Meta description too long (${charLength(p.metaDescription)} characters)`,
    },
    recommendation: "Shorten meta description to under 160 characters",
  },
];

export const HEADING_RULES: ScoringRule[] = [
  {
    when: (p) => p.h1Tags.length === 0,
    deduction: 40,
    issue: { kind: "missing_h1", message: "Missing H1 tag" },
    recommendation: "Add exactly one H1 tag to define the main topic",
  },
  {
    when: (p) => p.h1Tags.length > 1,
    deduction: 30,
    issue: { kind: "multiple_h1", message: (p) => `Multiple H1 tags found (${p.h1Tags.length})` },
    recommendation: "Use only one H1 tag per page",
  },
  {
    when: (p) => (singleH1Length(p) ?? 20) < 20,
    deduction: 15,
    issue: { kind: "h1_too_short", message: "H1 tag too short" },
    recommendation: "Make H1 more descriptive (20-70 characters)",
  },
  {
    when: (p) => (singleH1Length(p) ?? 0) > 70,
    deduction: 10,
    issue: { kind: "h1_too_long", message: "H1 tag too long" },
    recommendation: "Shorten H1 to under 70 characters",
  },
  // Recommendation only: deducted from the score but never listed as an issue.
  {
    when: (p) => p.h2Tags.length === 0,
    deduction: 10,
    recommendation: "Consider adding H2 tags to structure your content",
  },
];

export const CONTENT_RULES: ScoringRule[] = [
  {
    when: (p) => p.wordCount < 300,
    deduction: 40,
    issue: { kind: "low_word_count", message: (p) => `Low word count (${p.wordCount} words)` },
    recommendation: "Add more content (aim for 300+ words minimum)",
  },
  {
    when: (p) => p.wordCount >= 300 && p.wordCount < 500,
    deduction: 15,
    recommendation: "Consider expanding content to 500+ words for better SEO",
  },
];

export const IMAGE_RULES: ScoringRule[] = [
  {
    when: (p) => p.images > 0 && p.imagesWithoutAlt > 0,
    deduction: (p) => Math.min(40, p.imagesWithoutAlt * 10),
    issue: { kind: "images_missing_alt", message: (p) => `${p.imagesWithoutAlt} images missing alt text` },
    recommendation: "Add descriptive alt text to all images",
  },
  {
    when: (p) => p.images === 0,
    deduction: 5,
    recommendation: "Consider adding relevant images to enhance content",
  },
];

export const LINK_RULES: ScoringRule[] = [
  {
    when: (p) => p.internalLinks === 0,
    deduction: 15,
    recommendation: "Add internal links to improve site navigation",
  },
  {
    when: (p) => p.externalLinks === 0,
    deduction: 10,
    recommendation: "Consider adding relevant external links to authoritative sources",
  },
];

export const CATEGORY_RULES: Record<Category, ScoringRule[]> = {
  title: TITLE_RULES,
  metaDescription: META_DESCRIPTION_RULES,
  headings: HEADING_RULES,
  content: CONTENT_RULES,
  images: IMAGE_RULES,
  links: LINK_RULES,
};

function toScoredPage(page: PageAttributes): ScoredPage {
  return {
    url: page.url,
    title: page.title || null,
    metaDescription: page.metaDescription || null,
    h1Tags: page.h1Tags ?? [],
    h2Tags: page.h2Tags ?? [],
    wordCount: page.wordCount ?? 0,
    images: page.images ?? 0,
    imagesWithoutAlt: page.imagesWithoutAlt ?? 0,
    internalLinks: page.internalLinks ?? 0,
    externalLinks: page.externalLinks ?? 0,
  };
}

export function auditCategory(
  category: Category,
  rules: ScoringRule[],
  page: PageAttributes
): CategoryResult {
  const scored = toScoredPage(page);
  const issues: AuditIssue[] = [];
  const recommendations: string[] = [];
  let score = MAX_CATEGORY_SCORE;

  for (const rule of rules) {
    if (!rule.when(scored)) continue;

    if (rule.issue) {
      issues.push({ kind: rule.issue.kind, category, message: messageFor(rule.issue.message, scored) });
    }
    recommendations.push(rule.recommendation);

    if (rule.terminal) {
      score = 0;
      break;
    }
    score = Math.max(0, score - deductionFor(rule, scored));
  }

  return { score, issues, recommendations };
}

/**
 * Nearest tenth of the stored binary value. A double sits exactly halfway
 * between two tenths only when it is an odd multiple of 0.25; those ties go
 * to the even tenth. Everything else is rounded by `toFixed`, which works on
 * the exact binary value rather than on `value * 10`.
 */
export function roundToTenth(value: number): number {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const lower = Math.floor(value * 10);
    return (lower % 2 === 0 ? lower : lower + 1) / 10;
  }
  return Number(value.toFixed(1));
}

export function calculateOverallScore(scores: Partial<Record<Category, number>>): number {
  let weightedSum = 0;
  let totalWeight = 0;

  for (const category of CATEGORY_ORDER) {
    const score = scores[category];
    if (score === undefined) continue;
    weightedSum += score * CATEGORY_WEIGHTS[category];
    totalWeight += CATEGORY_WEIGHTS[category];
  }

  if (totalWeight === 0) return 0;
  return roundToTenth(weightedSum / totalWeight);
}

export function auditPage(page: PageAttributes): PageAudit {
  const scores: Partial<Record<Category, number>> = {};
  const findings: AuditIssue[] = [];
  const recommendations: string[] = [];

  for (const category of CATEGORY_ORDER) {
    const result = auditCategory(category, CATEGORY_RULES[category], page);
    scores[category] = result.score;
    findings.push(...result.issues);
    recommendations.push(...result.recommendations);
  }

  return {
    url: page.url,
    scores,
    issues: findings.map((f) => f.message),
    findings,
    recommendations,
    overallScore: calculateOverallScore(scores),
    seoData: {
      title: page.title ?? null,
      metaDescription: page.metaDescription ?? null,
      h1Tags: page.h1Tags ?? [],
      wordCount: page.wordCount ?? 0,
      url: page.url,
    },
  };
}
