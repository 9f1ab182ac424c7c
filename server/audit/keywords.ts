import { readFileSync } from "node:fs";
import { z } from "zod";

const StopwordsSchema = z.array(z.string());

export type KeywordMethod = "frequency" | "phrases" | "both";

let stopwords: Set<string> | null = null;

function loadStopwords(): Set<string> {
  if (!stopwords) {
    const raw = readFileSync(new URL("./data/stopwords.json", import.meta.url), "utf-8");
    stopwords = new Set(StopwordsSchema.parse(JSON.parse(raw)));
  }
  return stopwords;
}

const TOKEN_PATTERN = /[\p{L}\p{N}]+|[^\s\p{L}\p{N}]+/gu;
const WORD_PATTERN = /^[\p{L}\p{N}]+$/u;

function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Most frequent non-stopword terms of a text. Ties keep the order in which
 * the terms first appear.
 */
export function extractFrequentTerms(text: string, limit = 30): string[] {
  const ignored = loadStopwords();
  const counts = new Map<string, number>();

  for (const token of tokenize(text)) {
    if (!WORD_PATTERN.test(token) || ignored.has(token)) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([term]) => term);
}

function candidatePhrases(text: string): string[][] {
  const ignored = loadStopwords();
  const phrases: string[][] = [];
  let current: string[] = [];

  for (const token of tokenize(text)) {
    if (WORD_PATTERN.test(token) && !ignored.has(token)) {
      current.push(token);
      continue;
    }
    if (current.length > 0) phrases.push(current);
    current = [];
  }
  if (current.length > 0) phrases.push(current);

  return phrases;
}

/**
 * Phrases ranked RAKE style. Candidates are the runs of words between
 * stopwords and punctuation; each word scores degree / frequency, where its
 * degree sums the lengths of the candidates it occurs in, and a phrase scores
 * the sum of its words. Equal scores keep first appearance.
 */
export function extractKeyPhrases(text: string, limit = 30): string[] {
  const phrases = candidatePhrases(text);
  const frequency = new Map<string, number>();
  const degree = new Map<string, number>();

  for (const phrase of phrases) {
    for (const word of phrase) {
      frequency.set(word, (frequency.get(word) ?? 0) + 1);
      degree.set(word, (degree.get(word) ?? 0) + phrase.length);
    }
  }

  const scores = new Map<string, number>();
  for (const phrase of phrases) {
    const key = phrase.join(" ");
    if (scores.has(key)) continue;
    scores.set(
      key,
      phrase.reduce((sum, word) => sum + (degree.get(word) ?? 0) / (frequency.get(word) ?? 1), 0)
    );
  }

  return Array.from(scores.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([phrase]) => phrase);
}

/**
 * Keywords of a text. "both" alternates frequent terms and ranked phrases,
 * dropping repeats, until `limit` keywords are collected.
 */
export function extractKeywords(text: string, limit = 30, method: KeywordMethod = "both"): string[] {
  if (!text) return [];

  if (method === "frequency") return extractFrequentTerms(text, limit);
  if (method === "phrases") return extractKeyPhrases(text, limit);

  const terms = extractFrequentTerms(text, limit);
  const phrases = extractKeyPhrases(text, limit);
  const merged = new Set<string>();

  for (let i = 0; i < Math.max(terms.length, phrases.length) && merged.size < limit; i++) {
    if (i < terms.length) merged.add(terms[i]);
    if (i < phrases.length && merged.size < limit) merged.add(phrases[i]);
  }

  return Array.from(merged);
}
