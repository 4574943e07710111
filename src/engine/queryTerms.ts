import type { SearchFilters } from "../types/invoice.js";
import { monthNumber, monthRange } from "./dates.js";

const INVOICE_ID_IN_TEXT = /\bINV-\d{4}-\d{4}\b/gi;

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "do", "does", "for", "from",
  "has", "have", "how", "i", "in", "is", "it", "me", "much", "my", "of", "on",
  "or", "show", "tell", "that", "the", "this", "to", "we", "what", "when",
  "which", "who", "with",
]);

/** Lowercased word tokens, split the way the FTS5 unicode61 tokenizer splits. */
export function tokenize(text: string): string[] {
  return text
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((t) => t.length > 0);
}

/** Distinct non-stopword query terms in order of first appearance. */
export function queryTerms(query: string): string[] {
  const seen = new Set<string>();
  for (const t of tokenize(query)) {
    if (!STOPWORDS.has(t)) seen.add(t);
  }
  return [...seen];
}

export function extractInvoiceIds(text: string): string[] {
  const ids = new Set<string>();
  for (const m of text.matchAll(INVOICE_ID_IN_TEXT)) ids.add(m[0].toUpperCase());
  return [...ids];
}

export function buildMatchExpression(terms: readonly string[]): string | null {
  if (terms.length === 0) return null;
  return terms.map((t) => `"${t.replace(/"/g, '""')}"`).join(" OR ");
}

/**
 * Derive a date range from phrases like "April 2025". Only the first
 * month/year pair is used.
 */
export function inferFiltersFromQuestion(question: string): SearchFilters {
  const m = question.match(
    /\b(January|February|March|April|May|June|July|August|September|October|November|December)\s+(\d{4})\b/i
  );
  if (!m) return {};
  const month = monthNumber(m[1]);
  if (!month) return {};
  return monthRange(Number(m[2]), month);
}
