import type Database from "better-sqlite3";
import { rowToInvoice, type InvoiceRow } from "../db/invoiceIndex.js";
import { requireIndex } from "../db/searchIndex.js";
import type { RetrievalCandidate, SearchFilters } from "../types/invoice.js";
import { buildMatchExpression, extractInvoiceIds, queryTerms, tokenize } from "./queryTerms.js";

export const MIN_TOP_K = 1;
export const MAX_TOP_K = 10;

type Params = Record<string, string | number>;

export function clampTopK(topK: number): number {
  if (!Number.isFinite(topK)) return MIN_TOP_K;
  return Math.min(MAX_TOP_K, Math.max(MIN_TOP_K, Math.trunc(topK)));
}

function filterClauses(filters: SearchFilters | undefined): { clauses: string[]; params: Params } {
  const clauses: string[] = [];
  const params: Params = {};
  if (!filters) return { clauses, params };

  if (filters.dateFrom) {
    clauses.push(`d.invoice_date >= @dateFrom`);
    params.dateFrom = filters.dateFrom;
  }
  if (filters.dateTo) {
    clauses.push(`d.invoice_date <= @dateTo`);
    params.dateTo = filters.dateTo;
  }
  if (filters.month) {
    clauses.push(`d.invoice_month = @month`);
    params.month = filters.month;
  }
  if (filters.vendor) {
    clauses.push(`d.vendor = @vendor COLLATE NOCASE`);
    params.vendor = filters.vendor.trim();
  }
  if (filters.currency) {
    clauses.push(`d.currency = @currency`);
    params.currency = filters.currency.trim().toUpperCase();
  }
  if (filters.minTotal !== undefined && Number.isFinite(filters.minTotal)) {
    clauses.push(`d.total >= @minTotal`);
    params.minTotal = filters.minTotal;
  }
  if (filters.maxTotal !== undefined && Number.isFinite(filters.maxTotal)) {
    clauses.push(`d.total <= @maxTotal`);
    params.maxTotal = filters.maxTotal;
  }
  if (filters.amountBand) {
    clauses.push(`d.amount_band = @amountBand`);
    params.amountBand = filters.amountBand;
  }
  return { clauses, params };
}

function roundScore(n: number) {
  return Math.round(n * 1e9) / 1e9 + 0;
}

function matchedTerms(terms: readonly string[], content: string): string[] {
  const words = new Set(tokenize(content));
  return terms.filter((t) => words.has(t));
}

/**
 * Rank invoices for a free-text query.
 *
 * Invoice ids written in the query are looked up exactly and placed first.
 * The remaining slots are filled by BM25 over `content`; equal scores fall
 * back to total (descending) and invoice_id (ascending). A query without
 * usable terms lists the filtered corpus in that same fallback order.
 */
export function searchInvoices(
  db: Database.Database,
  indexName: string,
  query: string,
  topK: number,
  filters?: SearchFilters
): RetrievalCandidate[] {
  const { docs, fts } = requireIndex(db, indexName);
  const limit = clampTopK(topK);
  const terms = queryTerms(query);
  const match = buildMatchExpression(terms);
  const ids = extractInvoiceIds(query);
  const { clauses, params } = filterClauses(filters);
  const where = clauses.length > 0 ? ` AND ${clauses.join(" AND ")}` : "";

  let ranked: Array<InvoiceRow & { lexical_rank: number }>;
  if (match) {
    ranked = db
      .prepare(`
        SELECT d.*, bm25(${fts}) AS lexical_rank
        FROM ${fts}
        JOIN ${docs} d ON d.invoice_id = ${fts}.invoice_id
        WHERE ${fts} MATCH @match${where}
        ORDER BY round(bm25(${fts}), 9) ASC, d.total DESC, d.invoice_id ASC
        LIMIT @limit
      `)
      .all({ ...params, match, limit: limit + ids.length }) as Array<InvoiceRow & { lexical_rank: number }>;
  } else {
    ranked = db
      .prepare(`
        SELECT d.*, 0 AS lexical_rank
        FROM ${docs} d
        WHERE 1 = 1${where}
        ORDER BY d.total DESC, d.invoice_id ASC
        LIMIT @limit
      `)
      .all({ ...params, limit: limit + ids.length }) as Array<InvoiceRow & { lexical_rank: number }>;
  }

  const lexicalScore = new Map(ranked.map((r): [string, number] => [r.invoice_id, roundScore(-r.lexical_rank)]));
  const out: RetrievalCandidate[] = [];

  const byId = db.prepare(`SELECT d.* FROM ${docs} d WHERE d.invoice_id = @id${where}`);
  for (const id of ids) {
    const row = byId.get({ ...params, id }) as InvoiceRow | undefined;
    if (!row) continue;
    out.push({
      invoice: rowToInvoice(row),
      score: lexicalScore.get(id) ?? 0,
      matchedTerms: matchedTerms(terms, row.content),
      exactIdMatch: true,
    });
  }

  for (const row of ranked) {
    if (out.length >= limit) break;
    if (ids.includes(row.invoice_id)) continue;
    out.push({
      invoice: rowToInvoice(row),
      score: roundScore(-row.lexical_rank),
      matchedTerms: matchedTerms(terms, row.content),
      exactIdMatch: false,
    });
  }

  return out.slice(0, limit);
}
