import type Database from "better-sqlite3";
import type { CitedAnswer, GroundingContext, RetrievalCandidate, SearchFilters } from "../types/invoice.js";
import { answerQuestion, type AnswerOptions } from "./answer.js";
import { assembleContext, type AssembleOptions } from "./contextAssembler.js";
import { inferFiltersFromQuestion } from "./queryTerms.js";
import { searchInvoices } from "./retriever.js";

export type AskOptions = AnswerOptions & {
  db: Database.Database;
  indexName: string;
  topK?: number;
  filters?: SearchFilters;
  /** Turn "April 2025" style phrases into a date filter when no date filter is given. */
  inferDateFilter?: boolean;
  context?: AssembleOptions;
};

export type AskResult = {
  answer: CitedAnswer;
  candidates: RetrievalCandidate[];
  context: GroundingContext;
  filters: SearchFilters;
};

export function resolveFilters(question: string, filters: SearchFilters = {}, infer = true): SearchFilters {
  if (!infer || filters.dateFrom || filters.dateTo || filters.month) return filters;
  return { ...inferFiltersFromQuestion(question), ...filters };
}

/** Retrieve, assemble and answer. Reads the index only. */
export async function askQuestion(question: string, options: AskOptions): Promise<AskResult> {
  const { db, indexName, signal } = options;
  signal?.throwIfAborted();

  const filters = resolveFilters(question, options.filters, options.inferDateFilter ?? true);
  const topK = options.topK ?? options.context?.maxEntries ?? 3;
  const candidates = searchInvoices(db, indexName, question, topK, filters);
  options.logger?.debug("retrieved", { count: candidates.length, ids: candidates.map((c) => c.invoice.invoice_id) });

  signal?.throwIfAborted();
  const context = assembleContext(candidates, options.context);

  const answer = await answerQuestion(question, context, options);
  return { answer, candidates, context, filters };
}
