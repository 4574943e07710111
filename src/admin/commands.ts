import type Database from "better-sqlite3";
import { ChatCompletionsClient } from "../adapters/chatCompletions.js";
import { DocumentIntelligenceExtractor, JsonSidecarExtractor, type ExtractionService } from "../adapters/extraction.js";
import { GeminiGenerator } from "../adapters/geminiGenerator.js";
import type { GenerationClient } from "../adapters/generation.js";
import { readInvoicesJsonl, writeInvoicesJsonl } from "../adapters/invoiceJsonl.js";
import { loadDocuments } from "../adapters/loadDocuments.js";
import { AMOUNT_BANDS, isAmountBand, listInvoices, upsertInvoices } from "../db/invoiceIndex.js";
import { ensureSchema, listIndexes, resetIndex } from "../db/searchIndex.js";
import { askQuestion, type AskResult } from "../engine/askPipeline.js";
import { ingestDocuments } from "../engine/ingest.js";
import { searchInvoices } from "../engine/retriever.js";
import type { SearchFilters } from "../types/invoice.js";
import { getFlag, getNumberFlag, hasFlag, type CliArgs } from "../utils/args.js";
import { requireSetting, type AppConfig } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";
import {
  formatAnswer,
  formatCandidates,
  formatIndexes,
  formatIngestReport,
  formatInvoiceList,
  formatUpsertReport,
} from "./format.js";

export type CommandContext = {
  db: Database.Database;
  config: AppConfig;
  logger: Logger;
  print: (text: string) => void;
};

export function createGenerator(config: AppConfig): GenerationClient {
  if (config.GENERATION_PROVIDER === "gemini") {
    return new GeminiGenerator({
      apiKey: config.GEMINI_API_KEY,
      model: config.GEMINI_MODEL,
      timeoutMs: config.GENERATION_TIMEOUT_MS,
    });
  }

  return new ChatCompletionsClient({
    flavor: config.GENERATION_PROVIDER,
    endpoint: requireSetting(
      config.OPENAI_ENDPOINT ?? (config.GENERATION_PROVIDER === "openai" ? "https://api.openai.com/v1" : undefined),
      "OPENAI_ENDPOINT"
    ),
    apiKey: requireSetting(config.OPENAI_KEY, "OPENAI_KEY"),
    model: requireSetting(config.OPENAI_DEPLOYMENT, "OPENAI_DEPLOYMENT"),
    apiVersion: config.OPENAI_API_VERSION,
    tokenParameter: config.OPENAI_TOKEN_PARAMETER,
    timeoutMs: config.GENERATION_TIMEOUT_MS,
  });
}

export function createExtractor(config: AppConfig, sidecar: boolean): ExtractionService {
  if (sidecar) return new JsonSidecarExtractor();
  return new DocumentIntelligenceExtractor({
    endpoint: requireSetting(config.DOC_INTEL_ENDPOINT, "DOC_INTEL_ENDPOINT"),
    apiKey: requireSetting(config.DOC_INTEL_KEY, "DOC_INTEL_KEY"),
  });
}

export function filtersFromArgs(args: CliArgs): SearchFilters {
  const filters: SearchFilters = {};
  const vendor = getFlag(args, "vendor");
  const from = getFlag(args, "from");
  const to = getFlag(args, "to");
  const month = getFlag(args, "month");
  const currency = getFlag(args, "currency");
  const min = getNumberFlag(args, "min");
  const max = getNumberFlag(args, "max");
  const band = getFlag(args, "band");

  if (vendor) filters.vendor = vendor;
  if (from) filters.dateFrom = from;
  if (to) filters.dateTo = to;
  if (month) filters.month = month;
  if (currency) filters.currency = currency;
  if (min !== undefined) filters.minTotal = min;
  if (max !== undefined) filters.maxTotal = max;
  if (band !== undefined) {
    if (!isAmountBand(band)) throw new Error(`--band must be one of ${AMOUNT_BANDS.join(", ")} (got "${band}")`);
    filters.amountBand = band;
  }
  return filters;
}

export async function runIngest(ctx: CommandContext, args: CliArgs) {
  const { config, db, logger, print } = ctx;
  const dir = getFlag(args, "dir") ?? config.INVOICES_DIR;
  const limit = getNumberFlag(args, "limit") ?? config.BATCH_LIMIT;
  const out = getFlag(args, "out") ?? config.EXTRACTION_OUTPUT;

  const documents = loadDocuments(dir, limit);
  logger.info(`processing ${documents.length} invoice document(s)`, { dir, limit });

  const report = await ingestDocuments(documents, createExtractor(config, hasFlag(args, "sidecar")), {
    confidenceThreshold: config.CONFIDENCE_THRESHOLD,
    rateLimit: { maxConcurrent: config.EXTRACT_CONCURRENCY },
    logger,
  });
  print(formatIngestReport(report));

  if (report.invoices.length === 0) {
    print("No invoices extracted.");
    return;
  }

  writeInvoicesJsonl(out, report.invoices);
  print(`Saved to: ${out}`);

  ensureSchema(db, config.SEARCH_INDEX_NAME);
  print(formatUpsertReport(upsertInvoices(db, config.SEARCH_INDEX_NAME, report.invoices)));
}

export function runIndexFile(ctx: CommandContext, args: CliArgs) {
  const { config, db, logger, print } = ctx;
  const file = getFlag(args, "file") ?? args._[1] ?? config.EXTRACTION_OUTPUT;

  const { invoices, errors } = readInvoicesJsonl(file);
  for (const e of errors) logger.warn(`skipping line ${e.line}`, { reason: e.reason });

  const state = ensureSchema(db, config.SEARCH_INDEX_NAME);
  logger.info(`index ${config.SEARCH_INDEX_NAME} ${state}`);
  print(formatUpsertReport(upsertInvoices(db, config.SEARCH_INDEX_NAME, invoices)));
}

export function runSearch(ctx: CommandContext, args: CliArgs) {
  const { config, db, print } = ctx;
  const query = args._.slice(1).join(" ");
  const topK = getNumberFlag(args, "top") ?? config.TOP_K;
  print(formatCandidates(searchInvoices(db, config.SEARCH_INDEX_NAME, query, topK, filtersFromArgs(args))));
}

export async function ask(
  ctx: CommandContext,
  question: string,
  args: CliArgs,
  generator: GenerationClient,
  signal?: AbortSignal
): Promise<AskResult> {
  const { config, db, logger } = ctx;
  return askQuestion(question, {
    db,
    indexName: config.SEARCH_INDEX_NAME,
    topK: getNumberFlag(args, "top") ?? config.TOP_K,
    filters: filtersFromArgs(args),
    context: { charBudget: config.CONTEXT_CHAR_BUDGET },
    generator,
    maxOutputTokens: config.MAX_OUTPUT_TOKENS,
    groundingPolicy: config.GROUNDING_POLICY,
    signal,
    logger,
  });
}

/** Question answering for a session; the generator (and what it learns) is shared across questions. */
export function createAsker(ctx: CommandContext, args: CliArgs) {
  const generator = createGenerator(ctx.config);
  return (question: string, signal?: AbortSignal) => ask(ctx, question, args, generator, signal);
}

export async function runAsk(ctx: CommandContext, args: CliArgs) {
  const question = args._.slice(1).join(" ").trim();
  if (!question) throw new Error("ask needs a question, e.g. ask \"What is the total for INV-2025-0001?\"");
  const result = await ask(ctx, question, args, createGenerator(ctx.config));
  ctx.print(formatAnswer(result.answer));
}

export function runList(ctx: CommandContext, args: CliArgs) {
  const { config, db, print } = ctx;
  print(formatInvoiceList(listInvoices(db, config.SEARCH_INDEX_NAME, getNumberFlag(args, "top") ?? 10)));
}

export function runIndexes(ctx: CommandContext) {
  ctx.print(formatIndexes(listIndexes(ctx.db)));
}

export function runReset(ctx: CommandContext, args: CliArgs) {
  const { config, db, print } = ctx;
  const name = getFlag(args, "index") ?? config.SEARCH_INDEX_NAME;
  if (!hasFlag(args, "yes")) {
    throw new Error(`reset deletes every document in "${name}"; pass --yes to confirm`);
  }
  const dropped = resetIndex(db, name);
  ensureSchema(db, name);
  print(dropped ? `Index "${name}" recreated (empty).` : `Index "${name}" created (empty).`);
}
