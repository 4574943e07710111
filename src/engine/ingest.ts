import type { ExtractionService } from "../adapters/extraction.js";
import type { SourceDocument } from "../adapters/loadDocuments.js";
import type { CanonicalInvoice } from "../types/invoice.js";
import { wrapError, type ErrorCode } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { checkTotals, normalizeExtraction, type TotalsIssue } from "./normalize.js";
import { RateLimiter, type RateLimitConfig } from "./rateLimiter.js";

export type IngestFailure = {
  source_file: string;
  code: ErrorCode;
  reason: string;
};

export type IngestReport = {
  processed: number;
  invoices: CanonicalInvoice[];
  failures: IngestFailure[];
  totalsIssues: TotalsIssue[];
  duplicateIds: string[];
};

export type IngestOptions = {
  confidenceThreshold?: number;
  rateLimit?: Partial<RateLimitConfig>;
  logger?: Logger;
  signal?: AbortSignal;
};

type DocumentOutcome =
  | { ok: true; invoices: CanonicalInvoice[]; failures: IngestFailure[] }
  | { ok: false; failure: IngestFailure };

/**
 * Extract and normalize every document. Documents run concurrently under the
 * rate limiter; a failing document is recorded and the batch carries on.
 * Output follows input order, and a later document with the same invoice id
 * replaces an earlier one.
 */
export async function ingestDocuments(
  documents: readonly SourceDocument[],
  extractor: ExtractionService,
  options: IngestOptions = {}
): Promise<IngestReport> {
  const logger = options.logger ?? silentLogger;
  const limiter = new RateLimiter(options.rateLimit, logger);

  const outcomes = await Promise.all(
    documents.map(async (doc): Promise<DocumentOutcome> => {
      try {
        options.signal?.throwIfAborted();
        const results = await limiter.execute(() => extractor.analyze(doc, options.signal), `extract ${doc.fileName}`);
        const invoices: CanonicalInvoice[] = [];
        const failures: IngestFailure[] = [];

        for (const raw of results) {
          try {
            invoices.push(normalizeExtraction(raw, doc.fileName, { confidenceThreshold: options.confidenceThreshold, logger }));
          } catch (e) {
            const err = wrapError(e);
            failures.push({ source_file: doc.fileName, code: err.code, reason: err.message });
          }
        }
        if (results.length === 0) {
          failures.push({ source_file: doc.fileName, code: "EXTRACTION_FAILED", reason: "no invoice found in document" });
        }
        return { ok: true, invoices, failures };
      } catch (e) {
        const err = wrapError(e, doc.fileName);
        return { ok: false, failure: { source_file: doc.fileName, code: err.code, reason: err.message } };
      }
    })
  );

  const byId = new Map<string, CanonicalInvoice>();
  const duplicateIds = new Set<string>();
  const report: IngestReport = { processed: documents.length, invoices: [], failures: [], totalsIssues: [], duplicateIds: [] };

  outcomes.forEach((outcome) => {
    if (!outcome.ok) {
      logger.error("document failed", { ...outcome.failure });
      report.failures.push(outcome.failure);
      return;
    }
    for (const f of outcome.failures) {
      logger.warn("document skipped", { ...f });
      report.failures.push(f);
    }
    for (const inv of outcome.invoices) {
      if (byId.has(inv.invoice_id)) duplicateIds.add(inv.invoice_id);
      byId.set(inv.invoice_id, inv);
      logger.info(`extracted ${inv.invoice_id}`, { total: inv.total, currency: inv.currency });
    }
  });

  report.invoices = [...byId.values()];
  report.duplicateIds = [...duplicateIds];
  for (const inv of report.invoices) {
    const issue = checkTotals(inv);
    if (issue) {
      logger.warn("totals do not add up", { ...issue });
      report.totalsIssues.push(issue);
    }
  }

  return report;
}
