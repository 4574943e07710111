import { describe, expect, it, vi } from "vitest";
import type { ExtractionService } from "../../src/adapters/extraction.js";
import type { SourceDocument } from "../../src/adapters/loadDocuments.js";
import { ingestDocuments } from "../../src/engine/ingest.js";
import type { RawExtractionResult } from "../../src/types/invoice.js";
import { InvoiceQaError } from "../../src/utils/errors.js";
import { CONTOSO_0001 } from "../helpers.js";

const fast = { delayMs: 0, backoffMs: 0, retries: 0 };

function raw(total: number): RawExtractionResult {
  return {
    fields: {
      InvoiceId: { type: "string", valueString: "INV-2025-0001", confidence: 0.98 },
      VendorName: { type: "string", valueString: "Contoso Retail", confidence: 0.95 },
      InvoiceDate: { type: "date", valueDate: "2025-09-21", confidence: 0.97 },
      SubTotal: { type: "currency", valueCurrency: { amount: 10002, currencyCode: "EUR" }, confidence: 0.9 },
      TotalTax: { type: "currency", valueCurrency: { amount: 2000.4, currencyCode: "EUR" }, confidence: 0.9 },
      ShippingCost: { type: "number", valueNumber: 25, confidence: 0.9 },
      InvoiceTotal: { type: "currency", valueCurrency: { amount: total, currencyCode: "EUR" }, confidence: 0.95 },
    },
  };
}

function docs(...names: string[]): SourceDocument[] {
  return names.map((fileName) => ({ fileName, path: `/invoices/${fileName}` }));
}

function extractorFrom(outcomes: Record<string, RawExtractionResult[] | Error>) {
  const analyze = vi.fn(async (document: SourceDocument): Promise<RawExtractionResult[]> => {
    const outcome = outcomes[document.fileName];
    if (outcome instanceof Error) throw outcome;
    return outcome;
  });
  const extractor: ExtractionService = { name: "fake", analyze };
  return { extractor, analyze };
}

describe("ingestDocuments", () => {
  it("normalizes each document and records failures without stopping", async () => {
    const { extractor } = extractorFrom({
      "a.pdf": [raw(12027.4)],
      "b.pdf": new InvoiceQaError("b.pdf: analysis failed: corrupt file", "EXTRACTION_FAILED"),
      "c.pdf": [],
      "d.pdf": [{ fields: { InvoiceId: { type: "string", valueString: "INV-2025-0002" } } }],
    });

    const report = await ingestDocuments(docs("a.pdf", "b.pdf", "c.pdf", "d.pdf"), extractor, { rateLimit: fast });

    expect(report.processed).toBe(4);
    expect(report.invoices).toEqual([{ ...CONTOSO_0001, source_file: "a.pdf" }]);
    expect(report.failures).toEqual([
      { source_file: "b.pdf", code: "EXTRACTION_FAILED", reason: "b.pdf: analysis failed: corrupt file" },
      { source_file: "c.pdf", code: "EXTRACTION_FAILED", reason: "no invoice found in document" },
      { source_file: "d.pdf", code: "EXTRACTION_INCOMPLETE", reason: 'd.pdf: required field "total" is missing' },
    ]);
    expect(report.totalsIssues).toEqual([]);
    expect(report.duplicateIds).toEqual([]);
  });

  it("keeps the later document for a repeated invoice id and checks its totals", async () => {
    const { extractor } = extractorFrom({ "a.pdf": [raw(12027.4)], "b.pdf": [raw(12100)] });
    const report = await ingestDocuments(docs("a.pdf", "b.pdf"), extractor, { rateLimit: fast });

    expect(report.invoices.map((i) => [i.invoice_id, i.total, i.source_file])).toEqual([
      ["INV-2025-0001", 12100, "b.pdf"],
    ]);
    expect(report.duplicateIds).toEqual(["INV-2025-0001"]);
    expect(report.totalsIssues).toEqual([
      { invoice_id: "INV-2025-0001", expected: 12027.4, actual: 12100, difference: 72.6 },
    ]);
  });

  it("retries a transient extraction failure", async () => {
    const { extractor, analyze } = extractorFrom({ "a.pdf": [raw(12027.4)] });
    analyze.mockRejectedValueOnce(new InvoiceQaError("busy", "EXTRACTION_UNAVAILABLE", { retryable: true }));

    const report = await ingestDocuments(docs("a.pdf"), extractor, { rateLimit: { ...fast, retries: 1 } });
    expect(report.failures).toEqual([]);
    expect(report.invoices).toHaveLength(1);
    expect(analyze).toHaveBeenCalledTimes(2);
  });

  it("applies the confidence threshold", async () => {
    const { extractor } = extractorFrom({ "a.pdf": [raw(12027.4)] });
    const report = await ingestDocuments(docs("a.pdf"), extractor, { rateLimit: fast, confidenceThreshold: 0.99 });
    expect(report.invoices).toEqual([]);
    expect(report.failures[0].code).toBe("EXTRACTION_INCOMPLETE");
  });
});
