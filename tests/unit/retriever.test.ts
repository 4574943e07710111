import { describe, expect, it } from "vitest";
import { readInvoicesJsonl } from "../../src/adapters/invoiceJsonl.js";
import { openDb } from "../../src/db/sqlite.js";
import { buildMatchExpression, extractInvoiceIds, inferFiltersFromQuestion, queryTerms } from "../../src/engine/queryTerms.js";
import { clampTopK, searchInvoices } from "../../src/engine/retriever.js";
import type { SearchFilters } from "../../src/types/invoice.js";
import { IndexNotFoundError } from "../../src/utils/errors.js";
import { SAMPLE_JSONL, indexWith, makeInvoice } from "../helpers.js";

function sampleIndex() {
  return indexWith(readInvoicesJsonl(SAMPLE_JSONL).invoices);
}

function ids(db: ReturnType<typeof sampleIndex>, query: string, topK = 10, filters: SearchFilters = {}) {
  return searchInvoices(db, "invoices", query, topK, filters).map((c) => c.invoice.invoice_id);
}

describe("queryTerms", () => {
  it("drops stopwords and repeats", () => {
    expect(queryTerms("What is the total on invoice INV-2025-0001? Total!")).toEqual([
      "total",
      "invoice",
      "inv",
      "2025",
      "0001",
    ]);
  });

  it("quotes terms for the match expression", () => {
    expect(buildMatchExpression(["office", "chairs"])).toBe('"office" OR "chairs"');
    expect(buildMatchExpression([])).toBeNull();
  });

  it("finds invoice ids regardless of case", () => {
    expect(extractInvoiceIds("compare inv-2025-0002 with INV-2025-0002 and INV-2024-0100")).toEqual([
      "INV-2025-0002",
      "INV-2024-0100",
    ]);
  });

  it("turns a month and year into a date range", () => {
    expect(inferFiltersFromQuestion("Which invoices from February 2024?")).toEqual({
      dateFrom: "2024-02-01",
      dateTo: "2024-02-29",
    });
    expect(inferFiltersFromQuestion("Which invoices are overdue?")).toEqual({});
  });
});

describe("clampTopK", () => {
  it("keeps topK within 1..10", () => {
    expect(clampTopK(0)).toBe(1);
    expect(clampTopK(25)).toBe(10);
    expect(clampTopK(3.7)).toBe(3);
    expect(clampTopK(Number.NaN)).toBe(1);
  });
});

describe("searchInvoices", () => {
  it("requires an existing index", () => {
    const db = openDb(":memory:");
    expect(() => searchInvoices(db, "invoices", "total", 3)).toThrow(IndexNotFoundError);
  });

  it("puts the invoice named in the question first", () => {
    const db = sampleIndex();
    const [top] = searchInvoices(db, "invoices", "What is the total on invoice INV-2025-0001?", 3);
    expect(top.invoice.invoice_id).toBe("INV-2025-0001");
    expect(top.exactIdMatch).toBe(true);
    expect(top.matchedTerms).toEqual(["total", "invoice", "inv", "2025", "0001"]);
  });

  it("boosts an exact id even when its text does not match", () => {
    const db = indexWith([
      makeInvoice({ invoice_id: "INV-2025-0101", content: "consulting consulting consulting" }),
      makeInvoice({ invoice_id: "INV-2025-0102", content: "Office chairs and desks" }),
      makeInvoice({ invoice_id: "INV-2025-0103", content: "consulting workshop" }),
      makeInvoice({ invoice_id: "INV-2025-0104", content: "printer paper" }),
      makeInvoice({ invoice_id: "INV-2025-0105", content: "catering lunch" }),
    ]);

    const results = searchInvoices(db, "invoices", "consulting INV-2025-0102", 3);
    expect(results.map((c) => c.invoice.invoice_id)).toEqual(["INV-2025-0102", "INV-2025-0101", "INV-2025-0103"]);
    expect(results[0]).toMatchObject({ score: 0, exactIdMatch: true, matchedTerms: [] });
    expect(results[1].score).toBeGreaterThan(results[2].score);
    expect(results[1].matchedTerms).toEqual(["consulting"]);
  });

  it("breaks score ties by total then invoice id", () => {
    const db = indexWith([
      makeInvoice({ invoice_id: "INV-2025-0202", total: 500, content: "Monthly cleaning service" }),
      makeInvoice({ invoice_id: "INV-2025-0201", total: 500, content: "Monthly cleaning service" }),
    ]);
    expect(ids(db, "cleaning")).toEqual(["INV-2025-0201", "INV-2025-0202"]);
  });

  it("returns the same ranking on every call", () => {
    const db = sampleIndex();
    const first = searchInvoices(db, "invoices", "Contoso invoice total", 4);
    const second = searchInvoices(db, "invoices", "Contoso invoice total", 4);
    expect(second).toEqual(first);
  });

  it("lists the filtered corpus when the query has no usable terms", () => {
    const db = sampleIndex();
    expect(ids(db, "*")).toEqual(["INV-2025-0001", "INV-2025-0003", "INV-2025-0004", "INV-2025-0002"]);
  });

  it("applies structured filters", () => {
    const db = sampleIndex();
    expect(ids(db, "*", 10, { currency: "usd" })).toEqual(["INV-2025-0003", "INV-2025-0002"]);
    expect(ids(db, "*", 10, { vendor: "contoso retail" })).toEqual(["INV-2025-0001", "INV-2025-0004"]);
    expect(ids(db, "*", 10, { month: "2025-04" })).toEqual(["INV-2025-0003", "INV-2025-0002"]);
    expect(ids(db, "*", 10, { dateFrom: "2025-06-01", dateTo: "2025-12-31" })).toEqual([
      "INV-2025-0001",
      "INV-2025-0004",
    ]);
    expect(ids(db, "*", 10, { minTotal: 1000, maxTotal: 5000 })).toEqual(["INV-2025-0003", "INV-2025-0004"]);
    expect(ids(db, "*", 10, { amountBand: "1k-10k" })).toEqual(["INV-2025-0003", "INV-2025-0004"]);
    expect(ids(db, "*", 10, { amountBand: ">=10k" })).toEqual(["INV-2025-0001"]);
  });

  it("does not boost an id the filters exclude", () => {
    const db = sampleIndex();
    expect(ids(db, "INV-2025-0001", 3, { currency: "USD" }).sort()).toEqual(["INV-2025-0002", "INV-2025-0003"]);
  });

  it("returns at most ten results", () => {
    const invoices = Array.from({ length: 12 }, (_, i) =>
      makeInvoice({ invoice_id: `INV-2025-${String(i + 1).padStart(4, "0")}`, total: 100 + i })
    );
    const db = indexWith(invoices);
    expect(searchInvoices(db, "invoices", "contoso", 50)).toHaveLength(10);
  });

  it("returns nothing for an empty corpus", () => {
    const db = indexWith([]);
    expect(searchInvoices(db, "invoices", "anything", 3)).toEqual([]);
  });
});
