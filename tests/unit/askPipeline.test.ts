import { describe, expect, it } from "vitest";
import { readInvoicesJsonl } from "../../src/adapters/invoiceJsonl.js";
import { askQuestion, resolveFilters } from "../../src/engine/askPipeline.js";
import { SAMPLE_JSONL, fakeGenerator, indexWith } from "../helpers.js";

const sampleIndex = () => indexWith(readInvoicesJsonl(SAMPLE_JSONL).invoices);

describe("resolveFilters", () => {
  it("adds a date range for a named month", () => {
    expect(resolveFilters("Show me invoices from April 2025", { vendor: "Contoso Retail" })).toEqual({
      dateFrom: "2025-04-01",
      dateTo: "2025-04-30",
      vendor: "Contoso Retail",
    });
  });

  it("leaves explicit date filters alone", () => {
    expect(resolveFilters("Show me invoices from April 2025", { month: "2025-06" })).toEqual({ month: "2025-06" });
  });

  it("can be switched off", () => {
    expect(resolveFilters("Show me invoices from April 2025", {}, false)).toEqual({});
  });
});

describe("askQuestion", () => {
  it("answers the exact-id question from the matching invoice", async () => {
    const { client, complete } = fakeGenerator("The total on INV-2025-0001 is EUR 12,027.40.");
    const result = await askQuestion("What is the total on invoice INV-2025-0001?", {
      db: sampleIndex(),
      indexName: "invoices",
      generator: client,
    });

    expect(result.candidates[0].invoice.invoice_id).toBe("INV-2025-0001");
    expect(result.answer.citations).toEqual([
      { invoice_id: "INV-2025-0001", vendor: "Contoso Retail", date: "2025-09-21", amount: 12027.4, currency: "EUR" },
    ]);
    const userMessage = complete.mock.calls[0][0].messages[1].content;
    expect(userMessage).toContain("[INV-2025-0001] vendor: Contoso Retail | date: 2025-09-21 | total: 12027.40 EUR");
  });

  it("restricts retrieval to the month named in the question", async () => {
    const { client } = fakeGenerator("INV-2025-0002 and INV-2025-0003 are from April 2025.");
    const result = await askQuestion("Which invoices are from April 2025?", {
      db: sampleIndex(),
      indexName: "invoices",
      generator: client,
    });

    expect(result.filters).toEqual({ dateFrom: "2025-04-01", dateTo: "2025-04-30" });
    expect(result.candidates.map((c) => c.invoice.invoice_id).sort()).toEqual(["INV-2025-0002", "INV-2025-0003"]);
    expect(result.answer.citations.map((c) => c.invoice_id)).toEqual(["INV-2025-0002", "INV-2025-0003"]);
  });

  it("does not call the model when nothing matches", async () => {
    const { client, complete } = fakeGenerator();
    const result = await askQuestion("Any invoices from Tailspin?", {
      db: sampleIndex(),
      indexName: "invoices",
      filters: { vendor: "Tailspin Toys" },
      generator: client,
    });

    expect(result.answer.kind).toBe("no_matching_invoices");
    expect(result.candidates).toEqual([]);
    expect(result.context.kind).toBe("empty");
    expect(complete).not.toHaveBeenCalled();
  });

  it("stops before retrieval when already cancelled", async () => {
    const { client, complete } = fakeGenerator("unused");
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));

    await expect(
      askQuestion("What is the total on invoice INV-2025-0001?", {
        db: sampleIndex(),
        indexName: "invoices",
        generator: client,
        signal: controller.signal,
      })
    ).rejects.toThrow("cancelled");
    expect(complete).not.toHaveBeenCalled();
  });
});
