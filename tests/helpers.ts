import { fileURLToPath } from "node:url";
import { vi } from "vitest";
import type { GenerationClient, GenerationRequest, GenerationResponse } from "../src/adapters/generation.js";
import { upsertInvoices } from "../src/db/invoiceIndex.js";
import { ensureSchema } from "../src/db/searchIndex.js";
import { openDb } from "../src/db/sqlite.js";
import { buildContent } from "../src/engine/normalize.js";
import type { CanonicalInvoice, RetrievalCandidate } from "../src/types/invoice.js";

export const SAMPLE_JSONL = fileURLToPath(new URL("../data/sample-invoices.jsonl", import.meta.url));

export const CONTOSO_0001: CanonicalInvoice = {
  invoice_id: "INV-2025-0001",
  vendor: "Contoso Retail",
  invoice_date: "2025-09-21",
  due_date: null,
  currency: "EUR",
  subtotal: 10002,
  tax: 2000.4,
  shipping: 25,
  total: 12027.4,
  content:
    "Invoice INV-2025-0001 from Contoso Retail dated 2025-09-21. Subtotal: EUR 10002.00. Tax: EUR 2000.40. Shipping: EUR 25.00. Total: EUR 12027.40.",
  source_file: "invoice_0001.pdf",
};

export function makeInvoice(overrides: Partial<CanonicalInvoice> = {}): CanonicalInvoice {
  const { content, ...rest } = overrides;
  const base: Omit<CanonicalInvoice, "content"> = {
    invoice_id: "INV-2025-0001",
    vendor: "Contoso Retail",
    invoice_date: "2025-09-21",
    due_date: null,
    currency: "EUR",
    subtotal: null,
    tax: null,
    shipping: null,
    total: 100,
    source_file: "invoice.pdf",
    ...rest,
  };
  return { ...base, content: content ?? buildContent(base) };
}

export function candidate(invoice: CanonicalInvoice, score = 1): RetrievalCandidate {
  return { invoice, score, matchedTerms: [], exactIdMatch: false };
}

export function indexWith(invoices: readonly CanonicalInvoice[], indexName = "invoices") {
  const db = openDb(":memory:");
  ensureSchema(db, indexName);
  const report = upsertInvoices(db, indexName, invoices);
  if (report.failed.length > 0) throw new Error(`fixture upsert failed: ${JSON.stringify(report.failed)}`);
  return db;
}

export type Reply = string | GenerationResponse | Error;

export function fakeGenerator(...replies: Reply[]) {
  const queue = [...replies];
  const complete = vi.fn(async (_request: GenerationRequest, _signal?: AbortSignal): Promise<GenerationResponse> => {
    const next = queue.shift();
    if (next === undefined) throw new Error("fake generator has no more replies");
    if (next instanceof Error) throw next;
    return typeof next === "string" ? { text: next } : next;
  });
  const client: GenerationClient = { name: "fake", complete };
  return { client, complete };
}
