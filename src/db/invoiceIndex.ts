// src/db/invoiceIndex.ts
import type Database from "better-sqlite3";
import { parseCanonicalInvoice } from "../adapters/schemas.js";
import type { AmountBand, CanonicalInvoice, IndexedDocument, UpsertReport } from "../types/invoice.js";
import { errorMessage } from "../utils/errors.js";
import { requireIndex } from "./searchIndex.js";

export type InvoiceRow = IndexedDocument;

function nowIso(now?: Date) {
  return (now ?? new Date()).toISOString();
}

export const AMOUNT_BANDS: readonly AmountBand[] = ["<1k", "1k-10k", ">=10k"];

export function isAmountBand(v: string): v is AmountBand {
  return AMOUNT_BANDS.some((b) => b === v);
}

export function amountBand(total: number): AmountBand {
  if (total < 1000) return "<1k";
  if (total < 10000) return "1k-10k";
  return ">=10k";
}

export function toIndexedDocument(inv: CanonicalInvoice, now?: Date): IndexedDocument {
  return {
    ...inv,
    invoice_month: inv.invoice_date ? inv.invoice_date.slice(0, 7) : null,
    amount_band: amountBand(inv.total),
    indexed_at: nowIso(now),
  };
}

export function rowToInvoice(row: InvoiceRow): CanonicalInvoice {
  return {
    invoice_id: row.invoice_id,
    vendor: row.vendor,
    invoice_date: row.invoice_date,
    due_date: row.due_date,
    currency: row.currency,
    subtotal: row.subtotal,
    tax: row.tax,
    shipping: row.shipping,
    total: row.total,
    content: row.content,
    source_file: row.source_file,
  };
}

/**
 * Upsert by invoice_id. Each record is validated and written on its own, so a
 * bad record lands in `failed` without rolling back the others. A second write
 * to the same id replaces the first one entirely.
 */
export function upsertInvoices(
  db: Database.Database,
  indexName: string,
  records: readonly unknown[],
  now?: Date
): UpsertReport {
  const { docs, fts } = requireIndex(db, indexName);

  const writeDoc = db.prepare(`
    INSERT INTO ${docs} (invoice_id, vendor, invoice_date, due_date, currency, subtotal, tax, shipping, total,
      content, source_file, invoice_month, amount_band, indexed_at)
    VALUES (@invoice_id, @vendor, @invoice_date, @due_date, @currency, @subtotal, @tax, @shipping, @total,
      @content, @source_file, @invoice_month, @amount_band, @indexed_at)
    ON CONFLICT(invoice_id) DO UPDATE SET
      vendor=excluded.vendor,
      invoice_date=excluded.invoice_date,
      due_date=excluded.due_date,
      currency=excluded.currency,
      subtotal=excluded.subtotal,
      tax=excluded.tax,
      shipping=excluded.shipping,
      total=excluded.total,
      content=excluded.content,
      source_file=excluded.source_file,
      invoice_month=excluded.invoice_month,
      amount_band=excluded.amount_band,
      indexed_at=excluded.indexed_at
  `);
  const clearText = db.prepare(`DELETE FROM ${fts} WHERE invoice_id = ?`);
  const writeText = db.prepare(`INSERT INTO ${fts} (invoice_id, content) VALUES (?, ?)`);

  const writeOne = db.transaction((doc: IndexedDocument) => {
    writeDoc.run(doc);
    clearText.run(doc.invoice_id);
    writeText.run(doc.invoice_id, doc.content);
  });

  const report: UpsertReport = { succeeded: [], failed: [] };

  records.forEach((record, i) => {
    const parsed = parseCanonicalInvoice(record);
    if (!parsed.ok) {
      report.failed.push({ invoice_id: recordId(record, i), reason: parsed.reason });
      return;
    }

    try {
      writeOne(toIndexedDocument(parsed.invoice, now));
      report.succeeded.push(parsed.invoice.invoice_id);
    } catch (e) {
      report.failed.push({ invoice_id: parsed.invoice.invoice_id, reason: errorMessage(e) });
    }
  });

  return report;
}

function recordId(record: unknown, position: number): string {
  if (typeof record === "object" && record !== null && "invoice_id" in record) {
    const id = record.invoice_id;
    if (typeof id === "string" && id.trim() !== "") return id;
  }
  return `#${position}`;
}

export function getInvoice(db: Database.Database, indexName: string, invoiceId: string): CanonicalInvoice | null {
  const { docs } = requireIndex(db, indexName);
  const row = db.prepare(`SELECT * FROM ${docs} WHERE invoice_id = ?`).get(invoiceId) as InvoiceRow | undefined;
  return row ? rowToInvoice(row) : null;
}

export function listInvoices(db: Database.Database, indexName: string, limit = 10): CanonicalInvoice[] {
  const { docs } = requireIndex(db, indexName);
  const rows = db
    .prepare(`SELECT * FROM ${docs} ORDER BY invoice_id ASC LIMIT ?`)
    .all(Math.max(1, Math.trunc(limit))) as InvoiceRow[];
  return rows.map(rowToInvoice);
}

export function countInvoices(db: Database.Database, indexName: string): number {
  const { docs } = requireIndex(db, indexName);
  const row = db.prepare(`SELECT COUNT(*) AS n FROM ${docs}`).get() as { n: number };
  return row.n;
}
