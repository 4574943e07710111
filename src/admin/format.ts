import type { IndexInfo } from "../db/searchIndex.js";
import type { IngestReport } from "../engine/ingest.js";
import type { CanonicalInvoice, CitedAnswer, RetrievalCandidate, UpsertReport } from "../types/invoice.js";

export const RULE = "=".repeat(70);

function money(amount: number, currency: string | null) {
  return `${currency ?? ""} ${amount.toFixed(2)}`.trim();
}

export function formatInvoiceRow(inv: CanonicalInvoice, n: number): string {
  return [
    `${n}. ID: ${inv.invoice_id.padEnd(15)}`,
    `Vendor: ${(inv.vendor ?? "Unknown").padEnd(25)}`,
    `Date: ${(inv.invoice_date ?? "N/A").padEnd(12)}`,
    `Total: ${money(inv.total, inv.currency)}`,
  ].join(" | ");
}

export function formatInvoiceList(invoices: readonly CanonicalInvoice[]): string {
  if (invoices.length === 0) return "(no invoices indexed)";
  return invoices.map((inv, i) => formatInvoiceRow(inv, i + 1)).join("\n");
}

export function formatCandidates(candidates: readonly RetrievalCandidate[]): string {
  if (candidates.length === 0) return "No matching invoices.";
  return candidates
    .map((c, i) => {
      const tags = [`score ${c.score.toFixed(4)}`];
      if (c.exactIdMatch) tags.push("exact id");
      if (c.matchedTerms.length > 0) tags.push(`terms: ${c.matchedTerms.join(", ")}`);
      return `${formatInvoiceRow(c.invoice, i + 1)}  (${tags.join("; ")})`;
    })
    .join("\n");
}

export function formatAnswer(answer: CitedAnswer): string {
  const lines = [answer.text];
  if (answer.citations.length > 0) {
    lines.push("", "Sources:");
    for (const c of answer.citations) {
      lines.push(`  - ${c.invoice_id} | ${c.vendor ?? "Unknown"} | ${c.date ?? "N/A"} | ${money(c.amount, c.currency)}`);
    }
  }
  if (answer.ungroundedIds.length > 0) {
    lines.push("", `Unverified references removed: ${answer.ungroundedIds.join(", ")}`);
  }
  return lines.join("\n");
}

export function formatUpsertReport(report: UpsertReport): string {
  const lines = [`Indexed ${report.succeeded.length} invoice(s), ${report.failed.length} failed`];
  for (const f of report.failed) lines.push(`  FAILED ${f.invoice_id}: ${f.reason}`);
  return lines.join("\n");
}

export function formatIngestReport(report: IngestReport): string {
  const lines = [
    RULE,
    `Processed ${report.processed} document(s): ${report.invoices.length} invoice(s), ${report.failures.length} failure(s)`,
    RULE,
  ];
  for (const f of report.failures) lines.push(`  SKIP ${f.source_file} [${f.code}] ${f.reason}`);
  for (const t of report.totalsIssues) {
    lines.push(`  CHECK ${t.invoice_id}: total ${t.actual} vs subtotal+tax+shipping ${t.expected}`);
  }
  for (const id of report.duplicateIds) lines.push(`  DUPLICATE ${id}: last extraction kept`);
  return lines.join("\n");
}

export function formatIndexes(indexes: readonly IndexInfo[]): string {
  if (indexes.length === 0) return "(no indexes)";
  return indexes.map((i) => `${i.name.padEnd(24)} ${String(i.documentCount).padStart(6)} docs  created ${i.createdAt}`).join("\n");
}
