import type { CanonicalInvoice, ContextEntry, GroundingContext, RetrievalCandidate } from "../types/invoice.js";

export const DEFAULT_CHAR_BUDGET = 2000;
export const DEFAULT_MAX_ENTRIES = 3;
export const DEFAULT_EXCERPT_CHARS = 300;
export const BLOCK_SEPARATOR = "\n\n";

export type AssembleOptions = {
  charBudget?: number;
  maxEntries?: number;
  excerptChars?: number;
};

export function trimExcerpt(content: string, maxChars: number): string {
  const flat = content.replace(/\s+/g, " ").trim();
  if (flat.length <= maxChars) return flat;
  return `${flat.slice(0, Math.max(0, maxChars - 3)).trimEnd()}...`;
}

export function serializeInvoice(inv: CanonicalInvoice, excerptChars = DEFAULT_EXCERPT_CHARS): string {
  const total = `${inv.total.toFixed(2)}${inv.currency ? ` ${inv.currency}` : ""}`;
  const header = `[${inv.invoice_id}] vendor: ${inv.vendor ?? "N/A"} | date: ${inv.invoice_date ?? "N/A"} | total: ${total}`;
  return `${header}\nexcerpt: ${trimExcerpt(inv.content, excerptChars)}`;
}

/**
 * Pack ranked candidates into a context of at most `charBudget` characters.
 * Blocks go in whole or not at all, and packing stops at the first block
 * that does not fit.
 */
export function assembleContext(
  candidates: readonly RetrievalCandidate[],
  options: AssembleOptions = {}
): GroundingContext {
  const charBudget = options.charBudget ?? DEFAULT_CHAR_BUDGET;
  const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
  const excerptChars = options.excerptChars ?? DEFAULT_EXCERPT_CHARS;

  const entries: ContextEntry[] = [];
  let used = 0;
  let stopAt = candidates.length;

  for (let i = 0; i < candidates.length; i++) {
    if (entries.length >= maxEntries) {
      stopAt = i;
      break;
    }
    const invoice = candidates[i].invoice;
    const block = serializeInvoice(invoice, excerptChars);
    const cost = block.length + (entries.length > 0 ? BLOCK_SEPARATOR.length : 0);
    if (used + cost > charBudget) {
      stopAt = i;
      break;
    }
    entries.push({ invoice, block });
    used += cost;
  }

  const droppedIds = candidates.slice(stopAt).map((c) => c.invoice.invoice_id);

  if (entries.length === 0) return { kind: "empty", charBudget, droppedIds };

  return {
    kind: "grounded",
    charBudget,
    entries,
    text: entries.map((e) => e.block).join(BLOCK_SEPARATOR),
    droppedIds,
  };
}

export function contextInvoiceIds(context: GroundingContext): string[] {
  return context.kind === "grounded" ? context.entries.map((e) => e.invoice.invoice_id) : [];
}
