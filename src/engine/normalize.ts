import type { CanonicalInvoice, ExtractedField, RawExtractionResult } from "../types/invoice.js";
import { ExtractionIncompleteError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { toIsoDate } from "./dates.js";

export const INVOICE_ID_PATTERN = /^INV-\d{4}-\d{4}$/;
export const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;

// Priority order matters: the first usable label wins.
export const FIELD_LABELS = {
  invoice_id: ["InvoiceId", "InvoiceNumber", "InvoiceNo"],
  vendor: ["VendorName", "Vendor", "SupplierName", "VendorAddressRecipient"],
  invoice_date: ["InvoiceDate", "IssueDate", "Date"],
  due_date: ["DueDate", "PaymentDueDate"],
  subtotal: ["SubTotal", "Subtotal", "AmountExclTax", "NetAmount"],
  tax: ["TotalTax", "Tax", "VatAmount"],
  shipping: ["ShippingCost", "Shipping", "Freight"],
  total: ["InvoiceTotal", "Total", "TotalAmount", "AmountDue"],
  currency: ["CurrencyCode", "Currency"],
} as const;

export type TargetField = keyof typeof FIELD_LABELS;

export type NormalizeOptions = {
  confidenceThreshold?: number;
  logger?: Logger;
};

type Amount = { amount: number; currency: string | null };

type Resolved<T> =
  | { ok: true; value: T; label: string }
  | { ok: false; reason: "is missing" | "is below the confidence threshold" | "could not be parsed" };

const CURRENCY_SYMBOLS: Record<string, string> = {
  $: "USD",
  "€": "EUR",
  "£": "GBP",
  "¥": "JPY",
};

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

function clean(s: string | null | undefined): string | null {
  const t = (s ?? "").replace(/\s+/g, " ").trim();
  return t === "" ? null : t;
}

function currencyCode(code: string | null | undefined, symbol?: string | null): string | null {
  const c = clean(code)?.toUpperCase() ?? null;
  if (c && /^[A-Z]{3}$/.test(c)) return c;
  const sym = clean(symbol);
  return sym ? CURRENCY_SYMBOLS[sym] ?? null : null;
}

export function parseAmountText(text: string | null | undefined): Amount | null {
  const s = clean(text);
  if (!s) return null;

  const code = s.match(/\b([A-Z]{3})\b/)?.[1] ?? null;
  const symbol = s.match(/[$€£¥]/)?.[0] ?? null;

  let digits = s.replace(/[^\d.,-]/g, "");
  const lastComma = digits.lastIndexOf(",");
  const lastDot = digits.lastIndexOf(".");
  if (lastComma !== -1 && lastDot !== -1) {
    digits = lastComma > lastDot
      ? digits.replace(/\./g, "").replace(",", ".")
      : digits.replace(/,/g, "");
  } else if (lastComma !== -1) {
    // a lone comma before 1-2 digits is a decimal comma; before 3 it groups thousands
    digits = /,\d{1,2}$/.test(digits) && digits.indexOf(",") === lastComma
      ? digits.replace(",", ".")
      : digits.replace(/,/g, "");
  }

  if (!/^-?\d+(\.\d+)?$/.test(digits)) return null;
  return { amount: Number(digits), currency: currencyCode(code, symbol) };
}

function readString(field: ExtractedField): string | null {
  if (field.type === "string") return clean(field.valueString) ?? clean(field.content);
  return clean(field.content);
}

function readDate(field: ExtractedField): string | null {
  if (field.type === "date") return toIsoDate(field.valueDate) ?? toIsoDate(clean(field.content));
  return toIsoDate(readString(field));
}

function readAmount(field: ExtractedField): Amount | null {
  switch (field.type) {
    case "currency": {
      const v = field.valueCurrency;
      if (v && Number.isFinite(v.amount)) {
        return { amount: v.amount, currency: currencyCode(v.currencyCode, v.currencySymbol) };
      }
      return parseAmountText(field.content);
    }
    case "number":
      if (typeof field.valueNumber === "number" && Number.isFinite(field.valueNumber)) {
        return { amount: field.valueNumber, currency: null };
      }
      return parseAmountText(field.content);
    default:
      return parseAmountText(readString(field));
  }
}

function resolve<T>(
  raw: RawExtractionResult,
  target: TargetField,
  read: (field: ExtractedField) => T | null,
  threshold: number,
  logger: Logger
): Resolved<T> {
  let reason: Exclude<Resolved<T>, { ok: true }>["reason"] = "is missing";

  for (const label of FIELD_LABELS[target]) {
    const field = raw.fields[label];
    if (!field) continue;

    if ((field.confidence ?? 1) < threshold) {
      reason = "is below the confidence threshold";
      continue;
    }

    const value = read(field);
    if (value === null) {
      if (reason === "is missing") reason = "could not be parsed";
      continue;
    }

    logger.debug(`${target} <- ${label}`, { type: field.type });
    return { ok: true, value, label };
  }

  return { ok: false, reason };
}

function optional<T>(r: Resolved<T>): T | null {
  return r.ok ? r.value : null;
}

function nonNegative(a: Amount | null, target: TargetField, logger: Logger): Amount | null {
  if (!a) return null;
  if (a.amount < 0) {
    logger.warn(`dropping negative ${target}`, { amount: a.amount });
    return null;
  }
  return a;
}

function money(amount: number, currency: string | null) {
  return `${currency ? `${currency} ` : ""}${amount.toFixed(2)}`;
}

export function buildContent(inv: Omit<CanonicalInvoice, "content" | "source_file">): string {
  const head = [`Invoice ${inv.invoice_id}`];
  if (inv.vendor) head.push(`from ${inv.vendor}`);
  if (inv.invoice_date) head.push(`dated ${inv.invoice_date}`);

  const parts = [`${head.join(" ")}.`];
  if (inv.due_date) parts.push(`Due ${inv.due_date}.`);
  if (inv.subtotal !== null) parts.push(`Subtotal: ${money(inv.subtotal, inv.currency)}.`);
  if (inv.tax !== null) parts.push(`Tax: ${money(inv.tax, inv.currency)}.`);
  if (inv.shipping !== null) parts.push(`Shipping: ${money(inv.shipping, inv.currency)}.`);
  parts.push(`Total: ${money(inv.total, inv.currency)}.`);
  return parts.join(" ");
}

/**
 * Turn one extraction result into a CanonicalInvoice.
 *
 * Throws ExtractionIncompleteError when the invoice id or total is missing,
 * unreadable or under the confidence threshold. Optional fields in the same
 * state become null.
 */
export function normalizeExtraction(
  raw: RawExtractionResult,
  sourceFile: string,
  options: NormalizeOptions = {}
): CanonicalInvoice {
  const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  const logger = options.logger ?? silentLogger;

  const id = resolve(raw, "invoice_id", readString, threshold, logger);
  if (!id.ok) throw new ExtractionIncompleteError(sourceFile, "invoice_id", id.reason);
  const invoiceId = id.value.replace(/\s+/g, "").toUpperCase();
  if (!INVOICE_ID_PATTERN.test(invoiceId)) {
    throw new ExtractionIncompleteError(sourceFile, "invoice_id", `"${id.value}" is not of the form INV-YYYY-NNNN`);
  }

  const total = resolve(raw, "total", readAmount, threshold, logger);
  if (!total.ok) throw new ExtractionIncompleteError(sourceFile, "total", total.reason);
  if (total.value.amount < 0) throw new ExtractionIncompleteError(sourceFile, "total", "is negative");

  const subtotal = nonNegative(optional(resolve(raw, "subtotal", readAmount, threshold, logger)), "subtotal", logger);
  const tax = nonNegative(optional(resolve(raw, "tax", readAmount, threshold, logger)), "tax", logger);
  const shipping = nonNegative(optional(resolve(raw, "shipping", readAmount, threshold, logger)), "shipping", logger);
  const currencyField = optional(resolve(raw, "currency", (f) => currencyCode(readString(f)), threshold, logger));

  const currency =
    total.value.currency ??
    subtotal?.currency ??
    tax?.currency ??
    shipping?.currency ??
    currencyField;

  const base = {
    invoice_id: invoiceId,
    vendor: optional(resolve(raw, "vendor", readString, threshold, logger)),
    invoice_date: optional(resolve(raw, "invoice_date", readDate, threshold, logger)),
    due_date: optional(resolve(raw, "due_date", readDate, threshold, logger)),
    currency,
    subtotal: subtotal ? round2(subtotal.amount) : null,
    tax: tax ? round2(tax.amount) : null,
    shipping: shipping ? round2(shipping.amount) : null,
    total: round2(total.value.amount),
  };

  return {
    ...base,
    content: buildContent(base),
    source_file: sourceFile,
  };
}

export type TotalsIssue = {
  invoice_id: string;
  expected: number;
  actual: number;
  difference: number;
};

export function checkTotals(invoice: CanonicalInvoice, tolerance = 0.01): TotalsIssue | null {
  if (invoice.subtotal === null) return null;
  const expected = round2(invoice.subtotal + (invoice.tax ?? 0) + (invoice.shipping ?? 0));
  const difference = round2(invoice.total - expected);
  if (Math.abs(difference) <= tolerance) return null;
  return { invoice_id: invoice.invoice_id, expected, actual: invoice.total, difference };
}
