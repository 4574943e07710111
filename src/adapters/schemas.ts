import { z } from "zod";
import type { CanonicalInvoice, RawExtractionResult } from "../types/invoice.js";

const confidence = z.number().min(0).max(1).nullish();
const content = z.string().nullish();

export const extractedFieldSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("string"), content, confidence, valueString: z.string().nullish() }),
  z.object({ type: z.literal("date"), content, confidence, valueDate: z.string().nullish() }),
  z.object({
    type: z.literal("currency"),
    content,
    confidence,
    valueCurrency: z
      .object({
        amount: z.number(),
        currencyCode: z.string().nullish(),
        currencySymbol: z.string().nullish(),
      })
      .nullish(),
  }),
  z.object({ type: z.literal("number"), content, confidence, valueNumber: z.number().nullish() }),
]);

// Extraction services return field types this system does not read (arrays, addresses, ...).
const anyField = z.object({ type: z.string() }).passthrough();

export const rawExtractionSchema = z.object({
  fields: z.record(z.union([extractedFieldSchema, anyField])),
});

export function parseRawExtraction(input: unknown): RawExtractionResult {
  const parsed = rawExtractionSchema.parse(input);
  const fields: RawExtractionResult["fields"] = {};
  for (const [label, field] of Object.entries(parsed.fields)) {
    const known = extractedFieldSchema.safeParse(field);
    if (known.success) fields[label] = known.data;
  }
  return { fields };
}

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");
const amount = z.number().finite().nonnegative();

export const canonicalInvoiceSchema = z
  .object({
    invoice_id: z.string().regex(/^INV-\d{4}-\d{4}$/, "expected INV-YYYY-NNNN"),
    vendor: z.string().nullable(),
    invoice_date: isoDate.nullable(),
    due_date: isoDate.nullable(),
    currency: z.string().regex(/^[A-Z]{3}$/, "expected a 3-letter currency code").nullable(),
    subtotal: amount.nullable(),
    tax: amount.nullable(),
    shipping: amount.nullable(),
    total: amount,
    content: z.string().min(1),
    source_file: z.string(),
  })
  .strict();

export function formatZodError(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

export function parseCanonicalInvoice(
  input: unknown
): { ok: true; invoice: CanonicalInvoice } | { ok: false; reason: string } {
  const parsed = canonicalInvoiceSchema.safeParse(input);
  if (!parsed.success) return { ok: false, reason: formatZodError(parsed.error) };
  const v = parsed.data;
  // rebuild in declared key order so serialization stays stable
  return {
    ok: true,
    invoice: {
      invoice_id: v.invoice_id,
      vendor: v.vendor,
      invoice_date: v.invoice_date,
      due_date: v.due_date,
      currency: v.currency,
      subtotal: v.subtotal,
      tax: v.tax,
      shipping: v.shipping,
      total: v.total,
      content: v.content,
      source_file: v.source_file,
    },
  };
}
