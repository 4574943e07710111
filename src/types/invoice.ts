export type ExtractedCurrency = {
  amount: number;
  currencyCode?: string | null;
  currencySymbol?: string | null;
};

type FieldBase = {
  content?: string | null;
  confidence?: number | null;
};

export type ExtractedField =
  | (FieldBase & { type: "string"; valueString?: string | null })
  | (FieldBase & { type: "date"; valueDate?: string | null })
  | (FieldBase & { type: "currency"; valueCurrency?: ExtractedCurrency | null })
  | (FieldBase & { type: "number"; valueNumber?: number | null });

export type ExtractedFieldType = ExtractedField["type"];

export type RawExtractionResult = {
  fields: Record<string, ExtractedField>;
};

export type CanonicalInvoice = {
  invoice_id: string;
  vendor: string | null;
  invoice_date: string | null;
  due_date: string | null;
  currency: string | null;
  subtotal: number | null;
  tax: number | null;
  shipping: number | null;
  total: number;
  content: string;
  source_file: string;
};

export type AmountBand = "<1k" | "1k-10k" | ">=10k";

export type IndexedDocument = CanonicalInvoice & {
  invoice_month: string | null;
  amount_band: AmountBand;
  indexed_at: string;
};

export type UpsertFailure = {
  invoice_id: string;
  reason: string;
};

export type UpsertReport = {
  succeeded: string[];
  failed: UpsertFailure[];
};

export type SearchFilters = {
  dateFrom?: string;
  dateTo?: string;
  month?: string;
  vendor?: string;
  currency?: string;
  minTotal?: number;
  maxTotal?: number;
  amountBand?: AmountBand;
};

export type RetrievalCandidate = {
  invoice: CanonicalInvoice;
  score: number;
  matchedTerms: string[];
  exactIdMatch: boolean;
};

export type ContextEntry = {
  invoice: CanonicalInvoice;
  block: string;
};

export type GroundingContext =
  | { kind: "empty"; charBudget: number; droppedIds: string[] }
  | {
      kind: "grounded";
      charBudget: number;
      entries: ContextEntry[];
      text: string;
      droppedIds: string[];
    };

export type Citation = {
  invoice_id: string;
  vendor: string | null;
  date: string | null;
  amount: number;
  currency: string | null;
};

export type CitedAnswer = {
  kind: "answered" | "no_matching_invoices";
  text: string;
  citations: Citation[];
  ungroundedIds: string[];
};
