import fs from "node:fs";
import path from "node:path";
import type { CanonicalInvoice } from "../types/invoice.js";
import { errorMessage } from "../utils/errors.js";
import { parseCanonicalInvoice } from "./schemas.js";

export type JsonlLineError = {
  line: number;
  reason: string;
};

export type JsonlReadResult = {
  invoices: CanonicalInvoice[];
  errors: JsonlLineError[];
};

export function toJsonl(invoices: readonly CanonicalInvoice[]): string {
  return invoices.map((inv) => `${JSON.stringify(inv)}\n`).join("");
}

export function parseJsonl(text: string): JsonlReadResult {
  const result: JsonlReadResult = { invoices: [], errors: [] };

  text.split(/\r?\n/).forEach((raw, i) => {
    if (raw.trim() === "") return;
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (e) {
      result.errors.push({ line: i + 1, reason: `invalid JSON: ${errorMessage(e)}` });
      return;
    }
    const parsed = parseCanonicalInvoice(value);
    if (parsed.ok) result.invoices.push(parsed.invoice);
    else result.errors.push({ line: i + 1, reason: parsed.reason });
  });

  return result;
}

export function writeInvoicesJsonl(filePath: string, invoices: readonly CanonicalInvoice[]) {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, toJsonl(invoices), "utf-8");
}

export function readInvoicesJsonl(filePath: string): JsonlReadResult {
  return parseJsonl(fs.readFileSync(filePath, "utf-8"));
}
