import fs from "node:fs";
import path from "node:path";

export type SourceDocument = {
  fileName: string;
  path: string;
};

/**
 * PDF files in `dir`, sorted by name. `limit` > 0 keeps only the first
 * `limit` files; 0 keeps all of them.
 */
export function loadDocuments(dir: string, limit = 0): SourceDocument[] {
  if (!fs.existsSync(dir)) throw new Error(`Invoices folder not found: ${dir}`);

  const files = fs
    .readdirSync(dir)
    .filter((f) => f.toLowerCase().endsWith(".pdf"))
    .sort();

  const selected = limit > 0 ? files.slice(0, limit) : files;
  return selected.map((fileName) => ({ fileName, path: path.join(dir, fileName) }));
}
