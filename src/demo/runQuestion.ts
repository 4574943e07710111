import path from "node:path";
import { fileURLToPath } from "node:url";
import { readInvoicesJsonl } from "../adapters/invoiceJsonl.js";
import { createGenerator } from "../admin/commands.js";
import { formatAnswer, formatUpsertReport, RULE } from "../admin/format.js";
import { upsertInvoices } from "../db/invoiceIndex.js";
import { ensureSchema } from "../db/searchIndex.js";
import { openDb } from "../db/sqlite.js";
import { askQuestion } from "../engine/askPipeline.js";
import { getArg } from "../utils/args.js";
import { loadConfig } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";

const here = path.dirname(fileURLToPath(import.meta.url));
const file = getArg("file", path.join(here, "../../data/sample-invoices.jsonl")) ?? "";
const question = getArg("question", "What's the total amount for invoice INV-2025-0001?") ?? "";

(async () => {
  const config = loadConfig();
  const logger = createLogger("demo");
  const db = openDb(":memory:");

  try {
    const { invoices, errors } = readInvoicesJsonl(file);
    for (const e of errors) logger.warn(`skipping line ${e.line}`, { reason: e.reason });

    ensureSchema(db, "demo");
    console.log(formatUpsertReport(upsertInvoices(db, "demo", invoices)));

    const { answer, candidates } = await askQuestion(question, {
      db,
      indexName: "demo",
      topK: config.TOP_K,
      context: { charBudget: config.CONTEXT_CHAR_BUDGET },
      generator: createGenerator(config),
      maxOutputTokens: config.MAX_OUTPUT_TOKENS,
      groundingPolicy: config.GROUNDING_POLICY,
      logger,
    });

    console.log(`\n${RULE}\nQuestion: ${question}`);
    console.log(`Retrieved: ${candidates.map((c) => c.invoice.invoice_id).join(", ") || "(none)"}`);
    console.log(`${RULE}\n${formatAnswer(answer)}\n${RULE}`);
  } finally {
    db.close();
  }
})().catch((e) => {
  console.error(e);
  process.exit(1);
});
