#!/usr/bin/env node
import { fileURLToPath } from "node:url";
import path from "node:path";

import { openDb } from "../db/sqlite.js";
import { getFlag, parseCliArgs } from "../utils/args.js";
import { loadConfig } from "../utils/config.js";
import { InvoiceQaError, errorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { runChat } from "./chat.js";
import {
  runAsk,
  runIndexes,
  runIndexFile,
  runIngest,
  runList,
  runReset,
  runSearch,
  type CommandContext,
} from "./commands.js";

const USAGE = `Usage: invoice-qa <command> [options]

Commands:
  ingest [--dir d] [--limit n] [--out file] [--sidecar]   extract, normalize and index PDFs
  index [--file f]                                        index a JSONL extraction file
  search <text> [--top n] [filters]                       ranked lexical search
  ask <question> [--top n] [filters]                      single grounded answer
  chat [filters]                                          interactive session
  list [--top n]                                          invoices ordered by id
  indexes                                                 indexes and document counts
  reset --yes [--index name]                              drop and recreate an index

Filters: --vendor v --from YYYY-MM-DD --to YYYY-MM-DD --month YYYY-MM --currency EUR --min n --max n
         --band "<1k" | 1k-10k | ">=10k"`;

export async function runCli(argv: string[]) {
  const args = parseCliArgs(argv);
  const cmd = String(args._[0] ?? "");

  if (!cmd || cmd === "help" || args.flags.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const db = openDb(getFlag(args, "db") ?? config.DB_PATH);
  const ctx: CommandContext = {
    db,
    config,
    logger: createLogger("invoice-qa"),
    print: (text) => console.log(text),
  };

  try {
    switch (cmd) {
      case "ingest":
        return await runIngest(ctx, args);
      case "index":
        return runIndexFile(ctx, args);
      case "search":
        return runSearch(ctx, args);
      case "ask":
        return await runAsk(ctx, args);
      case "chat":
        return await runChat(ctx, args);
      case "list":
        return runList(ctx, args);
      case "indexes":
        return runIndexes(ctx);
      case "reset":
        return runReset(ctx, args);
      default:
        throw new Error(`Unknown command: ${cmd}\n\n${USAGE}`);
    }
  } finally {
    db.close();
  }
}

const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url));

if (isEntry) {
  runCli(process.argv.slice(2)).catch((e) => {
    if (e instanceof InvoiceQaError) console.error(`[${e.code}] ${e.message}`);
    else console.error(errorMessage(e));
    process.exit(1);
  });
}
