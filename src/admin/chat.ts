import readline from "node:readline/promises";
import type { CliArgs } from "../utils/args.js";
import { errorMessage, InvoiceQaError } from "../utils/errors.js";
import { createAsker, type CommandContext } from "./commands.js";
import { formatAnswer, RULE } from "./format.js";

const EXIT_WORDS = new Set(["quit", "exit", "bye"]);

/** Interactive session. Every question goes through the same path as `ask`. */
export async function runChat(ctx: CommandContext, args: CliArgs) {
  const { print } = ctx;
  const askQuestion = createAsker(ctx, args);
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  print(RULE);
  print("INVOICE CHAT");
  print(RULE);
  print("Ask about your invoices, for example:");
  print("  - What invoices do we have from Contoso?");
  print("  - Show me invoices from April 2025");
  print("  - What's the total amount for invoice INV-2025-0001?");
  print("Type 'quit' or 'exit' to end the conversation.\n");

  let inFlight: AbortController | null = null;
  rl.on("SIGINT", () => {
    if (inFlight) inFlight.abort(new Error("cancelled"));
    else rl.close();
  });

  try {
    for (;;) {
      let input: string;
      try {
        input = (await rl.question("You: ")).trim();
      } catch {
        // readline closed (Ctrl-C / Ctrl-D)
        break;
      }
      if (!input) continue;
      if (EXIT_WORDS.has(input.toLowerCase())) {
        print("\nGoodbye!");
        break;
      }

      inFlight = new AbortController();
      try {
        const result = await askQuestion(input, inFlight.signal);
        print(`\nAssistant: ${formatAnswer(result.answer)}\n`);
      } catch (e) {
        if (inFlight.signal.aborted) print("\n(cancelled)\n");
        else if (e instanceof InvoiceQaError) print(`\nError [${e.code}]: ${e.message}\n`);
        else print(`\nError: ${errorMessage(e)}\n`);
      } finally {
        inFlight = null;
      }
      print(`${"-".repeat(70)}\n`);
    }
  } finally {
    rl.close();
  }
}
