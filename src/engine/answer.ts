import type { ChatMessage, GenerationClient, GenerationResponse } from "../adapters/generation.js";
import type { Citation, CitedAnswer, GroundingContext } from "../types/invoice.js";
import { GroundingViolationError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { extractInvoiceIds } from "./queryTerms.js";
import { withRetry } from "./retry.js";

export const NO_MATCHING_INVOICES_TEXT = "No matching invoices were found for that question.";
export const DEFAULT_MAX_OUTPUT_TOKENS = 800;

export const SYSTEM_INSTRUCTION = `You are an invoice assistant. Answer questions about invoices using only the invoices in the provided context.

Guidelines:
- Use only facts stated in the context. If the answer is not there, say you don't have that information.
- Name the invoice ID (format INV-YYYY-NNNN) of every invoice you rely on.
- Never mention an invoice ID that is not in the context.
- Be concise and format numbers and dates clearly.
- When asked to show or list invoices, include every invoice from the context.`;

/**
 * What to do when the model cites an invoice that is not in the context.
 * - reject: ask again once with a stricter instruction, then throw GroundingViolationError
 * - strip: drop the unknown ids from the citations and report them in `ungroundedIds`
 */
export type GroundingPolicy = "reject" | "strip";

export type AnswerOptions = {
  generator: GenerationClient;
  maxOutputTokens?: number;
  temperature?: number;
  groundingPolicy?: GroundingPolicy;
  retries?: number;
  backoffMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
};

type Binding = { citations: Citation[]; ungroundedIds: string[] };

export function noMatchingInvoicesAnswer(): CitedAnswer {
  return { kind: "no_matching_invoices", text: NO_MATCHING_INVOICES_TEXT, citations: [], ungroundedIds: [] };
}

export function buildMessages(
  question: string,
  context: Extract<GroundingContext, { kind: "grounded" }>,
  rejectedIds: readonly string[] = []
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: "system", content: SYSTEM_INSTRUCTION }];

  if (rejectedIds.length > 0) {
    const allowed = context.entries.map((e) => e.invoice.invoice_id).join(", ");
    messages.push({
      role: "system",
      content:
        `Your previous answer referenced invoice IDs that are not in the context: ${rejectedIds.join(", ")}. ` +
        `Reference only these invoice IDs: ${allowed}.`,
    });
  }

  messages.push({
    role: "user",
    content: [
      "Context from invoice database:",
      context.text,
      "",
      `User question: ${question}`,
      "",
      "Please answer the question based on the invoice information provided above.",
    ].join("\n"),
  });

  return messages;
}

/** Invoice ids the response relies on: mentions in the text first, then structured ones. */
export function citedIds(response: GenerationResponse): string[] {
  const ids = new Set(extractInvoiceIds(response.text));
  for (const id of response.citedInvoiceIds ?? []) {
    for (const found of extractInvoiceIds(id)) ids.add(found);
  }
  return [...ids];
}

/** Citation values come from the invoice in context, never from the generated text. */
export function bindCitations(ids: readonly string[], context: Extract<GroundingContext, { kind: "grounded" }>): Binding {
  const byId = new Map(context.entries.map((e) => [e.invoice.invoice_id, e.invoice] as const));
  const citations: Citation[] = [];
  const ungroundedIds: string[] = [];

  for (const id of ids) {
    const inv = byId.get(id);
    if (!inv) {
      ungroundedIds.push(id);
      continue;
    }
    citations.push({
      invoice_id: inv.invoice_id,
      vendor: inv.vendor,
      date: inv.invoice_date,
      amount: inv.total,
      currency: inv.currency,
    });
  }

  return { citations, ungroundedIds };
}

export async function answerQuestion(
  question: string,
  context: GroundingContext,
  options: AnswerOptions
): Promise<CitedAnswer> {
  if (context.kind === "empty") return noMatchingInvoicesAnswer();

  const logger = options.logger ?? silentLogger;
  const policy = options.groundingPolicy ?? "reject";
  const { generator, signal } = options;

  const generate = (rejectedIds: readonly string[] = []) =>
    withRetry(
      () =>
        generator.complete(
          {
            messages: buildMessages(question, context, rejectedIds),
            maxOutputTokens: options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
            temperature: options.temperature,
          },
          signal
        ),
      {
        retries: options.retries ?? 1,
        backoffMs: options.backoffMs,
        signal,
        logger,
        label: `generation (${generator.name})`,
      }
    );

  let response = await generate();
  if (response.text.trim() === "") throw new GroundingViolationError("Generation returned an empty answer");

  let bound = bindCitations(citedIds(response), context);

  if (bound.ungroundedIds.length > 0 && policy === "reject") {
    logger.warn("answer cited invoices outside the context, asking again", { ids: bound.ungroundedIds });
    response = await generate(bound.ungroundedIds);
    if (response.text.trim() === "") throw new GroundingViolationError("Generation returned an empty answer");

    bound = bindCitations(citedIds(response), context);
    if (bound.ungroundedIds.length > 0) {
      throw new GroundingViolationError(
        `Answer cites invoices that were not retrieved: ${bound.ungroundedIds.join(", ")}`,
        bound.ungroundedIds
      );
    }
  } else if (bound.ungroundedIds.length > 0) {
    logger.warn("dropping citations outside the context", { ids: bound.ungroundedIds });
  }

  return {
    kind: "answered",
    text: response.text.trim(),
    citations: bound.citations,
    ungroundedIds: bound.ungroundedIds,
  };
}
