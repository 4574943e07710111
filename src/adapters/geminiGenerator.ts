import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { APICallError, RetryError, generateText, type CoreMessage } from "ai";
import { ConfigError, GenerationUnavailableError, InvoiceQaError, errorMessage } from "../utils/errors.js";
import {
  deadlineSignal,
  type ChatMessage,
  type GenerationClient,
  type GenerationRequest,
  type GenerationResponse,
} from "./generation.js";

export type GeminiGeneratorOptions = {
  /** Defaults to the `GEMINI_API_KEY` environment variable. */
  apiKey?: string;
  /** Default "gemini-2.5-flash". */
  model?: string;
  timeoutMs?: number;
};

function toCoreMessages(messages: readonly ChatMessage[]): CoreMessage[] {
  const out: CoreMessage[] = [];
  for (const m of messages) {
    if (m.role === "assistant") out.push({ role: "assistant", content: m.content });
    else if (m.role === "user") out.push({ role: "user", content: m.content });
  }
  return out;
}

/** Generation through the Vercel AI SDK and Google's Gemini models. */
export class GeminiGenerator implements GenerationClient {
  readonly name = "gemini";
  private google: ReturnType<typeof createGoogleGenerativeAI>;
  private model: string;
  private timeoutMs: number;

  constructor(options: GeminiGeneratorOptions = {}) {
    const apiKey = options.apiKey || process.env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new ConfigError("GEMINI_API_KEY is required. Set it in your environment or pass it to the constructor.");
    }

    this.google = createGoogleGenerativeAI({ apiKey });
    this.model = options.model || "gemini-2.5-flash";
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async complete(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResponse> {
    const system = request.messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");

    const deadline = deadlineSignal(this.timeoutMs, signal);
    try {
      const { text } = await generateText({
        model: this.google(this.model),
        system: system || undefined,
        messages: toCoreMessages(request.messages),
        maxTokens: request.maxOutputTokens,
        temperature: request.temperature ?? 0.3,
        abortSignal: deadline.signal,
        maxRetries: 0,
      });
      return { text };
    } catch (err) {
      if (signal?.aborted) throw err;
      if (deadline.timedOut()) {
        throw new GenerationUnavailableError(`gemini timed out after ${this.timeoutMs}ms`, err);
      }
      if (RetryError.isInstance(err)) {
        throw new GenerationUnavailableError(`gemini unavailable: ${err.message}`, err);
      }
      if (APICallError.isInstance(err)) {
        if (err.isRetryable) throw new GenerationUnavailableError(`gemini HTTP ${err.statusCode ?? "?"}: ${err.message}`, err);
        throw new InvoiceQaError(`gemini rejected the request: ${err.message}`, "GENERATION_REJECTED", { cause: err });
      }
      throw new GenerationUnavailableError(`gemini request failed: ${errorMessage(err)}`, err);
    } finally {
      deadline.dispose();
    }
  }
}
