/**
 * Chat-completions client for OpenAI-compatible endpoints and Azure OpenAI.
 *
 * Newer model families reject `max_tokens` and want `max_completion_tokens`
 * (and some older deployments the reverse). The client switches to the name
 * the service asks for, retries once, and keeps using it afterwards.
 */

import { z } from "zod";
import {
  GenerationUnavailableError,
  InvoiceQaError,
  UnsupportedGenerationParameterError,
  errorMessage,
} from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import {
  deadlineSignal,
  type GenerationClient,
  type GenerationRequest,
  type GenerationResponse,
} from "./generation.js";

const logger = createLogger("chat-completions");

export type TokenParameter = "max_tokens" | "max_completion_tokens";

export type ChatCompletionsConfig = {
  flavor: "openai" | "azure";
  /** Base URL: `https://api.openai.com/v1` style for openai, the resource endpoint for azure. */
  endpoint: string;
  apiKey: string;
  /** Model name (openai) or deployment name (azure). */
  model: string;
  apiVersion?: string;
  tokenParameter?: TokenParameter;
  timeoutMs?: number;
};

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }),
      })
    )
    .min(1),
});

const errorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    param: z.string().nullish(),
    code: z.string().nullish(),
  }),
});

function isTokenParameter(v: string | null): v is TokenParameter {
  return v === "max_tokens" || v === "max_completion_tokens";
}

function otherTokenParameter(p: TokenParameter): TokenParameter {
  return p === "max_tokens" ? "max_completion_tokens" : "max_tokens";
}

export function parseUnsupportedParameter(body: string): { parameter: string; replacement: string | null } | null {
  let message = body;
  let param: string | null = null;

  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(body));
    if (parsed.success) {
      message = parsed.data.error.message ?? body;
      param = parsed.data.error.param ?? null;
    }
  } catch {
    // not JSON; fall back to matching the raw text
  }

  const unsupported = message.match(/Unsupported parameter:\s*'([\w.]+)'/i);
  if (!unsupported) return null;

  const replacement = message.match(/Use\s+'([\w.]+)'\s+instead/i)?.[1] ?? null;
  return { parameter: param ?? unsupported[1], replacement };
}

export class ChatCompletionsClient implements GenerationClient {
  readonly name: string;
  private readonly config: Required<Omit<ChatCompletionsConfig, "tokenParameter">>;
  private tokenParameter: TokenParameter;

  constructor(config: ChatCompletionsConfig) {
    this.name = config.flavor === "azure" ? "azure-openai" : "openai";
    this.config = {
      flavor: config.flavor,
      endpoint: config.endpoint.replace(/\/+$/, ""),
      apiKey: config.apiKey,
      model: config.model,
      apiVersion: config.apiVersion ?? "2024-08-01-preview",
      timeoutMs: config.timeoutMs ?? 30_000,
    };
    this.tokenParameter = config.tokenParameter ?? "max_completion_tokens";
  }

  get currentTokenParameter(): TokenParameter {
    return this.tokenParameter;
  }

  async complete(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResponse> {
    try {
      return await this.send(request, signal);
    } catch (err) {
      if (!(err instanceof UnsupportedGenerationParameterError) || err.parameter !== this.tokenParameter) throw err;

      const next = isTokenParameter(err.replacement) ? err.replacement : otherTokenParameter(this.tokenParameter);
      logger.warn("length parameter rejected, retrying", { rejected: err.parameter, using: next });
      this.tokenParameter = next;
      return this.send(request, signal);
    }
  }

  private url(): string {
    const { flavor, endpoint, model, apiVersion } = this.config;
    if (flavor === "azure") {
      return `${endpoint}/openai/deployments/${encodeURIComponent(model)}/chat/completions?api-version=${encodeURIComponent(apiVersion)}`;
    }
    return `${endpoint}/chat/completions`;
  }

  private headers(): Record<string, string> {
    if (this.config.flavor === "azure") {
      return { "Content-Type": "application/json", "api-key": this.config.apiKey };
    }
    return { "Content-Type": "application/json", Authorization: `Bearer ${this.config.apiKey}` };
  }

  private async send(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResponse> {
    const body: Record<string, unknown> = {
      messages: request.messages,
      temperature: request.temperature ?? 0.3,
      [this.tokenParameter]: request.maxOutputTokens,
    };
    if (this.config.flavor === "openai") body.model = this.config.model;

    const { status, text } = await this.post(JSON.stringify(body), signal);

    if (status < 200 || status >= 300) {
      if (status === 400) {
        const unsupported = parseUnsupportedParameter(text);
        if (unsupported) throw new UnsupportedGenerationParameterError(unsupported.parameter, unsupported.replacement);
      }
      if (status === 408 || status === 429 || status >= 500) {
        throw new GenerationUnavailableError(`${this.name} HTTP ${status}: ${text.slice(0, 300)}`);
      }
      throw new InvoiceQaError(`${this.name} HTTP ${status}: ${text.slice(0, 300)}`, "GENERATION_REJECTED");
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new GenerationUnavailableError(`${this.name} returned a non-JSON response: ${text.slice(0, 120)}`, err);
    }

    const parsed = completionSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvoiceQaError(`${this.name} returned an unexpected response shape`, "GENERATION_REJECTED");
    }
    return { text: parsed.data.choices[0].message.content ?? "" };
  }

  /** POST and read the whole body; the timeout covers both. */
  private async post(body: string, signal?: AbortSignal): Promise<{ status: number; text: string }> {
    const deadline = deadlineSignal(this.config.timeoutMs, signal);
    try {
      const response = await fetch(this.url(), {
        method: "POST",
        headers: this.headers(),
        body,
        signal: deadline.signal,
      });
      return { status: response.status, text: await response.text() };
    } catch (err) {
      if (signal?.aborted) throw err;
      if (deadline.timedOut()) {
        throw new GenerationUnavailableError(`${this.name} timed out after ${this.config.timeoutMs}ms`, err);
      }
      throw new GenerationUnavailableError(`${this.name} request failed: ${errorMessage(err)}`, err);
    } finally {
      deadline.dispose();
    }
  }
}
