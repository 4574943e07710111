/**
 * Generation collaborator contract.
 *
 * Implementations turn an ordered message list into answer text. They
 * report transient trouble (network, timeouts, throttling, 5xx) as
 * GenerationUnavailableError and leave a caller-initiated abort as is.
 */

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type GenerationRequest = {
  messages: ChatMessage[];
  maxOutputTokens: number;
  temperature?: number;
};

export type GenerationResponse = {
  text: string;
  /** Invoice ids the model returned as structured output, when it supports that. */
  citedInvoiceIds?: string[];
};

export interface GenerationClient {
  readonly name: string;
  complete(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResponse>;
}

export type DeadlineSignal = {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
};

/** An AbortSignal that fires on the caller's abort or after `timeoutMs`. */
export function deadlineSignal(timeoutMs: number, parent?: AbortSignal): DeadlineSignal {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) onParentAbort();
  else parent?.addEventListener("abort", onParentAbort, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
