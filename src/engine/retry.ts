import { setTimeout as sleep } from "node:timers/promises";
import { InvoiceQaError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export type RetryOptions = {
  retries?: number;
  backoffMs?: number;
  shouldRetry?: (err: unknown) => boolean;
  signal?: AbortSignal;
  logger?: Logger;
  label?: string;
};

export function isTransient(err: unknown): boolean {
  return err instanceof InvoiceQaError && err.retryable;
}

/** Run `fn`, retrying transient failures with linear backoff. */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const retries = options.retries ?? 1;
  const backoffMs = options.backoffMs ?? 500;
  const shouldRetry = options.shouldRetry ?? isTransient;
  const logger = options.logger ?? silentLogger;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= retries || !shouldRetry(err) || options.signal?.aborted) throw err;
      const wait = backoffMs * (attempt + 1);
      logger.warn(`${options.label ?? "operation"} failed, retrying`, {
        attempt: attempt + 1,
        waitMs: wait,
        error: err instanceof Error ? err.message : String(err),
      });
      await sleep(wait, undefined, { signal: options.signal });
    }
  }
}
