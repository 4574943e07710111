import { setTimeout as sleep } from "node:timers/promises";
import { silentLogger, type Logger } from "../utils/logger.js";
import { withRetry } from "./retry.js";

export type RateLimitConfig = {
  /** Tasks allowed in flight at once. */
  maxConcurrent: number;
  /** Minimum gap between two task starts. */
  delayMs: number;
  /** Retries for transient failures. */
  retries: number;
  backoffMs: number;
};

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  maxConcurrent: 2,
  delayMs: 250,
  retries: 1,
  backoffMs: 1000,
};

export class RateLimiter {
  private readonly config: RateLimitConfig;
  private readonly logger: Logger;
  private active = 0;
  private waiting: Array<() => void> = [];
  private nextStartAt = 0;

  constructor(config: Partial<RateLimitConfig> = {}, logger: Logger = silentLogger) {
    this.config = { ...DEFAULT_RATE_LIMIT, ...config };
    this.config.maxConcurrent = Math.max(1, Math.trunc(this.config.maxConcurrent));
    this.logger = logger;
  }

  async execute<T>(task: () => Promise<T>, label: string): Promise<T> {
    await this.acquire();
    try {
      return await withRetry(
        async () => {
          await this.spaceOut();
          return task();
        },
        { retries: this.config.retries, backoffMs: this.config.backoffMs, logger: this.logger, label }
      );
    } finally {
      this.release();
    }
  }

  private async spaceOut() {
    const now = Date.now();
    const startAt = Math.max(now, this.nextStartAt);
    this.nextStartAt = startAt + this.config.delayMs;
    if (startAt > now) await sleep(startAt - now);
  }

  private acquire(): Promise<void> {
    if (this.active < this.config.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release() {
    this.active--;
    this.waiting.shift()?.();
  }
}
