import { CircuitOpenError } from "../utils/errors.js";
import { childLogger } from "../utils/logger.js";
import type { CircuitState, LLMRateLimitConfig } from "./llmTypes.js";

const log = childLogger("LLMRateLimiter");

interface QueuedTask {
  start: () => Promise<void>;
}

/**
 * Gatekeeper for every outbound model call: bounded concurrency, a sliding
 * requests-per-minute window, per-attempt timeout, exponential-backoff retry and a
 * consecutive-failure circuit breaker.
 *
 * The breaker opens after `circuitBreakerFailMax` calls fail in a row (a call fails
 * once its retries are exhausted). While open, calls are rejected with
 * `CircuitOpenError` without reaching the queue. After `circuitBreakerResetMs` one
 * trial call is let through; success closes the breaker, failure reopens it.
 */
export class LLMRateLimiter {
  private readonly config: LLMRateLimitConfig;
  private activeCount = 0;
  private readonly queue: QueuedTask[] = [];
  private readonly requestTimestamps: number[] = [];
  private waitTimer: ReturnType<typeof setTimeout> | null = null;

  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private trialInFlight = false;

  constructor(config: Partial<LLMRateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 30,
      timeoutMs: config.timeoutMs ?? 60_000,
      circuitBreakerFailMax: config.circuitBreakerFailMax ?? 5,
      circuitBreakerResetMs: config.circuitBreakerResetMs ?? 60_000
    };
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    if (!this.admit()) {
      const openedAt = this.openedAt ?? Date.now();
      return Promise.reject(
        new CircuitOpenError(openedAt + this.config.circuitBreakerResetMs - Date.now())
      );
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        start: () => this.executeTask(task).then(resolve, reject)
      });
      this.drainQueue();
    });
  }

  getCircuitState(): CircuitState {
    if (this.openedAt === null) {
      return "closed";
    }
    return Date.now() - this.openedAt >= this.config.circuitBreakerResetMs ? "half_open" : "open";
  }

  private admit(): boolean {
    const state = this.getCircuitState();
    if (state === "closed") {
      return true;
    }
    if (state === "open" || this.trialInFlight) {
      return false;
    }
    this.trialInFlight = true;
    return true;
  }

  private recordSuccess(): void {
    if (this.openedAt !== null) {
      log.info("LLM circuit breaker closed");
    }
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.trialInFlight = false;
  }

  private recordFailure(): void {
    this.trialInFlight = false;
    this.consecutiveFailures += 1;
    if (this.openedAt !== null || this.consecutiveFailures >= this.config.circuitBreakerFailMax) {
      this.openedAt = Date.now();
      log.warn(
        { consecutiveFailures: this.consecutiveFailures, resetMs: this.config.circuitBreakerResetMs },
        "LLM circuit breaker opened"
      );
    }
  }

  private drainQueue(): void {
    this.clearWaitTimer();
    this.pruneRequestWindow();

    while (this.activeCount < this.config.maxConcurrent && this.queue.length > 0) {
      const waitMs = this.getWaitMsForRateLimit();
      if (waitMs > 0) {
        this.waitTimer = setTimeout(() => {
          this.waitTimer = null;
          this.drainQueue();
        }, waitMs);
        return;
      }

      const item = this.queue.shift();
      if (!item) {
        return;
      }

      this.activeCount += 1;
      this.requestTimestamps.push(Date.now());
      void item.start().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async executeTask<T>(task: () => Promise<T>): Promise<T> {
    let attempt = 0;

    while (true) {
      try {
        const result = await this.withTimeout(task(), this.config.timeoutMs);
        this.recordSuccess();
        return result;
      } catch (error) {
        const shouldRetry = this.isRetryableError(error) && attempt < this.config.maxRetries;
        if (!shouldRetry) {
          this.recordFailure();
          throw error;
        }

        attempt += 1;
        const backoff = this.config.retryDelayMs * 2 ** (attempt - 1);
        await this.sleep(backoff);
      }
    }
  }

  private withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    if (timeoutMs <= 0) {
      return promise;
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`LLM request timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      promise
        .then((value) => {
          clearTimeout(timer);
          resolve(value);
        })
        .catch((error: unknown) => {
          clearTimeout(timer);
          reject(error);
        });
    });
  }

  private isRetryableError(error: unknown): boolean {
    if (!error || typeof error !== "object") {
      return false;
    }
    if ("status" in error && typeof error.status === "number") {
      return error.status === 429 || error.status >= 500;
    }
    if ("code" in error && typeof error.code === "string") {
      return ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED"].includes(error.code);
    }
    if (error instanceof Error) {
      return /timeout|timed out|temporarily unavailable/i.test(error.message);
    }
    return false;
  }

  private pruneRequestWindow(): void {
    const cutoff = Date.now() - 60_000;
    while (this.requestTimestamps.length > 0) {
      const first = this.requestTimestamps[0];
      if (first === undefined || first >= cutoff) {
        break;
      }
      this.requestTimestamps.shift();
    }
  }

  private getWaitMsForRateLimit(): number {
    if (this.requestTimestamps.length < this.config.requestsPerMinute) {
      return 0;
    }

    const firstInWindow = this.requestTimestamps[0];
    if (!firstInWindow) {
      return 0;
    }

    const elapsed = Date.now() - firstInWindow;
    return Math.max(0, 60_000 - elapsed);
  }

  private clearWaitTimer(): void {
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
