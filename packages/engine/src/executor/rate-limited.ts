/**
 * Rate-Limited Executor
 * Bounded concurrency, per-attempt timeout, exponential backoff and a result cache
 *
 * Calls with the same key share one pending promise, so a burst of identical
 * requests reaches the operation once. The first caller's signal governs that call.
 */

import {
  CancelledError,
  isRetryableError,
  logger,
  TimeoutError,
} from "@forecast-synthesis/core";
import { WorkerPool } from "../decomposition/worker-pool.js";
import type { ExecutorOptions, ExecutorRequest, ExecutorStats, IExecutor } from "./types.js";

const log = logger.child({ component: "executor" });

export class RateLimitedExecutor<T = unknown> implements IExecutor<T> {
  private readonly options: Required<ExecutorOptions>;
  private readonly pool: WorkerPool;
  // Insertion order doubles as age for eviction
  private readonly cache = new Map<string, Promise<T>>();
  private readonly counters: ExecutorStats = { calls: 0, cacheHits: 0, retries: 0, failures: 0 };

  constructor(options: ExecutorOptions = {}) {
    this.options = {
      maxConcurrent: options.maxConcurrent ?? 3,
      timeoutMs: options.timeoutMs ?? 30_000,
      retries: options.retries ?? 3,
      backoffMs: options.backoffMs ?? 1000,
      cache: options.cache ?? true,
      maxCacheEntries: options.maxCacheEntries ?? 1000,
    };
    this.pool = new WorkerPool(this.options.maxConcurrent);
  }

  /**
   * Execute an operation
   */
  async execute(request: ExecutorRequest<T>): Promise<T> {
    this.counters.calls++;
    const { key } = request;

    if (!this.options.cache || key === undefined) {
      return this.pool.run(() => this.executeWithRetry(request));
    }

    const hit = this.cache.get(key);
    if (hit) {
      this.counters.cacheHits++;
      log.debug("Cache hit", { key });
      return hit;
    }

    const pending = this.pool.run(() => this.executeWithRetry(request));
    this.remember(key, pending);
    // Failures are not cached
    pending.catch(() => {
      if (this.cache.get(key) === pending) {
        this.cache.delete(key);
      }
    });
    return pending;
  }

  stats(): ExecutorStats {
    return { ...this.counters };
  }

  clearCache(): void {
    this.cache.clear();
  }

  /** Keys currently cached or in flight */
  get cacheSize(): number {
    return this.cache.size;
  }

  private remember(key: string, pending: Promise<T>): void {
    this.cache.set(key, pending);
    for (const oldest of this.cache.keys()) {
      if (this.cache.size <= this.options.maxCacheEntries) break;
      this.cache.delete(oldest);
      log.debug("Cache entry evicted", { key: oldest });
    }
  }

  /**
   * Retry retryable failures with exponential backoff
   */
  private async executeWithRetry(request: ExecutorRequest<T>): Promise<T> {
    const { retries, backoffMs } = this.options;
    let lastError: unknown = new Error("Executor made no attempt");
    let attempt = 0;

    while (attempt < retries) {
      attempt++;
      throwIfAborted(request.signal);

      try {
        return await this.executeOnce(request);
      } catch (error) {
        lastError = error;

        if (request.signal?.aborted || !isRetryableError(error) || attempt >= retries) {
          break;
        }

        this.counters.retries++;
        const delay = backoffMs * Math.pow(2, attempt - 1);
        log.debug("Retrying after failure", {
          key: request.key,
          attempt,
          delayMs: delay,
          reason: error instanceof Error ? error.message : String(error),
        });
        await sleep(delay, request.signal);
      }
    }

    this.counters.failures++;
    throw lastError;
  }

  /**
   * Execute once (no retries), bounded by the timeout
   */
  private async executeOnce(request: ExecutorRequest<T>): Promise<T> {
    const timeoutMs = request.timeoutMs ?? this.options.timeoutMs;
    const controller = new AbortController();
    const parent = request.signal;
    const forwardAbort = () => controller.abort(parent?.reason);
    parent?.addEventListener("abort", forwardAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(`Operation exceeded ${timeoutMs}ms`, timeoutMs, {
          key: request.key,
        });
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      return await Promise.race([request.operation(controller.signal), timedOut]);
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener("abort", forwardAbort);
    }
  }
}

/**
 * Create a rate-limited executor with default options
 */
export function createRateLimitedExecutor<T = unknown>(options?: ExecutorOptions): IExecutor<T> {
  return new RateLimitedExecutor<T>(options);
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError("Execution cancelled by caller");
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError("Execution cancelled during backoff"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
