/**
 * Executor Types
 * Interface for rate-limited, retrying, cache-aware calls to external services
 */

// ============================================
// EXECUTOR INTERFACE
// ============================================

/**
 * Executor interface - what spawn callbacks use to reach the outside world
 */
export interface IExecutor<T = unknown> {
  /**
   * Run an operation under the executor's concurrency, timeout, retry and cache policy
   */
  execute(request: ExecutorRequest<T>): Promise<T>;

  /**
   * Cache and retry counters
   */
  stats(): ExecutorStats;
}

// ============================================
// REQUEST
// ============================================

export interface ExecutorRequest<T> {
  /** The external call; must honour the signal it is given */
  operation: (signal: AbortSignal) => Promise<T>;

  /** Cache key; identical keys share one call while it runs and its result once it succeeds */
  key?: string;

  /** Caller cancellation */
  signal?: AbortSignal;

  /** Per-attempt timeout, overriding the executor default */
  timeoutMs?: number;
}

export interface ExecutorStats {
  calls: number;
  cacheHits: number;
  retries: number;
  failures: number;
}

// ============================================
// EXECUTOR OPTIONS
// ============================================

/**
 * Options for creating an executor
 */
export interface ExecutorOptions {
  /** Calls in flight at once */
  maxConcurrent?: number;

  /** Default per-attempt timeout */
  timeoutMs?: number;

  /** Total attempts for retryable failures */
  retries?: number;
  backoffMs?: number;

  /** Disable the result cache */
  cache?: boolean;

  /** Cached keys kept before the oldest is dropped */
  maxCacheEntries?: number;
}
