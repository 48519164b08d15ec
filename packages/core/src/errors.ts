/**
 * Error Taxonomy
 * Structured errors shared by synthesis, aggregation and decomposition
 */

/**
 * Base error class for all forecast synthesis errors
 */
export class ForecastError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "ForecastError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends ForecastError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Malformed or out-of-bound input (percentiles, bounds, sub-question sets)
 */
export class ValidationError extends ForecastError {
  public readonly field?: string;
  public readonly expected?: string;
  public readonly received?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      expected?: string;
      received?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
    this.expected = options?.expected;
    this.received = options?.received;
  }
}

/**
 * A unit of work exceeded its allotted time
 */
export class TimeoutError extends ForecastError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, context?: Record<string, unknown>) {
    super(message, "TIMEOUT", { context: { ...context, timeoutMs }, retryable: true });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Work abandoned because the caller cancelled it
 */
export class CancelledError extends ForecastError {
  constructor(message = "Operation cancelled", context?: Record<string, unknown>) {
    super(message, "CANCELLED", { context, retryable: false });
    this.name = "CancelledError";
  }
}

/**
 * No usable signal: every contributing result failed or timed out
 */
export class AggregationError extends ForecastError {
  public readonly failedIds: string[];

  constructor(message: string, failedIds: string[], context?: Record<string, unknown>) {
    super(message, "AGGREGATION_ERROR", {
      context: { ...context, failedIds },
      retryable: false,
    });
    this.name = "AggregationError";
    this.failedIds = failedIds;
  }
}

/**
 * A decomposition step was requested at or beyond the depth limit
 */
export class RecursionLimitExceededError extends ForecastError {
  public readonly currentDepth: number;
  public readonly maxDepth: number;

  constructor(currentDepth: number, maxDepth: number, context?: Record<string, unknown>) {
    super(
      `Recursion limit exceeded: depth ${currentDepth} reached max depth ${maxDepth}`,
      "RECURSION_LIMIT_EXCEEDED",
      { context: { ...context, currentDepth, maxDepth }, retryable: false }
    );
    this.name = "RecursionLimitExceededError";
    this.currentDepth = currentDepth;
    this.maxDepth = maxDepth;
  }
}

/**
 * Internal numerical failure during synthesis.
 * Recovered locally by a degraded fallback, never surfaced to callers.
 */
export class NumericalError extends ForecastError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "NUMERICAL_ERROR", { context, retryable: false });
    this.name = "NumericalError";
  }
}

/**
 * Network/connectivity errors raised by external collaborators
 */
export class NetworkError extends ForecastError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", { cause, retryable: true });
    this.name = "NetworkError";
  }
}

/**
 * Type guard to check if error is a ForecastError
 */
export function isForecastError(error: unknown): error is ForecastError {
  return error instanceof ForecastError;
}

/**
 * Type guard for retryable errors
 */
export function isRetryableError(error: unknown): boolean {
  if (isForecastError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("rate limit") ||
      message.includes("overloaded") ||
      message.includes("503")
    );
  }

  return false;
}

/**
 * Wrap an unknown error into a ForecastError
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): ForecastError {
  if (isForecastError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ForecastError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new ForecastError(
    typeof error === "string" ? error : defaultMessage,
    "UNKNOWN_ERROR"
  );
}
