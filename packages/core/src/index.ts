/**
 * @forecast-synthesis/core
 * Logging, configuration and errors shared across the forecast synthesis packages
 */

// Config
export {
  loadBaseConfig,
  getBaseConfig,
  resetBaseConfig,
  requireEnv,
  getEnv,
  formatConfigIssues,
  type BaseConfig,
  type BaseEnv,
} from "./config.js";

// Logger
export {
  logger,
  type LogLevel,
  type LogFormat,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  ForecastError,
  ConfigError,
  ValidationError,
  TimeoutError,
  CancelledError,
  AggregationError,
  RecursionLimitExceededError,
  NumericalError,
  NetworkError,
  isForecastError,
  isRetryableError,
  wrapError,
} from "./errors.js";
