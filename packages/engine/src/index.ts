/**
 * @forecast-synthesis/engine
 * Distribution synthesis, sub-forecast aggregation and bounded decomposition
 */

// Types
export type {
  PercentileEstimate,
  DistributionBounds,
  ContinuousCdf,
  CdfPolicy,
  MixtureScenario,
  ForecastKind,
  BinaryValue,
  NumericValue,
  CategoricalValue,
  ForecastValue,
  SubQuestionInput,
  SubQuestion,
  DecompositionRequest,
  PartialResultStatus,
  ErrorKind,
  PartialResultError,
  PartialResult,
  BinaryAggregationMethod,
  AggregationMeta,
  AggregateForecast,
} from "./types.js";

// Config
export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_CDF_POLICY,
  DEFAULT_OUTCOME_COUNT,
  resolveEngineConfig,
  loadEngineConfig,
  cdfPolicyFrom,
  type EngineConfig,
} from "./config.js";

// Schemas
export {
  ForecastValueSchema,
  DecompositionRequestSchema,
  PercentileEstimatesSchema,
  DistributionBoundsSchema,
  type DistributionBoundsInput,
} from "./schemas.js";

// Distribution
export * from "./distribution/index.js";

// Aggregation
export * from "./aggregation/index.js";

// Decomposition
export * from "./decomposition/index.js";

// Executor
export * from "./executor/index.js";

// Engine
export {
  ForecastEngine,
  type DecompositionForecast,
  type ForecastByDecompositionOptions,
} from "./engine.js";
