/**
 * Engine Types
 * Data model shared by synthesis, aggregation and decomposition
 */

import type { DistributionBoundsInput } from "./schemas.js";

// ============================================
// DISTRIBUTIONS
// ============================================

/**
 * "The true value has cumulative probability `percentile` of being at most `value`"
 */
export interface PercentileEstimate {
  /** Cumulative probability, strictly between 0 and 1 */
  percentile: number;
  value: number;
}

/**
 * Range and resolution metadata for one question. Frozen once created.
 */
export interface DistributionBounds {
  readonly lower: number | null;
  readonly upper: number | null;
  readonly lowerOpen: boolean;
  readonly upperOpen: boolean;
  readonly logScale: boolean;
  /** Number of CDF points the submission format requires */
  readonly outcomeCount: number;
}

/**
 * Fixed-length cumulative distribution. Never mutated after construction.
 */
export interface ContinuousCdf {
  readonly values: readonly number[];
  readonly outcomeCount: number;
  /** Minimum difference enforced between consecutive values */
  readonly minGap: number;
  /** True when produced by the uniform fallback instead of the estimates */
  readonly degraded: boolean;
}

/**
 * Policy constants for CDF construction
 */
export interface CdfPolicy {
  /** Minimum gap as a fraction of 1 / (outcomeCount - 1) */
  minGapFraction: number;
  /** Overshoot past an open bound, as a fraction of the domain width */
  tailOvershootFraction: number;
  /** Lowest allowed first value */
  endpointFloor: number;
  /** Highest allowed last value */
  endpointCeiling: number;
  /** Largest mass in one step, stated for 200 steps and scaled to the actual count */
  maxStepFraction: number;
}

/**
 * One weighted scenario in a mixture
 */
export interface MixtureScenario {
  name: string;
  weight: number;
  estimates: PercentileEstimate[];
}

// ============================================
// FORECAST VALUES
// ============================================

export type ForecastKind = "binary" | "numeric" | "categorical";

export interface BinaryValue {
  kind: "binary";
  probability: number;
  degraded?: boolean;
}

export interface NumericValue {
  kind: "numeric";
  cdf: ContinuousCdf;
}

export interface CategoricalValue {
  kind: "categorical";
  probabilities: Readonly<Record<string, number>>;
  degraded?: boolean;
}

/**
 * What a sub-forecast produces, tagged by question kind
 */
export type ForecastValue = BinaryValue | NumericValue | CategoricalValue;

// ============================================
// DECOMPOSITION
// ============================================

/**
 * A sub-question as proposed by the agent, before the coordinator owns it
 */
export interface SubQuestionInput {
  id: string;
  kind: ForecastKind;
  title?: string;
  /** Validated and frozen by the coordinator; outcomeCount defaults to the engine's */
  bounds?: DistributionBoundsInput | null;
  /** Relative weight in the aggregate; unset means equal weighting */
  weight?: number;
}

/**
 * One decomposition unit, stamped with the depth it runs at
 */
export interface SubQuestion {
  readonly id: string;
  readonly kind: ForecastKind;
  readonly title?: string;
  readonly bounds: DistributionBounds | null;
  readonly weight?: number;
  readonly depth: number;
}

export interface DecompositionRequest {
  questionId: string;
  subQuestions: SubQuestionInput[];
}

export type PartialResultStatus = "ok" | "timed_out" | "failed";

export type ErrorKind =
  | "timeout"
  | "execution"
  | "cancelled"
  | "validation"
  | "recursion_limit";

export interface PartialResultError {
  kind: ErrorKind;
  message: string;
  code?: string;
}

/**
 * Outcome of one sub-question attempt. Frozen once produced.
 */
export interface PartialResult {
  readonly subQuestionId: string;
  readonly status: PartialResultStatus;
  readonly value: ForecastValue | null;
  readonly error: PartialResultError | null;
  readonly weight?: number;
  readonly durationMs: number;
}

// ============================================
// AGGREGATION
// ============================================

export type BinaryAggregationMethod = "weighted_average" | "geometric_mean" | "median";

export interface AggregationMeta {
  /** Ids of the ok results that contributed */
  contributing: string[];
  /** Ids left out, with the reason */
  excluded: Array<{ subQuestionId: string; status: Exclude<PartialResultStatus, "ok"> }>;
  /** Normalized weights by contributing id */
  weights: Record<string, number>;
  equalWeighting: boolean;
}

export type AggregateForecast =
  | (BinaryValue & { degraded: boolean; method: BinaryAggregationMethod; meta: AggregationMeta })
  | (NumericValue & { degraded: boolean; meta: AggregationMeta })
  | (CategoricalValue & { degraded: boolean; meta: AggregationMeta });
