/**
 * Sub-Forecast Aggregator
 * Combines the ok results of a decomposition into one forecast of the parent's kind
 */

import {
  AggregationError,
  logger,
  NumericalError,
  ValidationError,
} from "@forecast-synthesis/core";
import { DEFAULT_CDF_POLICY } from "../config.js";
import {
  createContinuousCdf,
  maxStepFor,
  minGapFor,
  mixCdfValues,
  repairCdf,
  uniformCdf,
} from "../distribution/cdf.js";
import type {
  AggregateForecast,
  AggregationMeta,
  BinaryAggregationMethod,
  CdfPolicy,
  ContinuousCdf,
  ForecastKind,
  ForecastValue,
  PartialResult,
} from "../types.js";

const log = logger.child({ component: "aggregator" });

export interface AggregateOptions {
  /** Binary only */
  method?: BinaryAggregationMethod;
  /** Binary results are clamped into [probabilityFloor, probabilityCeiling] */
  probabilityFloor?: number;
  probabilityCeiling?: number;
  /** Numeric only: gap and step cap the combined CDF must meet */
  cdfPolicy?: Partial<CdfPolicy>;
  context?: Record<string, unknown>;
}

// Categorical sums must land within this of 1
const CATEGORICAL_TOLERANCE = 1e-6;

export const DEFAULT_PROBABILITY_FLOOR = 0.001;
export const DEFAULT_PROBABILITY_CEILING = 0.999;

interface Contribution<T> {
  id: string;
  value: T;
  weight: number;
  degraded: boolean;
}

/**
 * Aggregate partial results into a single forecast
 */
export function aggregate(
  results: readonly PartialResult[],
  kind: ForecastKind,
  options: AggregateOptions = {}
): AggregateForecast {
  const ok = results.filter((r) => r.status === "ok" && r.value !== null);
  const excluded: AggregationMeta["excluded"] = [];
  for (const r of results) {
    if (r.status !== "ok") {
      excluded.push({ subQuestionId: r.subQuestionId, status: r.status });
    }
  }

  if (ok.length === 0) {
    const failedIds = results.map((r) => r.subQuestionId);
    log.error("No usable sub-forecasts", undefined, { ...options.context, kind, failedIds });
    throw new AggregationError(
      `All ${results.length} sub-forecasts failed or timed out`,
      failedIds,
      { kind }
    );
  }

  const { weights, equalWeighting } = normalizeWeights(ok);
  const meta: AggregationMeta = {
    contributing: ok.map((r) => r.subQuestionId),
    excluded,
    weights: Object.fromEntries(ok.map((r, i) => [r.subQuestionId, weights[i]])),
    equalWeighting,
  };

  if (excluded.length > 0) {
    log.warn("Aggregating without some sub-forecasts", {
      ...options.context,
      kind,
      excluded: excluded.map((e) => `${e.subQuestionId}:${e.status}`),
    });
  }

  switch (kind) {
    case "binary": {
      const items = contributions(ok, weights, kind, (v) => (v.kind === "binary" ? v : null));
      const method = options.method ?? "weighted_average";
      const probability = clamp(
        combineProbabilities(items, method),
        options.probabilityFloor ?? DEFAULT_PROBABILITY_FLOOR,
        options.probabilityCeiling ?? DEFAULT_PROBABILITY_CEILING
      );
      return {
        kind,
        probability,
        method,
        degraded: items.some((c) => c.degraded),
        meta,
      };
    }

    case "numeric": {
      const items = contributions(ok, weights, kind, (v) => (v.kind === "numeric" ? v : null));
      const cdf = combineCdfs(
        items.map((c) => ({ ...c, value: c.value.cdf })),
        { ...DEFAULT_CDF_POLICY, ...options.cdfPolicy },
        options.context
      );
      return { kind, cdf, degraded: cdf.degraded, meta };
    }

    case "categorical": {
      const items = contributions(ok, weights, kind, (v) =>
        v.kind === "categorical" ? v : null
      );
      return {
        kind,
        probabilities: combineCategories(items.map((c) => ({ ...c, value: c.value.probabilities }))),
        degraded: items.some((c) => c.degraded),
        meta,
      };
    }
  }
}

// ============================================
// WEIGHTS
// ============================================

/**
 * Renormalize weights over the ok subset; fall back to equal weights when
 * any weight is missing or they sum to zero
 */
function normalizeWeights(ok: readonly PartialResult[]): {
  weights: number[];
  equalWeighting: boolean;
} {
  const raw = ok.map((r) => r.weight);
  const total = raw.reduce<number>((sum, w) => sum + (w ?? 0), 0);

  if (raw.some((w) => w === undefined) || !(total > 0)) {
    if (raw.every((w) => w !== undefined)) {
      log.warn("Sub-forecast weights sum to zero, using equal weights", {
        ids: ok.map((r) => r.subQuestionId),
      });
    }
    return { weights: ok.map(() => 1 / ok.length), equalWeighting: true };
  }

  return { weights: raw.map((w) => (w ?? 0) / total), equalWeighting: false };
}

function contributions<T extends ForecastValue>(
  ok: readonly PartialResult[],
  weights: readonly number[],
  kind: ForecastKind,
  select: (value: ForecastValue) => T | null
): Array<Contribution<T>> {
  return ok.map((r, i) => {
    const value = r.value === null ? null : select(r.value);
    if (value === null) {
      throw new ValidationError(`Sub-forecast ${r.subQuestionId} does not match kind ${kind}`, {
        field: `results[${r.subQuestionId}].value.kind`,
        expected: kind,
        received: r.value?.kind ?? "null",
      });
    }
    return { id: r.subQuestionId, value, weight: weights[i], degraded: isDegraded(value) };
  });
}

function isDegraded(value: ForecastValue): boolean {
  return value.kind === "numeric" ? value.cdf.degraded : value.degraded === true;
}

// ============================================
// COMBINERS
// ============================================

function combineProbabilities(
  items: ReadonlyArray<Contribution<{ probability: number }>>,
  method: BinaryAggregationMethod
): number {
  switch (method) {
    case "weighted_average":
      return items.reduce((sum, c) => sum + c.weight * c.value.probability, 0);

    case "geometric_mean": {
      // Weighted, in log space; a zero probability pins the result to zero
      if (items.some((c) => c.value.probability <= 0)) return 0;
      const logSum = items.reduce((sum, c) => sum + c.weight * Math.log(c.value.probability), 0);
      return Math.exp(logSum);
    }

    case "median": {
      const sorted = items.map((c) => c.value.probability).sort((a, b) => a - b);
      const mid = Math.floor(sorted.length / 2);
      return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
    }
  }
}

function combineCdfs(
  items: ReadonlyArray<Contribution<ContinuousCdf>>,
  policy: CdfPolicy,
  context?: Record<string, unknown>
): ContinuousCdf {
  const outcomeCount = items[0].value.outcomeCount;
  for (const item of items) {
    if (item.value.outcomeCount !== outcomeCount || item.value.values.length !== outcomeCount) {
      throw new ValidationError("Numeric sub-forecasts must share one outcome count", {
        field: `results[${item.id}].value.cdf.outcomeCount`,
        expected: String(outcomeCount),
        received: String(item.value.values.length),
      });
    }
  }

  const minGap = Math.max(
    minGapFor(outcomeCount, policy.minGapFraction),
    ...items.map((c) => c.value.minGap)
  );
  const maxStep = maxStepFor(outcomeCount, policy.maxStepFraction);
  const mixed = mixCdfValues(
    items.map((c) => c.value.values),
    items.map((c) => c.weight)
  );

  try {
    return createContinuousCdf(repairCdf(mixed, minGap, maxStep), {
      minGap,
      degraded: items.some((c) => c.value.degraded),
    });
  } catch (error) {
    if (!(error instanceof NumericalError)) {
      throw error;
    }

    log.warn("Combined CDF could not be repaired, using uniform fallback", {
      ...context,
      reason: error.message,
      ...error.context,
    });
    return uniformCdf(outcomeCount, policy);
  }
}

function combineCategories(
  items: ReadonlyArray<Contribution<Readonly<Record<string, number>>>>
): Record<string, number> {
  const keys: string[] = [];
  const seen = new Set<string>();
  for (const item of items) {
    for (const key of Object.keys(item.value)) {
      if (!seen.has(key)) {
        seen.add(key);
        keys.push(key);
      }
    }
  }

  const combined: Record<string, number> = {};
  let total = 0;
  for (const key of keys) {
    const p = items.reduce((sum, c) => sum + c.weight * (c.value[key] ?? 0), 0);
    combined[key] = p;
    total += p;
  }

  if (!(total > 0)) {
    throw new ValidationError("Categorical sub-forecasts carry no probability mass", {
      field: "results.value.probabilities",
    });
  }

  for (const key of keys) {
    combined[key] /= total;
  }

  const sum = keys.reduce((acc, key) => acc + combined[key], 0);
  if (Math.abs(sum - 1) > CATEGORICAL_TOLERANCE) {
    throw new ValidationError("Categorical probabilities do not sum to 1", {
      received: String(sum),
    });
  }

  return combined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
