/**
 * Distribution Synthesizer
 * Turns sparse percentile estimates into a fixed-length, submittable CDF
 *
 * Pipeline:
 *   1. transform values (ln on log-scaled questions)
 *   2. piecewise-linear percentile -> value map through the estimates
 *   3. extrapolate both tails with the outer slopes, clamped at the bounds
 *   4. evaluate value -> probability at evenly spaced positions
 *   5. pin the endpoints, then repair order, minimum gap and the per-step mass cap
 *
 * Bad input raises ValidationError. Numerical trouble after validation yields a
 * uniform CDF flagged as degraded.
 */

import { logger, NumericalError, ValidationError } from "@forecast-synthesis/core";
import { DEFAULT_CDF_POLICY } from "../config.js";
import { PercentileEstimatesSchema, describeIssues } from "../schemas.js";
import type {
  CdfPolicy,
  ContinuousCdf,
  DistributionBounds,
  PercentileEstimate,
} from "../types.js";
import { createBounds } from "./bounds.js";
import { createContinuousCdf, maxStepFor, minGapFor, repairCdf, uniformCdf } from "./cdf.js";

const log = logger.child({ component: "synthesizer" });

// Closest two declared percentiles may be
const MIN_PERCENTILE_SPACING = 5e-5;

// At least one estimate must fall within this share of the range past a bound
const NEAR_RANGE_FRACTION = 0.25;

// No estimate may fall further than this many range widths past a bound
const FAR_RANGE_MULTIPLE = 2;

export interface SynthesizeOptions {
  policy?: Partial<CdfPolicy>;
  /** Extra context for log lines (question id and the like) */
  context?: Record<string, unknown>;
}

/** A knot of the percentile -> transformed value map */
interface Knot {
  p: number;
  x: number;
}

/**
 * Build a ContinuousCdf from percentile estimates
 */
export function synthesize(
  estimates: readonly PercentileEstimate[],
  bounds: DistributionBounds,
  options: SynthesizeOptions = {}
): ContinuousCdf {
  const checkedBounds = createBounds(bounds);
  const policy: CdfPolicy = { ...DEFAULT_CDF_POLICY, ...options.policy };

  validateEstimates(estimates, checkedBounds);

  const minGap = minGapFor(checkedBounds.outcomeCount, policy.minGapFraction);
  const maxStep = maxStepFor(checkedBounds.outcomeCount, policy.maxStepFraction);

  try {
    const values = buildCdfValues(estimates, checkedBounds, policy, minGap, maxStep);
    return createContinuousCdf(values, { minGap });
  } catch (error) {
    if (!(error instanceof NumericalError)) {
      throw error;
    }

    log.warn("Synthesis failed numerically, using uniform fallback", {
      ...options.context,
      reason: error.message,
      ...error.context,
    });
    return uniformCdf(checkedBounds.outcomeCount, policy);
  }
}

/**
 * Convenience wrapper taking percentiles keyed in percent, e.g. `{ 10: 20, 50: 45, 90: 80 }`
 */
export function percentilesToCdf(
  percentValues: Readonly<Record<number, number>>,
  bounds: DistributionBounds,
  options?: SynthesizeOptions
): ContinuousCdf {
  const estimates = Object.entries(percentValues)
    .map(([percent, value]) => ({ percentile: Number(percent) / 100, value }))
    .sort((a, b) => a.percentile - b.percentile);

  return synthesize(estimates, bounds, options);
}

// ============================================
// VALIDATION
// ============================================

function validateEstimates(
  estimates: readonly PercentileEstimate[],
  bounds: DistributionBounds
): void {
  const parsed = PercentileEstimatesSchema.safeParse(estimates);
  if (!parsed.success) {
    throw new ValidationError(`Invalid percentile estimates: ${describeIssues(parsed.error)}`, {
      field: "estimates",
    });
  }

  for (let i = 1; i < estimates.length; i++) {
    const prev = estimates[i - 1];
    const curr = estimates[i];

    if (curr.percentile <= prev.percentile) {
      throw new ValidationError("Percentiles must be strictly increasing", {
        field: `estimates[${i}].percentile`,
        expected: `> ${prev.percentile}`,
        received: String(curr.percentile),
      });
    }

    if (curr.percentile - prev.percentile < MIN_PERCENTILE_SPACING) {
      throw new ValidationError("Percentiles are too close together", {
        field: `estimates[${i}].percentile`,
        expected: `>= ${prev.percentile + MIN_PERCENTILE_SPACING}`,
        received: String(curr.percentile),
      });
    }

    if (curr.value <= prev.value) {
      throw new ValidationError("Values must be strictly increasing", {
        field: `estimates[${i}].value`,
        expected: `> ${prev.value}`,
        received: String(curr.value),
      });
    }
  }

  estimates.forEach((estimate, i) => {
    const field = `estimates[${i}].value`;

    if (!bounds.lowerOpen && bounds.lower !== null && estimate.value < bounds.lower) {
      throw new ValidationError("Value lies below the closed lower bound", {
        field,
        expected: `>= ${bounds.lower}`,
        received: String(estimate.value),
      });
    }

    if (!bounds.upperOpen && bounds.upper !== null && estimate.value > bounds.upper) {
      throw new ValidationError("Value lies above the closed upper bound", {
        field,
        expected: `<= ${bounds.upper}`,
        received: String(estimate.value),
      });
    }

    if (bounds.logScale && estimate.value <= 0) {
      throw new ValidationError("Log-scaled values must be positive", {
        field,
        expected: "> 0",
        received: String(estimate.value),
      });
    }
  });

  checkDistanceFromRange(estimates, bounds);
}

/**
 * With both bounds known, some estimate must sit near the range and none far outside it
 */
function checkDistanceFromRange(
  estimates: readonly PercentileEstimate[],
  bounds: DistributionBounds
): void {
  const { lower, upper } = bounds;
  if (lower === null || upper === null) return;

  const width = upper - lower;
  const nearLow = lower - NEAR_RANGE_FRACTION * width;
  const nearHigh = upper + NEAR_RANGE_FRACTION * width;

  if (!estimates.some((e) => e.value >= nearLow && e.value <= nearHigh)) {
    throw new ValidationError("No estimate lies near the question range", {
      field: "estimates",
      expected: `a value in [${nearLow}, ${nearHigh}]`,
      received: estimates.map((e) => e.value).join(", "),
    });
  }

  const farLow = lower - FAR_RANGE_MULTIPLE * width;
  const farHigh = upper + FAR_RANGE_MULTIPLE * width;
  const farIndex = estimates.findIndex((e) => e.value < farLow || e.value > farHigh);
  if (farIndex >= 0) {
    throw new ValidationError("Estimate lies far outside the question range", {
      field: `estimates[${farIndex}].value`,
      expected: `in [${farLow}, ${farHigh}]`,
      received: String(estimates[farIndex].value),
    });
  }
}

// ============================================
// CONSTRUCTION
// ============================================

function buildCdfValues(
  estimates: readonly PercentileEstimate[],
  bounds: DistributionBounds,
  policy: CdfPolicy,
  minGap: number,
  maxStep: number
): number[] {
  const transform = bounds.logScale ? Math.log : (x: number) => x;

  const points: Knot[] = estimates.map((e) => ({ p: e.percentile, x: transform(e.value) }));
  points.forEach((point, i) => {
    if (!Number.isFinite(point.x)) {
      throw new NumericalError("Transformed value is not finite", { index: i });
    }
    if (i > 0 && point.x <= points[i - 1].x) {
      throw new NumericalError("Values collapse after transform", { index: i });
    }
  });

  const lower = bounds.lower === null ? null : transform(bounds.lower);
  const upper = bounds.upper === null ? null : transform(bounds.upper);

  const knots = withTails(points, lower, upper, bounds, policy);

  const domainLow = lower ?? knots[0].x;
  const domainHigh = upper ?? knots[knots.length - 1].x;
  if (!(domainHigh > domainLow)) {
    throw new NumericalError("Effective domain is empty", { domainLow, domainHigh });
  }

  const n = bounds.outcomeCount;
  const values: number[] = [];
  for (let i = 0; i < n; i++) {
    const position = domainLow + ((domainHigh - domainLow) * i) / (n - 1);
    values.push(cdfAt(knots, position));
  }

  values[0] = bounds.lowerOpen ? Math.max(values[0], policy.endpointFloor) : policy.endpointFloor;
  values[n - 1] = bounds.upperOpen
    ? Math.min(values[n - 1], policy.endpointCeiling)
    : policy.endpointCeiling;

  return repairCdf(values, minGap, maxStep);
}

/**
 * Add knots at percentile 0 and 1 by extrapolating the outer segments
 */
function withTails(
  points: Knot[],
  lower: number | null,
  upper: number | null,
  bounds: DistributionBounds,
  policy: CdfPolicy
): Knot[] {
  const first = points[0];
  const second = points[1];
  const last = points[points.length - 1];
  const beforeLast = points[points.length - 2];

  const lowSlope = (second.x - first.x) / (second.p - first.p);
  const highSlope = (last.x - beforeLast.x) / (last.p - beforeLast.p);

  let tailLow = first.x - first.p * lowSlope;
  let tailHigh = last.x + (1 - last.p) * highSlope;

  const width = Math.max((upper ?? last.x) - (lower ?? first.x), last.x - first.x);
  const overshoot = policy.tailOvershootFraction * width;

  if (lower !== null) {
    const limit = bounds.lowerOpen ? lower - overshoot : lower;
    tailLow = Math.min(first.x, Math.max(tailLow, limit));
  }
  if (upper !== null) {
    const limit = bounds.upperOpen ? upper + overshoot : upper;
    tailHigh = Math.max(last.x, Math.min(tailHigh, limit));
  }

  if (!Number.isFinite(tailLow) || !Number.isFinite(tailHigh)) {
    throw new NumericalError("Tail extrapolation is not finite", { tailLow, tailHigh });
  }

  return [{ p: 0, x: tailLow }, ...points, { p: 1, x: tailHigh }];
}

/**
 * Cumulative probability at a transformed value, by inverting the knot map
 */
function cdfAt(knots: Knot[], x: number): number {
  const lastIndex = knots.length - 1;
  if (x < knots[0].x) return 0;
  if (x >= knots[lastIndex].x) return 1;

  let k = 0;
  while (k + 1 < lastIndex && knots[k + 1].x <= x) {
    k++;
  }

  const a = knots[k];
  const b = knots[k + 1];
  const result = a.p + ((b.p - a.p) * (x - a.x)) / (b.x - a.x);

  if (!Number.isFinite(result)) {
    throw new NumericalError("Interpolation produced a non-finite value", { x });
  }
  return result;
}
