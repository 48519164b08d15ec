/**
 * Continuous CDF primitives
 * Construction, validity checks and the monotonicity / minimum-gap repair
 */

import { NumericalError, ValidationError } from "@forecast-synthesis/core";
import type { CdfPolicy, ContinuousCdf } from "../types.js";

// Absorbs rounding in gap comparisons
const GAP_TOLERANCE = 1e-12;

// Step count the mass cap is stated for
const CAP_REFERENCE_STEPS = 200;

// Synthesized CDFs stay this far under the cap
const CAP_HEADROOM = 0.95;

/**
 * Minimum gap between consecutive values for a given resolution
 */
export function minGapFor(outcomeCount: number, minGapFraction: number): number {
  return minGapFraction / (outcomeCount - 1);
}

/**
 * Largest mass allowed between consecutive values, with headroom
 */
export function maxStepFor(outcomeCount: number, maxStepFraction: number): number {
  return ((maxStepFraction * CAP_REFERENCE_STEPS) / (outcomeCount - 1)) * CAP_HEADROOM;
}

/**
 * Freeze a value sequence into a ContinuousCdf
 */
export function createContinuousCdf(
  values: readonly number[],
  options: { minGap: number; degraded?: boolean }
): ContinuousCdf {
  if (values.length < 2) {
    throw new ValidationError("A CDF needs at least 2 values", {
      field: "values",
      expected: ">= 2",
      received: String(values.length),
    });
  }

  return Object.freeze({
    values: Object.freeze([...values]),
    outcomeCount: values.length,
    minGap: options.minGap,
    degraded: options.degraded ?? false,
  });
}

/**
 * True when every value is in [0, 1] and each step lies in [minGap, maxStep]
 */
export function isValidCdf(
  values: readonly number[],
  minGap: number,
  maxStep = Number.POSITIVE_INFINITY
): boolean {
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (!Number.isFinite(v) || v < 0 || v > 1) return false;
    if (i > 0) {
      const step = v - values[i - 1];
      if (step < minGap - GAP_TOLERANCE || step > maxStep + GAP_TOLERANCE) return false;
    }
  }
  return true;
}

/**
 * Enforce non-decreasing order and the minimum gap, keeping the first and last value.
 *
 * Steps below `minGap` are raised to it; the deficit is taken from the steps above
 * `minGap` in proportion to how far above they are. Steps above `maxStep` are then
 * cut to it and the surplus spread over the others by scaling them up. A sequence
 * that already satisfies both limits comes back unchanged, so repairing twice is
 * the same as once.
 *
 * Throws NumericalError when the endpoints leave too little or too much room.
 */
export function repairCdf(
  values: readonly number[],
  minGap: number,
  maxStep = Number.POSITIVE_INFINITY
): number[] {
  const n = values.length;
  if (n < 2) {
    throw new NumericalError("Cannot repair a CDF with fewer than 2 values", { length: n });
  }

  for (const v of values) {
    if (!Number.isFinite(v)) {
      throw new NumericalError("CDF contains a non-finite value");
    }
  }

  if (isValidCdf(values, minGap, maxStep)) {
    return [...values];
  }

  const first = values[0];
  const last = values[n - 1];
  const total = last - first;
  const required = (n - 1) * minGap;

  if (total < required - GAP_TOLERANCE) {
    throw new NumericalError("Endpoints leave no room for the minimum gap", {
      first,
      last,
      required,
    });
  }

  if (total > (n - 1) * maxStep + GAP_TOLERANCE) {
    throw new NumericalError("Endpoints spread more mass than the step cap allows", {
      first,
      last,
      maxStep,
    });
  }

  const excesses: number[] = [];
  let excessSum = 0;
  for (let i = 1; i < n; i++) {
    const excess = Math.max(values[i] - values[i - 1] - minGap, 0);
    excesses.push(excess);
    excessSum += excess;
  }

  const spare = Math.max(total - required, 0);
  // No excess anywhere: spread the spare mass evenly
  const steps = excesses.map(
    (excess) => minGap + (excessSum > 0 ? (excess / excessSum) * spare : spare / excesses.length)
  );

  const capped = Number.isFinite(maxStep) ? capSteps(steps, maxStep) : steps;

  const repaired: number[] = [first];
  let running = first;
  for (const step of capped) {
    running += step;
    repaired.push(running);
  }

  repaired[n - 1] = last;
  return repaired;
}

/**
 * Cut steps to `maxStep` and scale the uncut ones up by the surplus until none is over.
 * Each round fixes at least one more step at the cap, so this ends within `steps.length` rounds.
 */
function capSteps(steps: readonly number[], maxStep: number): number[] {
  const result = [...steps];
  const atCap = new Array<boolean>(result.length).fill(false);

  for (let round = 0; round <= result.length; round++) {
    let surplus = 0;
    result.forEach((step, i) => {
      if (!atCap[i] && step > maxStep) {
        surplus += step - maxStep;
        result[i] = maxStep;
        atCap[i] = true;
      }
    });

    if (surplus <= 0) {
      return result;
    }

    const open = result.filter((_, i) => !atCap[i]);
    const openSum = open.reduce((sum, step) => sum + step, 0);
    if (open.length === 0) {
      throw new NumericalError("No room left under the step cap", { surplus, maxStep });
    }

    result.forEach((step, i) => {
      if (!atCap[i]) {
        result[i] = openSum > 0 ? step * (1 + surplus / openSum) : surplus / open.length;
      }
    });
  }

  return result;
}

/**
 * Evenly spaced CDF between the endpoint floor and ceiling
 */
export function uniformCdf(outcomeCount: number, policy: CdfPolicy): ContinuousCdf {
  const { endpointFloor: floor, endpointCeiling: ceiling } = policy;
  const values: number[] = [];

  for (let i = 0; i < outcomeCount; i++) {
    values.push(floor + ((ceiling - floor) * i) / (outcomeCount - 1));
  }
  values[outcomeCount - 1] = ceiling;

  return createContinuousCdf(values, {
    minGap: minGapFor(outcomeCount, policy.minGapFraction),
    degraded: true,
  });
}

/**
 * Pointwise weighted average of CDF value sequences of equal length.
 * Weights must already be normalized.
 */
export function mixCdfValues(
  sequences: ReadonlyArray<readonly number[]>,
  weights: readonly number[]
): number[] {
  const length = sequences[0]?.length ?? 0;
  const mixed = new Array<number>(length).fill(0);

  sequences.forEach((sequence, k) => {
    for (let i = 0; i < length; i++) {
      mixed[i] += weights[k] * sequence[i];
    }
  });

  return mixed;
}
