/**
 * Scenario mixtures
 * Several weighted percentile sets ("base case", "upside", ...) blended into one CDF
 */

import { ValidationError } from "@forecast-synthesis/core";
import { DEFAULT_CDF_POLICY } from "../config.js";
import { MixtureScenarioSchema, describeIssues } from "../schemas.js";
import type { ContinuousCdf, DistributionBounds, MixtureScenario } from "../types.js";
import { createContinuousCdf, maxStepFor, minGapFor, mixCdfValues, repairCdf } from "./cdf.js";
import { synthesize, type SynthesizeOptions } from "./synthesizer.js";

/**
 * Synthesize each scenario and take the weight-averaged mixture
 */
export function synthesizeMixture(
  scenarios: readonly MixtureScenario[],
  bounds: DistributionBounds,
  options: SynthesizeOptions = {}
): ContinuousCdf {
  if (scenarios.length === 0) {
    throw new ValidationError("A mixture needs at least one scenario", {
      field: "scenarios",
      expected: ">= 1",
      received: "0",
    });
  }

  scenarios.forEach((scenario, i) => {
    const parsed = MixtureScenarioSchema.safeParse(scenario);
    if (!parsed.success) {
      throw new ValidationError(`Invalid scenario: ${describeIssues(parsed.error)}`, {
        field: `scenarios[${i}]`,
      });
    }
  });

  const totalWeight = scenarios.reduce((sum, s) => sum + s.weight, 0);
  if (!(totalWeight > 0)) {
    throw new ValidationError("Scenario weights must have a positive total", {
      field: "scenarios.weight",
      expected: "> 0",
      received: String(totalWeight),
    });
  }

  const cdfs = scenarios.map((scenario) =>
    synthesize(scenario.estimates, bounds, {
      ...options,
      context: { ...options.context, scenario: scenario.name },
    })
  );

  const policy = { ...DEFAULT_CDF_POLICY, ...options.policy };
  const minGap = minGapFor(bounds.outcomeCount, policy.minGapFraction);
  const mixed = mixCdfValues(
    cdfs.map((cdf) => cdf.values),
    scenarios.map((s) => s.weight / totalWeight)
  );

  const maxStep = maxStepFor(bounds.outcomeCount, policy.maxStepFraction);

  return createContinuousCdf(repairCdf(mixed, minGap, maxStep), {
    minGap,
    degraded: cdfs.some((cdf) => cdf.degraded),
  });
}
