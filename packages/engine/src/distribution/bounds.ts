/**
 * Distribution bounds
 */

import { ValidationError } from "@forecast-synthesis/core";
import { DEFAULT_OUTCOME_COUNT } from "../config.js";
import {
  DistributionBoundsSchema,
  describeIssues,
  type DistributionBoundsInput,
} from "../schemas.js";
import type { DistributionBounds } from "../types.js";

/**
 * Validate question metadata and freeze it into DistributionBounds
 */
export function createBounds(input: DistributionBoundsInput): DistributionBounds {
  const parsed = DistributionBoundsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid bounds: ${describeIssues(parsed.error)}`, {
      field: "bounds",
    });
  }

  const {
    lower = null,
    upper = null,
    lowerOpen = false,
    upperOpen = false,
    logScale = false,
    outcomeCount = DEFAULT_OUTCOME_COUNT,
  } = parsed.data;

  if (lower !== null && upper !== null && lower >= upper) {
    throw new ValidationError("Lower bound must be below upper bound", {
      field: "bounds.lower",
      expected: `< ${upper}`,
      received: String(lower),
    });
  }

  if (!lowerOpen && lower === null) {
    throw new ValidationError("A closed lower side needs a lower bound", {
      field: "bounds.lower",
    });
  }

  if (!upperOpen && upper === null) {
    throw new ValidationError("A closed upper side needs an upper bound", {
      field: "bounds.upper",
    });
  }

  if (logScale) {
    for (const [field, bound] of [
      ["bounds.lower", lower],
      ["bounds.upper", upper],
    ] as const) {
      if (bound !== null && bound <= 0) {
        throw new ValidationError("Log-scaled bounds must be positive", {
          field,
          expected: "> 0",
          received: String(bound),
        });
      }
    }
  }

  return Object.freeze({ lower, upper, lowerOpen, upperOpen, logScale, outcomeCount });
}
