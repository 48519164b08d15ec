/**
 * Boundary Schemas
 * Zod schemas for the loosely-typed payloads coming from the agent layer
 */

import { z } from "zod";

// ============================================
// SHARED
// ============================================

export const ForecastKindSchema = z.enum(["binary", "numeric", "categorical"]);

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

// ============================================
// DISTRIBUTIONS
// ============================================

export const PercentileEstimateSchema = z.object({
  percentile: z.number().gt(0).lt(1),
  value: z.number().finite(),
});

export const PercentileEstimatesSchema = z
  .array(PercentileEstimateSchema)
  .min(2, "At least 2 percentile estimates are required");

export const DistributionBoundsSchema = z.object({
  lower: z.number().finite().nullable().optional(),
  upper: z.number().finite().nullable().optional(),
  lowerOpen: z.boolean().optional(),
  upperOpen: z.boolean().optional(),
  logScale: z.boolean().optional(),
  outcomeCount: z.number().int().min(2).optional(),
});

export type DistributionBoundsInput = z.input<typeof DistributionBoundsSchema>;

export const MixtureScenarioSchema = z.object({
  name: z.string().min(1),
  weight: z.number().finite().min(0),
  estimates: z.array(PercentileEstimateSchema),
});

// ============================================
// FORECAST VALUES
// ============================================

export const ContinuousCdfSchema = z.object({
  values: z.array(z.number().finite().min(0).max(1)).min(2),
  outcomeCount: z.number().int().min(2),
  minGap: z.number().min(0),
  degraded: z.boolean(),
});

export const ForecastValueSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("binary"),
    probability: z.number().min(0).max(1),
    degraded: z.boolean().optional(),
  }),
  z.object({
    kind: z.literal("numeric"),
    cdf: ContinuousCdfSchema,
  }),
  z.object({
    kind: z.literal("categorical"),
    probabilities: z.record(z.number().finite().min(0)),
    degraded: z.boolean().optional(),
  }),
]);

// ============================================
// DECOMPOSITION
// ============================================

export const SubQuestionInputSchema = z.object({
  id: z.string().min(1),
  kind: ForecastKindSchema,
  title: z.string().optional(),
  bounds: DistributionBoundsSchema.nullable().optional(),
  weight: z.number().finite().min(0).optional(),
});

export const DecompositionRequestSchema = z
  .object({
    questionId: z.string().min(1),
    subQuestions: z.array(SubQuestionInputSchema).min(1, "At least one sub-question is required"),
  })
  .superRefine((request, ctx) => {
    const seen = new Set<string>();
    request.subQuestions.forEach((sq, index) => {
      if (seen.has(sq.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["subQuestions", index, "id"],
          message: `Duplicate sub-question id "${sq.id}"`,
        });
      }
      seen.add(sq.id);

      if (sq.kind === "numeric" && !sq.bounds) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["subQuestions", index, "bounds"],
          message: "Numeric sub-questions need bounds",
        });
      }
    });
  });
