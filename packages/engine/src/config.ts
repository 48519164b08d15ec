/**
 * Engine Configuration
 * Depth, fan-out, timeouts and CDF policy, loaded from the environment or passed explicitly
 */

import { z } from "zod";
import { ConfigError, formatConfigIssues } from "@forecast-synthesis/core";
import type { CdfPolicy } from "./types.js";

export const DEFAULT_OUTCOME_COUNT = 201;

const engineConfigSchema = z
  .object({
    maxDepth: z.number().int().min(0),
    maxConcurrent: z.number().int().min(1),
    unitTimeoutMs: z.number().int().positive(),
    cancelGraceMs: z.number().int().min(0),
    outcomeCount: z.number().int().min(2),
    minGapFraction: z.number().min(0).max(1),
    tailOvershootFraction: z.number().min(0).max(1),
    endpointFloor: z.number().gt(0).lt(0.5),
    endpointCeiling: z.number().gt(0.5).lt(1),
    maxStepFraction: z.number().gt(0).max(1),
  })
  .refine((c) => c.endpointCeiling - c.endpointFloor > c.minGapFraction, {
    message: "endpointCeiling - endpointFloor must exceed minGapFraction",
    path: ["minGapFraction"],
  });

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  maxDepth: 2,
  maxConcurrent: 3,
  unitTimeoutMs: 300_000,
  cancelGraceMs: 1_000,
  outcomeCount: DEFAULT_OUTCOME_COUNT,
  minGapFraction: 0.01,
  tailOvershootFraction: 0.1,
  endpointFloor: 0.001,
  endpointCeiling: 0.999,
  maxStepFraction: 0.2,
});

// Blank variables count as unset
const envNumber = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.coerce.number().optional()
);

// Environment variables, coerced from strings
const engineEnvSchema = z.object({
  FORECAST_MAX_DEPTH: envNumber,
  FORECAST_MAX_CONCURRENT: envNumber,
  FORECAST_UNIT_TIMEOUT_MS: envNumber,
  FORECAST_CANCEL_GRACE_MS: envNumber,
  FORECAST_OUTCOME_COUNT: envNumber,
  FORECAST_MIN_GAP_FRACTION: envNumber,
  FORECAST_TAIL_OVERSHOOT: envNumber,
  FORECAST_ENDPOINT_FLOOR: envNumber,
  FORECAST_ENDPOINT_CEILING: envNumber,
  FORECAST_MAX_STEP_FRACTION: envNumber,
});

/**
 * Merge explicit overrides over the defaults and validate
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const parseResult = engineConfigSchema.safeParse({ ...DEFAULT_ENGINE_CONFIG, ...defined });

  if (!parseResult.success) {
    throw new ConfigError(
      `Engine configuration invalid:\n${formatConfigIssues(parseResult.error)}`,
      { issues: parseResult.error.issues.length }
    );
  }

  return parseResult.data;
}

/**
 * Load engine configuration from environment variables
 */
export function loadEngineConfig(
  source: Record<string, string | undefined> = process.env
): EngineConfig {
  const parseResult = engineEnvSchema.safeParse(source);

  if (!parseResult.success) {
    throw new ConfigError(
      `Engine environment invalid:\n${formatConfigIssues(parseResult.error)}`,
      { issues: parseResult.error.issues.length }
    );
  }

  const env = parseResult.data;

  return resolveEngineConfig({
    maxDepth: env.FORECAST_MAX_DEPTH,
    maxConcurrent: env.FORECAST_MAX_CONCURRENT,
    unitTimeoutMs: env.FORECAST_UNIT_TIMEOUT_MS,
    cancelGraceMs: env.FORECAST_CANCEL_GRACE_MS,
    outcomeCount: env.FORECAST_OUTCOME_COUNT,
    minGapFraction: env.FORECAST_MIN_GAP_FRACTION,
    tailOvershootFraction: env.FORECAST_TAIL_OVERSHOOT,
    endpointFloor: env.FORECAST_ENDPOINT_FLOOR,
    endpointCeiling: env.FORECAST_ENDPOINT_CEILING,
    maxStepFraction: env.FORECAST_MAX_STEP_FRACTION,
  });
}

/**
 * Extract the CDF policy portion of a config
 */
export function cdfPolicyFrom(config: EngineConfig): CdfPolicy {
  return {
    minGapFraction: config.minGapFraction,
    tailOvershootFraction: config.tailOvershootFraction,
    endpointFloor: config.endpointFloor,
    endpointCeiling: config.endpointCeiling,
    maxStepFraction: config.maxStepFraction,
  };
}

export const DEFAULT_CDF_POLICY: Readonly<CdfPolicy> = Object.freeze(
  cdfPolicyFrom(DEFAULT_ENGINE_CONFIG)
);
