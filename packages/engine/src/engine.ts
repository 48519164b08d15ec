/**
 * Forecast Engine
 * One configured entry point over synthesis, decomposition and aggregation
 */

import { loadBaseConfig, logger } from "@forecast-synthesis/core";
import { aggregate, type AggregateOptions } from "./aggregation/aggregator.js";
import {
  cdfPolicyFrom,
  loadEngineConfig,
  resolveEngineConfig,
  type EngineConfig,
} from "./config.js";
import {
  DecompositionCoordinator,
  type DecomposeOptions,
  type SpawnFn,
} from "./decomposition/coordinator.js";
import { RecursionGuard } from "./decomposition/guard.js";
import { synthesizeMixture } from "./distribution/mixture.js";
import { synthesize } from "./distribution/synthesizer.js";
import type { DistributionBoundsInput } from "./schemas.js";
import type {
  AggregateForecast,
  ContinuousCdf,
  DecompositionRequest,
  DistributionBounds,
  ForecastKind,
  MixtureScenario,
  PartialResult,
  PercentileEstimate,
} from "./types.js";

export interface DecompositionForecast {
  forecast: AggregateForecast;
  results: PartialResult[];
}

export type ForecastByDecompositionOptions = DecomposeOptions &
  Pick<AggregateOptions, "method">;

export class ForecastEngine {
  readonly config: EngineConfig;
  private readonly coordinator: DecompositionCoordinator;
  private readonly log = logger.child({ component: "engine" });

  constructor(config: Partial<EngineConfig> = {}) {
    this.config = Object.freeze(resolveEngineConfig(config));
    this.coordinator = new DecompositionCoordinator({
      maxConcurrent: this.config.maxConcurrent,
      unitTimeoutMs: this.config.unitTimeoutMs,
      cancelGraceMs: this.config.cancelGraceMs,
      outcomeCount: this.config.outcomeCount,
      cdfPolicy: cdfPolicyFrom(this.config),
    });
  }

  /**
   * Build an engine from environment variables, applying the log settings
   */
  static fromEnv(source: Record<string, string | undefined> = process.env): ForecastEngine {
    const base = loadBaseConfig(source);
    logger.setLevel(base.log.level);
    logger.setFormat(base.log.format);
    return new ForecastEngine(loadEngineConfig(source));
  }

  /** Guard for a top-level question */
  rootGuard(): RecursionGuard {
    return RecursionGuard.root(this.config.maxDepth);
  }

  synthesize(
    estimates: readonly PercentileEstimate[],
    bounds: DistributionBoundsInput,
    context?: Record<string, unknown>
  ): ContinuousCdf {
    return synthesize(estimates, this.withOutcomeCount(bounds), {
      policy: cdfPolicyFrom(this.config),
      context,
    });
  }

  synthesizeMixture(
    scenarios: readonly MixtureScenario[],
    bounds: DistributionBoundsInput,
    context?: Record<string, unknown>
  ): ContinuousCdf {
    return synthesizeMixture(scenarios, this.withOutcomeCount(bounds), {
      policy: cdfPolicyFrom(this.config),
      context,
    });
  }

  aggregate(
    results: readonly PartialResult[],
    kind: ForecastKind,
    options?: AggregateOptions
  ): AggregateForecast {
    return aggregate(results, kind, {
      probabilityFloor: this.config.endpointFloor,
      probabilityCeiling: this.config.endpointCeiling,
      cdfPolicy: cdfPolicyFrom(this.config),
      ...options,
    });
  }

  decompose(
    request: DecompositionRequest,
    guard: RecursionGuard,
    spawn: SpawnFn,
    options?: DecomposeOptions
  ): Promise<PartialResult[]> {
    return this.coordinator.decompose(request, guard, spawn, options);
  }

  /**
   * Decompose a question and aggregate whatever comes back.
   * Throws AggregationError when no sub-forecast is usable.
   */
  async forecastByDecomposition(
    request: DecompositionRequest,
    guard: RecursionGuard,
    spawn: SpawnFn,
    kind: ForecastKind,
    options: ForecastByDecompositionOptions = {}
  ): Promise<DecompositionForecast> {
    const results = await this.decompose(request, guard, spawn, { signal: options.signal });
    const forecast = this.aggregate(results, kind, {
      method: options.method,
      context: { questionId: request.questionId },
    });

    this.log.info("Decomposed forecast ready", {
      questionId: request.questionId,
      kind,
      contributing: forecast.meta.contributing.length,
      excluded: forecast.meta.excluded.length,
      degraded: forecast.degraded,
    });

    return { forecast, results };
  }

  private withOutcomeCount(bounds: DistributionBoundsInput): DistributionBounds {
    return {
      lower: bounds.lower ?? null,
      upper: bounds.upper ?? null,
      lowerOpen: bounds.lowerOpen ?? false,
      upperOpen: bounds.upperOpen ?? false,
      logScale: bounds.logScale ?? false,
      outcomeCount: bounds.outcomeCount ?? this.config.outcomeCount,
    };
  }
}
